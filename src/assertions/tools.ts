import type { ToolCallView } from './view.js';
import {
  countWithBounds,
  collectToolErrors,
  resultIncludes,
  resultMatches,
  subsequence,
  dependencyChain,
  stepViolations,
  type ChainStep,
  type StepViolation,
} from './matchers.js';
import {
  parseParams,
  ToolsCalledParamsSchema,
  ToolCallCountParamsSchema,
  NoToolErrorsParamsSchema,
  ToolResultIncludesParamsSchema,
  ToolResultMatchesParamsSchema,
  ToolCallSequenceParamsSchema,
  ToolCallChainParamsSchema,
  ToolCallsWithArgsParamsSchema,
  type ToolCallsWithArgsParams,
} from './params.js';
import { pass, fail, configError, type ValidationResult } from './types.js';
import { stringify } from './utils.js';

/**
 * A configured tool assertion, evaluated over a list of calls from a turn or a conversation
 */
export type ToolCheck = (views: readonly ToolCallView[]) => ValidationResult;

export type ToolCheckFactory = (params: Record<string, unknown>) => ToolCheck;

function rejected(result: ValidationResult): ToolCheck {
  return () => result;
}

/**
 * Every listed tool must be called at least once
 */
export const toolsCalled: ToolCheckFactory = (params) => {
  const parsed = parseParams('tools_called', ToolsCalledParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { tools } = parsed.value;

  return (views) => {
    const called = new Set(views.map((v) => v.name));
    const missing = tools.filter((t) => !called.has(t));
    const details = { missing_tools: missing, called_tools: [...called] };
    return missing.length === 0
      ? pass(details)
      : fail(`Expected tools not called: ${missing.join(', ')}`, details);
  };
};

/**
 * None of the listed tools may be called
 */
export const toolsNotCalled: ToolCheckFactory = (params) => {
  const parsed = parseParams('tools_not_called', ToolsCalledParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const forbidden = new Set(parsed.value.tools);

  return (views) => {
    const offending = views
      .filter((v) => forbidden.has(v.name))
      .map((v) => ({ tool: v.name, index: v.index, args: v.args }));
    return offending.length === 0
      ? pass({ forbidden_called: [] })
      : fail(
          `Forbidden tools called: ${[...new Set(offending.map((o) => o.tool))].join(', ')}`,
          { forbidden_called: offending }
        );
  };
};

export const toolCallCount: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_call_count', ToolCallCountParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { tool, min, max } = parsed.value;

  return (views) => {
    const { count, violation } = countWithBounds(views, tool, min, max);
    const details = { tool: tool ?? null, count, min: min ?? null, max: max ?? null };
    return violation ? fail(violation, details) : pass(details);
  };
};

export const noToolErrors: ToolCheckFactory = (params) => {
  const parsed = parseParams('no_tool_errors', NoToolErrorsParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { tools } = parsed.value;

  return (views) => {
    const errors = collectToolErrors(views, tools).map((v) => ({
      tool: v.name,
      index: v.index,
      error: v.error,
    }));
    return errors.length === 0
      ? pass({ errors: [] })
      : fail(`${errors.length} tool call(s) returned an error`, { errors });
  };
};

export const toolResultIncludes: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_result_includes', ToolResultIncludesParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { tool, patterns, occurrence } = parsed.value;

  return (views) => {
    if (patterns.length === 0) {
      return pass({ message: 'no patterns configured' });
    }
    const outcome = resultIncludes(views, tool, patterns);
    const missing = [...new Set(outcome.misses.flatMap((m) => m.missing_patterns ?? []))];
    const details = {
      tool: tool ?? null,
      match_count: outcome.matchCount,
      required_occurrence: occurrence,
      checked_calls: outcome.checked,
      missing_patterns: missing,
      misses: outcome.misses,
    };
    return outcome.matchCount >= occurrence
      ? pass(details)
      : fail(
          `Expected ${occurrence} result(s) including all patterns, found ${outcome.matchCount}`,
          details
        );
  };
};

export const toolResultMatches: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_result_matches', ToolResultMatchesParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { tool, pattern, occurrence } = parsed.value;

  return (views) => {
    if (pattern === '') {
      return pass({ message: 'no pattern configured' });
    }
    const outcome = resultMatches(views, tool, pattern);
    if (!outcome.ok) {
      return configError('invalid_regex', `Invalid result pattern /${pattern}/`, {
        pattern,
        reason: outcome.error,
      });
    }
    const details = {
      tool: tool ?? null,
      pattern,
      match_count: outcome.matchCount,
      required_occurrence: occurrence,
      checked_calls: outcome.checked,
      misses: outcome.misses,
    };
    return outcome.matchCount >= occurrence
      ? pass(details)
      : fail(
          `Expected ${occurrence} result(s) matching /${pattern}/, found ${outcome.matchCount}`,
          details
        );
  };
};

export const toolCallSequence: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_call_sequence', ToolCallSequenceParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const { sequence } = parsed.value;

  return (views) => {
    const { matched, actual } = subsequence(views, sequence);
    const details = {
      matched_steps: matched,
      total_steps: sequence.length,
      expected_sequence: sequence,
      actual_sequence: actual,
    };
    return matched === sequence.length
      ? pass(details)
      : fail(
          `Tool sequence matched ${matched}/${sequence.length} steps; next expected "${sequence[matched]}"`,
          details
        );
  };
};

function describeViolation(violation: StepViolation): string {
  switch (violation.kind) {
    case 'tool_error':
      return `returned an error: ${violation.error}`;
    case 'result_missing_pattern':
      return `result is missing ${violation.missing_patterns.map((p) => `"${p}"`).join(', ')}`;
    case 'result_pattern_mismatch':
      return `result does not match /${violation.pattern}/`;
    case 'invalid_args_json':
      return 'arguments are not valid JSON';
    case 'missing_argument':
      return `argument "${violation.argument}" is missing`;
    case 'argument_pattern_mismatch':
      return `argument "${violation.argument}" does not match /${violation.pattern}/`;
    case 'invalid_regex':
      return `pattern /${violation.pattern}/ is invalid: ${violation.reason}`;
  }
}

function violationDetails(violation: StepViolation): Record<string, unknown> {
  const { kind, ...rest } = violation;
  return { constraint: kind, ...rest };
}

export function chainCheck(steps: readonly ChainStep[]): ToolCheck {
  return (views) => {
    const outcome = dependencyChain(views, steps);

    switch (outcome.status) {
      case 'complete':
        return pass({ completed_steps: outcome.completedSteps, total_steps: outcome.totalSteps });

      case 'incomplete':
        return fail(
          `Chain incomplete: ${outcome.completedSteps}/${outcome.totalSteps} steps; "${outcome.nextTool}" not reached`,
          {
            completed_steps: outcome.completedSteps,
            total_steps: outcome.totalSteps,
            next_tool: outcome.nextTool,
          }
        );

      case 'violation': {
        const message = `Chain step ${outcome.stepIndex} ("${outcome.tool}") ${describeViolation(outcome.violation)}`;
        const details = {
          failed_step: outcome.stepIndex,
          tool: outcome.tool,
          call_position: outcome.position,
          completed_steps: outcome.completedSteps,
          total_steps: outcome.totalSteps,
          ...violationDetails(outcome.violation),
        };
        const { kind } = outcome.violation;
        if (kind === 'invalid_regex' || kind === 'invalid_args_json') {
          return configError(kind, message, details);
        }
        return fail(message, details);
      }
    }
  };
}

export const toolCallChain: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_call_chain', ToolCallChainParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  return chainCheck(parsed.value.steps);
};

function exactArgViolations(
  view: ToolCallView,
  expected: Record<string, unknown>
): Record<string, unknown>[] {
  const violations: Record<string, unknown>[] = [];
  const args = view.args ?? {};

  for (const [argument, expectedValue] of Object.entries(expected)) {
    if (!Object.hasOwn(args, argument)) {
      violations.push({ type: 'missing_argument', tool: view.name, argument });
      continue;
    }
    if (expectedValue !== null && stringify(args[argument]) !== stringify(expectedValue)) {
      violations.push({
        type: 'value_mismatch',
        tool: view.name,
        argument,
        expected: expectedValue,
        actual: args[argument],
      });
    }
  }
  return violations;
}

function hasRequirements(config: ToolCallsWithArgsParams): boolean {
  return (
    Object.keys(config.expected_args).length > 0 ||
    Object.keys(config.args_match).length > 0 ||
    config.result_includes.length > 0 ||
    config.result_matches !== undefined ||
    config.no_error
  );
}

/**
 * Calls of a tool must carry the expected arguments and produce acceptable results.
 * Every matching call is checked and all violations are reported.
 */
export const toolCallsWithArgs: ToolCheckFactory = (params) => {
  const parsed = parseParams('tool_calls_with_args', ToolCallsWithArgsParamsSchema, params);
  if (!parsed.ok) return rejected(parsed.result);
  const config = parsed.value;
  const constraints: ChainStep = {
    tool: config.tool_name ?? '',
    resultIncludes: config.result_includes,
    resultMatches: config.result_matches,
    argsMatch: config.args_match,
    noError: config.no_error,
  };

  return (views) => {
    const matching = config.tool_name
      ? views.filter((v) => v.name === config.tool_name)
      : [...views];

    if (config.tool_name && matching.length === 0) {
      return fail(`Tool "${config.tool_name}" was not called`, {
        tool_name: config.tool_name,
        matching_calls: 0,
      });
    }
    if (!hasRequirements(config)) {
      return pass({ matching_calls: matching.length, message: 'no argument requirements configured' });
    }

    const violations: Record<string, unknown>[] = [];
    for (const view of matching) {
      if (view.args === null) {
        violations.push({ type: 'invalid_args_json', tool: view.name });
        continue;
      }
      violations.push(...exactArgViolations(view, config.expected_args));
      for (const violation of stepViolations(view, constraints)) {
        const { kind, ...rest } = violation;
        violations.push({ type: kind, tool: view.name, ...rest });
      }
    }

    const details = { violations, matching_calls: matching.length };
    if (violations.length === 0) {
      return pass(details);
    }
    const hasType = (type: string) => violations.some((v) => v.type === type);
    const configKind = hasType('invalid_regex')
      ? 'invalid_regex'
      : hasType('invalid_args_json')
        ? 'invalid_args_json'
        : undefined;
    if (configKind) {
      return configError(configKind, `${violations.length} violation(s) including ${configKind}`, details);
    }
    return fail(`${violations.length} argument/result violation(s)`, details);
  };
};

export const TOOL_CHECKS: Readonly<Record<string, ToolCheckFactory>> = {
  tools_called: toolsCalled,
  tools_not_called: toolsNotCalled,
  tool_call_count: toolCallCount,
  no_tool_errors: noToolErrors,
  tool_result_includes: toolResultIncludes,
  tool_result_matches: toolResultMatches,
  tool_call_sequence: toolCallSequence,
  tool_call_chain: toolCallChain,
  tool_calls_with_args: toolCallsWithArgs,
};

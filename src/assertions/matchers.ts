import type { ToolCallView } from './view.js';
import { compilePattern, getNestedValue, missingSubstrings, stringify } from './utils.js';

/**
 * One ordered constraint of a dependency chain
 */
export interface ChainStep {
  readonly tool: string;
  readonly resultIncludes: readonly string[];
  readonly resultMatches?: string;
  readonly argsMatch: Readonly<Record<string, string>>;
  readonly noError: boolean;
}

export type StepViolation =
  | { kind: 'tool_error'; error: string }
  | { kind: 'result_missing_pattern'; missing_patterns: string[] }
  | { kind: 'result_pattern_mismatch'; pattern: string }
  | { kind: 'invalid_args_json' }
  | { kind: 'missing_argument'; argument: string; pattern: string }
  | { kind: 'argument_pattern_mismatch'; argument: string; pattern: string; actual: string }
  | { kind: 'invalid_regex'; pattern: string; reason: string; argument?: string };

export interface CountOutcome {
  count: number;
  violation?: string;
}

export interface ResultMiss {
  tool: string;
  index: number;
  position: number;
  missing_patterns?: string[];
}

export interface IncludesOutcome {
  matchCount: number;
  checked: number;
  misses: ResultMiss[];
}

export type MatchesOutcome =
  | { ok: true; matchCount: number; checked: number; misses: ResultMiss[] }
  | { ok: false; pattern: string; error: string };

export interface SubsequenceOutcome {
  matched: number;
  actual: string[];
}

export type ChainOutcome =
  | { status: 'complete'; completedSteps: number; totalSteps: number }
  | { status: 'incomplete'; completedSteps: number; totalSteps: number; nextTool: string }
  | {
      status: 'violation';
      completedSteps: number;
      totalSteps: number;
      stepIndex: number;
      tool: string;
      position: number;
      violation: StepViolation;
    };

function byTool(tool: string | undefined): (view: ToolCallView) => boolean {
  return tool ? (view) => view.name === tool : () => true;
}

/**
 * Count calls (optionally of one tool) and check them against optional bounds.
 * An undefined bound is not set; zero is a real bound.
 */
export function countWithBounds(
  views: readonly ToolCallView[],
  tool: string | undefined,
  min: number | undefined,
  max: number | undefined
): CountOutcome {
  const count = views.filter(byTool(tool)).length;
  const label = tool ? `"${tool}"` : 'any tool';

  if (min !== undefined && count < min) {
    return { count, violation: `expected at least ${min} call(s) to ${label}, got ${count}` };
  }
  if (max !== undefined && count > max) {
    return { count, violation: `expected at most ${max} call(s) to ${label}, got ${count}` };
  }
  return { count };
}

/**
 * Calls that returned an error, optionally scoped to a set of tool names
 */
export function collectToolErrors(
  views: readonly ToolCallView[],
  tools?: readonly string[]
): ToolCallView[] {
  const scope = tools && tools.length > 0 ? new Set(tools) : undefined;
  return views.filter((v) => v.error !== '' && (scope === undefined || scope.has(v.name)));
}

/**
 * Count results containing every pattern (case-insensitive)
 */
export function resultIncludes(
  views: readonly ToolCallView[],
  tool: string | undefined,
  patterns: readonly string[]
): IncludesOutcome {
  const outcome: IncludesOutcome = { matchCount: 0, checked: 0, misses: [] };

  views.forEach((view, position) => {
    if (!byTool(tool)(view)) return;
    outcome.checked++;
    const missing = missingSubstrings(view.result, patterns);
    if (missing.length === 0) {
      outcome.matchCount++;
    } else {
      outcome.misses.push({ tool: view.name, index: view.index, position, missing_patterns: missing });
    }
  });

  return outcome;
}

/**
 * Count results matching a regex (case-sensitive unless /pattern/i is used).
 * An invalid expression is an error, not a mismatch.
 */
export function resultMatches(
  views: readonly ToolCallView[],
  tool: string | undefined,
  pattern: string
): MatchesOutcome {
  const compiled = compilePattern(pattern);
  if (!compiled.ok) {
    return { ok: false, pattern, error: compiled.error };
  }

  let matchCount = 0;
  let checked = 0;
  const misses: ResultMiss[] = [];

  views.forEach((view, position) => {
    if (!byTool(tool)(view)) return;
    checked++;
    if (compiled.regex.test(view.result)) {
      matchCount++;
    } else {
      misses.push({ tool: view.name, index: view.index, position });
    }
  });

  return { ok: true, matchCount, checked, misses };
}

/**
 * Walk the calls once, consuming the expected names in order.
 * Calls that are not the next expected name are skipped.
 */
export function subsequence(
  views: readonly ToolCallView[],
  sequence: readonly string[]
): SubsequenceOutcome {
  let matched = 0;
  const actual: string[] = [];

  for (const view of views) {
    actual.push(view.name);
    if (matched < sequence.length && view.name === sequence[matched]) {
      matched++;
    }
  }

  return { matched, actual };
}

function argumentViolations(view: ToolCallView, step: ChainStep): StepViolation[] {
  const entries = Object.entries(step.argsMatch);
  if (entries.length === 0) {
    return [];
  }
  if (view.args === null) {
    return [{ kind: 'invalid_args_json' }];
  }

  const violations: StepViolation[] = [];
  for (const [argument, pattern] of entries) {
    const compiled = compilePattern(pattern);
    if (!compiled.ok) {
      violations.push({ kind: 'invalid_regex', pattern, reason: compiled.error, argument });
      continue;
    }
    const value = getNestedValue(view.args, argument);
    if (value === undefined) {
      violations.push({ kind: 'missing_argument', argument, pattern });
      continue;
    }
    const actual = stringify(value);
    if (!compiled.regex.test(actual)) {
      violations.push({ kind: 'argument_pattern_mismatch', argument, pattern, actual });
    }
  }
  return violations;
}

/**
 * Every constraint of a step that a call violates, in check order:
 * error, result substrings, result regex, arguments.
 */
export function stepViolations(view: ToolCallView, step: ChainStep): StepViolation[] {
  const violations: StepViolation[] = [];

  if (step.noError && view.error !== '') {
    violations.push({ kind: 'tool_error', error: view.error });
  }

  if (step.resultIncludes.length > 0) {
    const missing = missingSubstrings(view.result, step.resultIncludes);
    if (missing.length > 0) {
      violations.push({ kind: 'result_missing_pattern', missing_patterns: missing });
    }
  }

  if (step.resultMatches) {
    const compiled = compilePattern(step.resultMatches);
    if (!compiled.ok) {
      violations.push({ kind: 'invalid_regex', pattern: step.resultMatches, reason: compiled.error });
    } else if (!compiled.regex.test(view.result)) {
      violations.push({ kind: 'result_pattern_mismatch', pattern: step.resultMatches });
    }
  }

  violations.push(...argumentViolations(view, step));
  return violations;
}

/**
 * Match an ordered chain of steps against the calls.
 *
 * When a call is the current step's tool its constraints are checked at once; the
 * first violation ends the whole check rather than waiting for a later call of the
 * same tool. The cursor advances only on a satisfied step.
 */
export function dependencyChain(
  views: readonly ToolCallView[],
  steps: readonly ChainStep[]
): ChainOutcome {
  const totalSteps = steps.length;
  let current = 0;

  for (const [position, view] of views.entries()) {
    if (current >= totalSteps) break;
    const step = steps[current];
    if (view.name !== step.tool) continue;

    const [violation] = stepViolations(view, step);
    if (violation) {
      return {
        status: 'violation',
        completedSteps: current,
        totalSteps,
        stepIndex: current,
        tool: step.tool,
        position,
        violation,
      };
    }
    current++;
  }

  if (current < totalSteps) {
    return { status: 'incomplete', completedSteps: current, totalSteps, nextTool: steps[current].tool };
  }
  return { status: 'complete', completedSteps: current, totalSteps };
}

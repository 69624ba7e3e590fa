import { z } from 'zod';
import type { ChainStep } from './matchers.js';
import { configError, type ValidationResult } from './types.js';
import { normalizeToArray } from './utils.js';

// Config formats do not distinguish int from float: 2 and 2.0 are both the count 2
export const countParam = z
  .number()
  .finite()
  .nonnegative()
  .transform((n) => Math.trunc(n));

// A single string or a list of strings
export const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => normalizeToArray(v));

const ChainStepSchema = z
  .object({
    tool: z.string().min(1),
    result_includes: stringList.default([]),
    result_matches: z.string().optional(),
    args_match: z.record(z.string()).default({}),
    no_error: z.boolean().default(false),
  })
  .strict()
  .transform(
    (step): ChainStep =>
      Object.freeze({
        tool: step.tool,
        resultIncludes: step.result_includes,
        resultMatches: step.result_matches,
        argsMatch: step.args_match,
        noError: step.no_error,
      })
  );

export const ToolsCalledParamsSchema = z
  .object({
    tools: stringList.refine((tools) => tools.length > 0, 'at least one tool is required'),
  })
  .strict();

export const ToolCallCountParamsSchema = z
  .object({
    tool: z.string().optional(),
    min: countParam.optional(),
    max: countParam.optional(),
  })
  .strict();

export const NoToolErrorsParamsSchema = z
  .object({
    tools: stringList.optional(),
  })
  .strict();

export const ToolResultIncludesParamsSchema = z
  .object({
    tool: z.string().optional(),
    patterns: stringList.default([]),
    occurrence: countParam.default(1),
  })
  .strict();

export const ToolResultMatchesParamsSchema = z
  .object({
    tool: z.string().optional(),
    pattern: z.string().default(''),
    occurrence: countParam.default(1),
  })
  .strict();

export const ToolCallSequenceParamsSchema = z
  .object({
    sequence: z.array(z.string()).default([]),
  })
  .strict();

export const ToolCallChainParamsSchema = z
  .object({
    steps: z.array(ChainStepSchema).default([]),
  })
  .strict();

export const ToolCallsWithArgsParamsSchema = z
  .object({
    tool_name: z.string().optional(),
    // null expected values only require the argument to be present
    expected_args: z.record(z.unknown()).default({}),
    args_match: z.record(z.string()).default({}),
    result_includes: stringList.default([]),
    result_matches: z.string().optional(),
    no_error: z.boolean().default(false),
  })
  .strict();

export const LatencyBudgetParamsSchema = z
  .object({
    max_tool_latency_ms: countParam.optional(),
    max_turn_latency_ms: countParam.optional(),
  })
  .strict();

export const ContentPatternsParamsSchema = z
  .object({
    patterns: stringList.refine((p) => p.length > 0, 'at least one pattern is required'),
  })
  .strict();

export const ContentMatchesParamsSchema = z
  .object({
    pattern: z.string().min(1),
  })
  .strict();

export const JudgeParamsSchema = z
  .object({
    criteria: z.string().min(1),
    rubric: z.string().optional(),
    min_score: z.number().min(0).max(1).optional(),
  })
  .strict();

export const WorkflowStateParamsSchema = z
  .object({
    state: z.string().min(1),
  })
  .strict();

export const WorkflowCompleteParamsSchema = z.object({}).strict();

export const RoundScopeSchema = z.object({
  round_index: countParam.optional(),
});

export type ToolCallsWithArgsParams = z.infer<typeof ToolCallsWithArgsParamsSchema>;
export type JudgeParams = z.infer<typeof JudgeParamsSchema>;

export type ParsedParams<T> =
  | { ok: true; value: T }
  | { ok: false; result: ValidationResult };

/**
 * Validate a raw parameter bag once, when a validator is built.
 * Failures become an invalid_params result the validator reports on every call.
 */
export function parseParams<S extends z.ZodTypeAny>(
  type: string,
  schema: S,
  params: unknown
): ParsedParams<z.output<S>> {
  const result = schema.safeParse(params ?? {});
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const issues = result.error.errors.map(
    (e) => `${e.path.join('.') || '(params)'}: ${e.message}`
  );
  return {
    ok: false,
    result: configError('invalid_params', `Invalid params for "${type}": ${issues.join('; ')}`, {
      issues,
    }),
  };
}

import { HISTORY_SOURCE, type Message } from "../types/message.js";
import { resolveTurnToolTrace, type TurnToolCall } from "./trace.js";
import { parseParams, LatencyBudgetParamsSchema } from "./params.js";
import { TRACE_UNAVAILABLE } from "./turn-validators.js";
import {
  pass,
  fail,
  skip,
  type TurnContext,
  type ValidationResult,
  type Validator,
} from "./types.js";

export interface LatencyConstraints {
  max_tool_latency_ms?: number;
  max_turn_latency_ms?: number;
}

interface LatencyViolation {
  constraint: keyof LatencyConstraints;
  limit_ms: number;
  actual_ms: number;
  tool?: string;
  round_index?: number;
}

/**
 * Sum of model generation time across the turn's live assistant messages
 */
function turnLatency(messages: readonly Message[]): number {
  return messages
    .filter((m) => m.role === "assistant" && m.source !== HISTORY_SOURCE)
    .reduce((sum, m) => sum + (m.latencyMs ?? 0), 0);
}

/**
 * Check latency budgets for a turn's tool calls and generation time
 */
export function checkLatency(
  calls: readonly TurnToolCall[],
  messages: readonly Message[],
  constraints: LatencyConstraints
): LatencyViolation[] {
  const violations: LatencyViolation[] = [];

  if (constraints.max_tool_latency_ms !== undefined) {
    for (const call of calls) {
      if (call.latencyMs > constraints.max_tool_latency_ms) {
        violations.push({
          constraint: "max_tool_latency_ms",
          limit_ms: constraints.max_tool_latency_ms,
          actual_ms: call.latencyMs,
          tool: call.name,
          round_index: call.roundIndex,
        });
      }
    }
  }

  if (constraints.max_turn_latency_ms !== undefined) {
    const total = turnLatency(messages);
    if (total > constraints.max_turn_latency_ms) {
      violations.push({
        constraint: "max_turn_latency_ms",
        limit_ms: constraints.max_turn_latency_ms,
        actual_ms: total,
      });
    }
  }

  return violations;
}

export class LatencyBudgetValidator implements Validator {
  readonly type = "latency_budget";
  private readonly constraints: LatencyConstraints;
  private readonly rejection: ValidationResult | undefined;

  constructor(params: Record<string, unknown> = {}) {
    const parsed = parseParams(this.type, LatencyBudgetParamsSchema, params);
    this.constraints = parsed.ok ? parsed.value : {};
    this.rejection = parsed.ok ? undefined : parsed.result;
  }

  validate(_content: string, context: TurnContext): ValidationResult {
    const trace = resolveTurnToolTrace(context);
    if (!trace.available || context._turn_messages === undefined) {
      return skip(TRACE_UNAVAILABLE);
    }
    if (this.rejection) {
      return this.rejection;
    }

    const violations = checkLatency(trace.calls, context._turn_messages, this.constraints);
    if (violations.length === 0) {
      return pass({ violations });
    }
    const first = violations[0];
    const subject = first.tool ? `"${first.tool}"` : "turn";
    return fail(
      `Latency budget exceeded: ${subject} took ${first.actual_ms}ms (limit ${first.limit_ms}ms)`,
      { violations }
    );
  }
}

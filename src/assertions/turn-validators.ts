import { resolveTurnToolTrace } from './trace.js';
import { viewsFromTurnTrace } from './view.js';
import { parseParams, RoundScopeSchema } from './params.js';
import type { ToolCheck, ToolCheckFactory } from './tools.js';
import { skip, type TurnContext, type ValidationResult, type Validator } from './types.js';

export const TRACE_UNAVAILABLE = 'turn_trace_unavailable';

/**
 * Runs a tool check against the current turn's trace.
 * Without turn messages the check is skipped, whatever its configuration.
 */
export class TurnToolValidator implements Validator {
  readonly type: string;
  private readonly check: ToolCheck;
  private readonly roundIndex: number | undefined;

  constructor(type: string, factory: ToolCheckFactory, params: Record<string, unknown> = {}) {
    this.type = type;

    const { round_index, ...checkParams } = params;
    const scope = parseParams(type, RoundScopeSchema, { round_index });
    if (scope.ok) {
      this.roundIndex = scope.value.round_index;
      this.check = factory(checkParams);
    } else {
      const rejection = scope.result;
      this.check = () => rejection;
    }
  }

  validate(_content: string, context: TurnContext): ValidationResult {
    const trace = resolveTurnToolTrace(context);
    if (!trace.available) {
      return skip(TRACE_UNAVAILABLE);
    }

    const calls =
      this.roundIndex === undefined
        ? trace.calls
        : trace.calls.filter((c) => c.roundIndex === this.roundIndex);
    return this.check(viewsFromTurnTrace(calls));
  }
}

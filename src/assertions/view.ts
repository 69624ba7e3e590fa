import type { TurnToolCall } from './trace.js';
import type { ToolCallRecord } from './conversation.js';
import { stringify } from './utils.js';

/**
 * Matcher-facing projection of a tool call, shared by turn and conversation records.
 * `index` is the round index for turn views and the turn index for conversation views.
 */
export interface ToolCallView {
  readonly name: string;
  readonly args: Readonly<Record<string, unknown>> | null;
  readonly result: string;
  readonly error: string;
  readonly index: number;
}

export function viewFromTurnCall(call: TurnToolCall): ToolCallView {
  return Object.freeze({
    name: call.name,
    args: call.args,
    result: call.result,
    error: call.error,
    index: call.roundIndex,
  });
}

export function viewFromRecord(record: ToolCallRecord): ToolCallView {
  return Object.freeze({
    name: record.toolName,
    args: record.args,
    result: stringify(record.result),
    error: record.error,
    index: record.turnIndex,
  });
}

export function viewsFromTurnTrace(calls: readonly TurnToolCall[]): ToolCallView[] {
  return calls.map(viewFromTurnCall);
}

export function viewsFromRecords(records: readonly ToolCallRecord[]): ToolCallView[] {
  return records.map(viewFromRecord);
}

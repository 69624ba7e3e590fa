import {
  HISTORY_SOURCE,
  type Message,
  type ToolCallRequest,
  type ToolResultPayload,
} from '../types/message.js';
import type { TurnContext } from './types.js';
import { matchResult, type IncomingToolResult, type ResultTarget } from './result-matcher.js';
import { isPlainObject } from './utils.js';

/**
 * One tool invocation within a turn, paired with its result once resolved
 */
export interface TurnToolCall {
  callId: string;
  name: string;
  args: Record<string, unknown> | null;
  result: string;
  error: string;
  latencyMs: number;
  roundIndex: number;
  resolved: boolean;
}

export type TurnTrace =
  | { available: true; calls: TurnToolCall[] }
  | { available: false };

export interface ParsedArgs {
  args: Record<string, unknown> | null;
  error?: string;
}

/**
 * Parse a raw argument payload. An empty payload is an empty argument map;
 * anything that is not a JSON object yields null args and an error.
 */
export function parseToolArgs(raw: ToolCallRequest['args']): ParsedArgs {
  if (raw === undefined || raw === '') {
    return { args: {} };
  }
  if (typeof raw !== 'string') {
    return { args: raw };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { args: null, error: err instanceof Error ? err.message : String(err) };
  }

  if (parsed === null) {
    return { args: {} };
  }
  if (!isPlainObject(parsed)) {
    return { args: null, error: 'arguments are not a JSON object' };
  }
  return { args: parsed };
}

export function toIncomingResult(payload: ToolResultPayload): IncomingToolResult {
  return {
    id: payload.id ?? '',
    name: payload.name,
    content: payload.content ?? '',
    error: payload.error ?? '',
    latencyMs: payload.latencyMs ?? 0,
  };
}

const turnCallTarget: ResultTarget<TurnToolCall> = {
  id: (call) => call.callId,
  name: (call) => call.name,
  isResolved: (call) => call.resolved,
  apply: (call, result) => {
    call.result = result.content;
    call.error = result.error;
    call.latencyMs = result.latencyMs;
    call.resolved = true;
  },
};

function isToolCallBatch(message: Message): boolean {
  return message.role === 'assistant' && (message.toolCalls?.length ?? 0) > 0;
}

function isToolResultMessage(
  message: Message
): message is Message & { toolResult: ToolResultPayload } {
  return message.role === 'tool' && message.toolResult !== undefined;
}

/**
 * Reconstruct the ordered, result-paired tool calls of a turn.
 *
 * Messages loaded from history are ignored. A batch of calls that follows a tool
 * result starts a new round; back-to-back batches share a round. Results that
 * match no call are dropped.
 */
export function buildTurnToolTrace(messages: readonly Message[]): TurnToolCall[] {
  const calls: TurnToolCall[] = [];
  let roundIndex = 0;
  let prevWasToolResult = false;

  for (const message of messages) {
    if (message.source === HISTORY_SOURCE) {
      continue;
    }

    if (isToolCallBatch(message)) {
      if (prevWasToolResult && calls.length > 0) {
        roundIndex++;
      }
      for (const request of message.toolCalls ?? []) {
        calls.push({
          callId: request.id ?? '',
          name: request.name,
          args: parseToolArgs(request.args).args,
          result: '',
          error: '',
          latencyMs: 0,
          roundIndex,
          resolved: false,
        });
      }
      prevWasToolResult = false;
    } else if (isToolResultMessage(message)) {
      matchResult(calls, toIncomingResult(message.toolResult), turnCallTarget);
      prevWasToolResult = true;
    } else {
      prevWasToolResult = false;
    }
  }

  return calls;
}

/**
 * Resolve the turn trace from host-injected context.
 * Absent turn messages mean this execution path exposes no tool data at all.
 */
export function resolveTurnToolTrace(context: TurnContext): TurnTrace {
  const messages = context._turn_messages;
  if (messages === undefined) {
    return { available: false };
  }
  return { available: true, calls: buildTurnToolTrace(messages) };
}

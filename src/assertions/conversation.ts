import type { CostInfo, Message } from '../types/message.js';
import { matchResult, type ResultTarget } from './result-matcher.js';
import { parseToolArgs, toIncomingResult } from './trace.js';

/**
 * One tool invocation across a whole conversation
 */
export interface ToolCallRecord {
  turnIndex: number;
  callId: string;
  toolName: string;
  args: Record<string, unknown> | null;
  result?: unknown;
  error: string;
  latencyMs: number;
  resolved: boolean;
}

export interface ConversationContext {
  allTurns: readonly Message[];
  toolCalls: ToolCallRecord[];
  metadata: Record<string, unknown>;
  cost: CostInfo;
}

// Message meta keys copied into the conversation metadata
const WORKFLOW_META_KEYS: ReadonlyArray<[string, string]> = [
  ['_workflow_state', 'workflow_state'],
  ['_workflow_transitions', 'workflow_transitions'],
  ['_workflow_complete', 'workflow_complete'],
];

const recordTarget: ResultTarget<ToolCallRecord> = {
  id: (record) => record.callId,
  name: (record) => record.toolName,
  isResolved: (record) => record.resolved,
  apply: (record, result) => {
    record.result = result.content;
    record.error = result.error;
    record.latencyMs = result.latencyMs;
    record.resolved = true;
  },
};

export function emptyCost(): CostInfo {
  return {
    inputTokens: 0,
    outputTokens: 0,
    cachedTokens: 0,
    inputCostUsd: 0,
    outputCostUsd: 0,
    cachedCostUsd: 0,
    totalCostUsd: 0,
  };
}

function addCost(total: CostInfo, cost: NonNullable<Message['costInfo']>): void {
  total.inputTokens += cost.inputTokens ?? 0;
  total.outputTokens += cost.outputTokens ?? 0;
  total.cachedTokens += cost.cachedTokens ?? 0;
  total.inputCostUsd += cost.inputCostUsd ?? 0;
  total.outputCostUsd += cost.outputCostUsd ?? 0;
  total.cachedCostUsd += cost.cachedCostUsd ?? 0;
  total.totalCostUsd += cost.totalCostUsd ?? 0;
}

/**
 * Aggregate a conversation's tool calls, costs and workflow metadata.
 *
 * Turns start at each user message. Results are paired across the whole
 * conversation with the same ID-first, name-fallback rule used for turns.
 */
export function buildConversationContext(
  messages: readonly Message[],
  extras: Record<string, unknown> = {}
): ConversationContext {
  const toolCalls: ToolCallRecord[] = [];
  const metadata: Record<string, unknown> = { ...extras };
  const cost = emptyCost();
  let turnIndex = 0;
  let seenUser = false;

  for (const message of messages) {
    if (message.role === 'user') {
      if (seenUser) turnIndex++;
      seenUser = true;
    }

    for (const request of message.toolCalls ?? []) {
      toolCalls.push({
        turnIndex,
        callId: request.id ?? '',
        toolName: request.name,
        args: parseToolArgs(request.args).args,
        error: '',
        latencyMs: 0,
        resolved: false,
      });
    }

    if (message.role === 'tool' && message.toolResult) {
      matchResult(toolCalls, toIncomingResult(message.toolResult), recordTarget);
    }

    if (message.costInfo) {
      addCost(cost, message.costInfo);
    }

    if (message.meta) {
      for (const [metaKey, extraKey] of WORKFLOW_META_KEYS) {
        if (metaKey in message.meta) {
          metadata[extraKey] = message.meta[metaKey];
        }
      }
    }
  }

  return { allTurns: messages, toolCalls, metadata, cost };
}

import { describe, it, expect } from 'vitest';
import { buildConversationContext, emptyCost } from './conversation.js';
import type { Message } from '../types/message.js';

const transcript: Message[] = [
  { role: 'system', content: 'You are a support agent.' },
  { role: 'user', content: 'Cancel order 12' },
  {
    role: 'assistant',
    toolCalls: [{ id: 'c1', name: 'get_order', args: '{"id":12}' }],
    costInfo: { inputTokens: 100, outputTokens: 20, totalCostUsd: 0.01 },
  },
  { role: 'tool', toolResult: { id: 'c1', name: 'get_order', content: 'status: shipped' } },
  {
    role: 'assistant',
    content: 'It has already shipped.',
    costInfo: { inputTokens: 150, outputTokens: 30, totalCostUsd: 0.02 },
    meta: { _workflow_state: 'triage', _workflow_transitions: ['intake', 'triage'] },
  },
  { role: 'user', content: 'Then refund it' },
  { role: 'assistant', toolCalls: [{ name: 'refund', args: { order: 12 } }] },
  { role: 'tool', toolResult: { name: 'refund', error: 'refund window closed' } },
  {
    role: 'assistant',
    content: 'Sorry, I cannot refund it.',
    meta: {
      _workflow_state: 'closed',
      _workflow_transitions: ['intake', 'triage', 'closed'],
      _workflow_complete: true,
    },
  },
];

describe('buildConversationContext', () => {
  it('tags each call with the user turn it belongs to', () => {
    const context = buildConversationContext(transcript);
    expect(context.toolCalls.map((r) => [r.toolName, r.turnIndex])).toEqual([
      ['get_order', 0],
      ['refund', 1],
    ]);
  });

  it('resolves results across the whole conversation', () => {
    const [order, refund] = buildConversationContext(transcript).toolCalls;
    expect(order).toMatchObject({ callId: 'c1', args: { id: 12 }, result: 'status: shipped', resolved: true });
    expect(refund).toMatchObject({ args: { order: 12 }, error: 'refund window closed', resolved: true });
  });

  it('sums costs over messages that report them', () => {
    const { cost } = buildConversationContext(transcript);
    expect(cost.inputTokens).toBe(250);
    expect(cost.outputTokens).toBe(50);
    expect(cost.cachedTokens).toBe(0);
    expect(cost.totalCostUsd).toBeCloseTo(0.03);
  });

  it('keeps the last workflow metadata written', () => {
    const { metadata } = buildConversationContext(transcript);
    expect(metadata).toEqual({
      workflow_state: 'closed',
      workflow_transitions: ['intake', 'triage', 'closed'],
      workflow_complete: true,
    });
  });

  it('merges caller metadata', () => {
    const { metadata } = buildConversationContext([], { run_id: 'r-1' });
    expect(metadata).toEqual({ run_id: 'r-1' });
  });

  it('returns zero cost and no calls for an empty conversation', () => {
    const context = buildConversationContext([]);
    expect(context.toolCalls).toEqual([]);
    expect(context.cost).toEqual(emptyCost());
    expect(context.allTurns).toEqual([]);
  });

  it('counts calls made before the first user message in turn 0', () => {
    const context = buildConversationContext([
      { role: 'assistant', toolCalls: [{ name: 'warmup' }] },
      { role: 'user', content: 'hi' },
      { role: 'assistant', toolCalls: [{ name: 'greet' }] },
    ]);
    expect(context.toolCalls.map((r) => r.turnIndex)).toEqual([0, 0]);
  });
});

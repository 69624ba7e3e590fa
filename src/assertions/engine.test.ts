import { describe, it, expect } from 'vitest';
import { createRegistry } from './registry.js';
import { evaluateTurnAssertions, evaluateConversationAssertions } from './engine.js';
import { buildConversationContext } from './conversation.js';
import { pass } from './types.js';
import type { Message } from '../types/message.js';

const turn: Message[] = [
  { role: 'user', content: 'status of order 42?' },
  { role: 'assistant', toolCalls: [{ id: 'c1', name: 'get_order', args: '{"id":42}' }] },
  { role: 'tool', toolResult: { id: 'c1', name: 'get_order', content: '{"status":"shipped"}' } },
  { role: 'assistant', content: 'Order 42 has shipped.' },
];

describe('createRegistry', () => {
  it('registers tool checks at both levels and level-specific validators at one', () => {
    const { turn: turnTypes, conversation } = createRegistry().types();
    expect(turnTypes).toContain('tool_call_chain');
    expect(conversation).toContain('tool_call_chain');
    expect(turnTypes).toContain('latency_budget');
    expect(conversation).not.toContain('latency_budget');
    expect(conversation).toContain('state_is');
    expect(turnTypes).not.toContain('state_is');
  });

  it('knows registered types', () => {
    const registry = createRegistry();
    expect(registry.has('llm_judge_session')).toBe(true);
    expect(registry.has('no_such_check')).toBe(false);
  });

  it('builds a validator that reports an unknown type', async () => {
    const result = await createRegistry().createTurn('no_such_check', {}).validate('', {});
    expect(result).toEqual({
      passed: false,
      message: 'Unknown turn assertion type "no_such_check"',
      details: { type: 'no_such_check', error: 'unknown_assertion_type' },
    });
  });

  it('does not resolve turn-only types at conversation level', async () => {
    const validator = createRegistry().createConversation('content_includes', { patterns: ['x'] });
    const result = await validator.validateConversation(buildConversationContext([]));
    expect(result.details.error).toBe('unknown_assertion_type');
  });

  it('accepts custom validators', async () => {
    const registry = createRegistry();
    registry.registerTurn('always_ok', () => ({ type: 'always_ok', validate: () => pass() }));
    expect(registry.has('always_ok')).toBe(true);
    expect((await registry.createTurn('always_ok').validate('', {})).passed).toBe(true);
  });
});

describe('evaluateTurnAssertions', () => {
  it('returns every outcome, including skipped ones', async () => {
    const debug: string[] = [];
    const evaluation = await evaluateTurnAssertions(
      createRegistry(),
      [
        { type: 'tool_result_includes', params: { tool: 'get_order', patterns: ['shipped'] } },
        { type: 'content_includes', params: { patterns: ['42'] } },
      ],
      'Order 42 has shipped.',
      { _turn_messages: turn },
      { onDebug: (msg) => debug.push(msg) }
    );

    expect(evaluation.passed).toBe(true);
    expect(evaluation.results.map((r) => [r.type, r.passed])).toEqual([
      ['tool_result_includes', true],
      ['content_includes', true],
    ]);
    expect(debug).toEqual([
      '[Assert] tool_result_includes: passed',
      '[Assert] content_includes: passed',
    ]);
  });

  it('skips without a trace, then fails with one and keeps the label', async () => {
    const evaluation = await evaluateTurnAssertions(
      createRegistry(),
      [
        { type: 'tools_called', params: { tools: ['cancel_order'] }, message: 'must cancel' },
        { type: 'tool_call_count', params: { min: 999 } },
      ],
      '',
      {}
    );

    expect(evaluation.passed).toBe(true);
    expect(evaluation.results.every((r) => r.skipped)).toBe(true);

    const withTrace = await evaluateTurnAssertions(
      createRegistry(),
      [{ type: 'tools_called', params: { tools: ['cancel_order'] }, message: 'must cancel' }],
      '',
      { _turn_messages: turn }
    );
    expect(withTrace.passed).toBe(false);
    expect(withTrace.results[0]).toMatchObject({
      type: 'tools_called',
      label: 'must cancel',
      passed: false,
      message: 'Expected tools not called: cancel_order',
    });
  });
});

describe('evaluateConversationAssertions', () => {
  it('runs conversation validators over the whole transcript', async () => {
    const evaluation = await evaluateConversationAssertions(
      createRegistry(),
      [
        { type: 'tool_call_count', params: { tool: 'get_order', min: 1, max: 1 } },
        { type: 'workflow_complete', params: {} },
      ],
      buildConversationContext(turn)
    );

    expect(evaluation.passed).toBe(false);
    expect(evaluation.results.map((r) => r.passed)).toEqual([true, false]);
  });
});

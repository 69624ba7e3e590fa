import { describe, it, expect } from 'vitest';
import {
  countWithBounds,
  collectToolErrors,
  resultIncludes,
  resultMatches,
  subsequence,
  dependencyChain,
  stepViolations,
  type ChainStep,
} from './matchers.js';
import type { ToolCallView } from './view.js';

const view = (name: string, overrides: Partial<ToolCallView> = {}): ToolCallView => ({
  name,
  args: {},
  result: '',
  error: '',
  index: 0,
  ...overrides,
});

const step = (tool: string, overrides: Partial<ChainStep> = {}): ChainStep => ({
  tool,
  resultIncludes: [],
  argsMatch: {},
  noError: false,
  ...overrides,
});

describe('countWithBounds', () => {
  const views = [view('search'), view('search'), view('fetch')];

  it('counts calls of one tool', () => {
    expect(countWithBounds(views, 'search', undefined, undefined)).toEqual({ count: 2 });
  });

  it('counts every call when no tool is given', () => {
    expect(countWithBounds(views, undefined, 4, undefined)).toEqual({
      count: 3,
      violation: 'expected at least 4 call(s) to any tool, got 3',
    });
  });

  it('treats zero as a real upper bound', () => {
    expect(countWithBounds(views, 'fetch', undefined, 0)).toEqual({
      count: 1,
      violation: 'expected at most 0 call(s) to "fetch", got 1',
    });
  });

  it('passes when no bound is set', () => {
    expect(countWithBounds([], 'missing', undefined, undefined).violation).toBeUndefined();
  });
});

describe('collectToolErrors', () => {
  const views = [view('a', { error: 'timeout' }), view('b'), view('c', { error: 'denied' })];

  it('returns every erroring call', () => {
    expect(collectToolErrors(views).map((v) => v.name)).toEqual(['a', 'c']);
  });

  it('scopes to the given tools', () => {
    expect(collectToolErrors(views, ['c']).map((v) => v.name)).toEqual(['c']);
  });
});

describe('resultIncludes', () => {
  it('requires every pattern, case-insensitively', () => {
    const outcome = resultIncludes(
      [view('get_order', { result: 'Order SHIPPED via DHL' }), view('get_order', { result: 'pending' })],
      'get_order',
      ['shipped', 'dhl']
    );
    expect(outcome.matchCount).toBe(1);
    expect(outcome.checked).toBe(2);
    expect(outcome.misses).toEqual([
      { tool: 'get_order', index: 0, position: 1, missing_patterns: ['shipped', 'dhl'] },
    ]);
  });

  it('ignores calls of other tools', () => {
    const outcome = resultIncludes([view('other', { result: 'shipped' })], 'get_order', ['shipped']);
    expect(outcome).toEqual({ matchCount: 0, checked: 0, misses: [] });
  });
});

describe('resultMatches', () => {
  it('is case-sensitive by default', () => {
    const outcome = resultMatches([view('t', { result: 'Status: OK' })], undefined, 'ok');
    expect(outcome).toMatchObject({ ok: true, matchCount: 0, checked: 1 });
  });

  it('accepts flags in /pattern/flags form', () => {
    const outcome = resultMatches([view('t', { result: 'Status: OK' })], undefined, '/ok/i');
    expect(outcome).toMatchObject({ ok: true, matchCount: 1 });
  });

  it('counts every matching result with the g flag', () => {
    const outcome = resultMatches(
      [view('search', { result: 'ORD-1' }), view('search', { result: 'ORD-2' })],
      'search',
      '/ORD-\\d/g'
    );
    expect(outcome).toEqual({ ok: true, matchCount: 2, checked: 2, misses: [] });
  });

  it('reports an invalid expression as an error', () => {
    const outcome = resultMatches([view('t')], undefined, '(unclosed');
    expect(outcome.ok).toBe(false);
  });
});

describe('subsequence', () => {
  it('skips calls that are not the next expected name', () => {
    const outcome = subsequence(
      [view('auth'), view('log'), view('search'), view('log'), view('book')],
      ['auth', 'search', 'book']
    );
    expect(outcome).toEqual({ matched: 3, actual: ['auth', 'log', 'search', 'log', 'book'] });
  });

  it('stops short when the order is wrong', () => {
    expect(subsequence([view('book'), view('search')], ['search', 'book']).matched).toBe(1);
  });

  it('matches an empty sequence', () => {
    expect(subsequence([view('x')], []).matched).toBe(0);
  });
});

describe('stepViolations', () => {
  it('reports violations in check order', () => {
    const violations = stepViolations(
      view('pay', { error: 'boom', result: 'nothing', args: { amount: 5 } }),
      step('pay', {
        noError: true,
        resultIncludes: ['receipt'],
        resultMatches: '^ok',
        argsMatch: { amount: '^\\d{2,}$', currency: 'EUR' },
      })
    );
    expect(violations.map((v) => v.kind)).toEqual([
      'tool_error',
      'result_missing_pattern',
      'result_pattern_mismatch',
      'argument_pattern_mismatch',
      'missing_argument',
    ]);
  });

  it('matches nested arguments with dot notation', () => {
    const violations = stepViolations(
      view('ship', { args: { address: { country: 'FR' } } }),
      step('ship', { argsMatch: { 'address.country': '^FR$' } })
    );
    expect(violations).toEqual([]);
  });

  it('matches an argument whose key contains a dot', () => {
    const violations = stepViolations(
      view('ship', { args: { 'user.id': '42' } }),
      step('ship', { argsMatch: { 'user.id': '^42$' } })
    );
    expect(violations).toEqual([]);
  });

  it('reports unparseable arguments when argument patterns are set', () => {
    const violations = stepViolations(view('ship', { args: null }), step('ship', { argsMatch: { a: 'x' } }));
    expect(violations).toEqual([{ kind: 'invalid_args_json' }]);
  });

  it('ignores unparseable arguments when no argument pattern is set', () => {
    expect(stepViolations(view('ship', { args: null }), step('ship'))).toEqual([]);
  });
});

describe('dependencyChain', () => {
  it('completes when every step is satisfied in order', () => {
    const outcome = dependencyChain(
      [view('login', { result: 'token' }), view('noise'), view('fetch')],
      [step('login', { resultIncludes: ['token'] }), step('fetch')]
    );
    expect(outcome).toEqual({ status: 'complete', completedSteps: 2, totalSteps: 2 });
  });

  it('passes with no steps', () => {
    expect(dependencyChain([view('x')], [])).toEqual({ status: 'complete', completedSteps: 0, totalSteps: 0 });
  });

  it('reports the next step when the chain is incomplete', () => {
    const outcome = dependencyChain([view('login')], [step('login'), step('fetch')]);
    expect(outcome).toEqual({ status: 'incomplete', completedSteps: 1, totalSteps: 2, nextTool: 'fetch' });
  });

  it('aborts on the first violating call of the current step', () => {
    const outcome = dependencyChain(
      [view('A', { error: 'failed' }), view('A'), view('B')],
      [step('A', { noError: true }), step('B')]
    );
    expect(outcome).toEqual({
      status: 'violation',
      completedSteps: 0,
      totalSteps: 2,
      stepIndex: 0,
      tool: 'A',
      position: 0,
      violation: { kind: 'tool_error', error: 'failed' },
    });
  });

  it('only checks calls of the current step tool', () => {
    const outcome = dependencyChain(
      [view('B', { error: 'early' }), view('A'), view('B')],
      [step('A'), step('B', { noError: true })]
    );
    expect(outcome.status).toBe('complete');
  });
});

import type { AssertionConfig } from '../types/config.js';
import type { ConversationContext } from './conversation.js';
import type { ValidatorRegistry } from './registry.js';
import type { TurnContext, ValidationResult } from './types.js';

export interface AssertionOutcome extends ValidationResult {
  type: string;
  /** Custom failure message from the assertion config, if any */
  label?: string;
}

export interface EvaluationResult {
  passed: boolean;
  results: AssertionOutcome[];
}

export interface EvaluateOptions {
  onDebug?: (message: string) => void;
}

function toOutcome(assertion: AssertionConfig, result: ValidationResult): AssertionOutcome {
  return { type: assertion.type, label: assertion.message, ...result };
}

function summarize(results: AssertionOutcome[]): EvaluationResult {
  return { passed: results.every((r) => r.passed), results };
}

function describe(outcome: AssertionOutcome): string {
  if (outcome.skipped) return 'skipped';
  return outcome.passed ? 'passed' : `failed: ${outcome.message ?? ''}`;
}

/**
 * Evaluate turn-level assertions against one assistant response
 */
export async function evaluateTurnAssertions(
  registry: ValidatorRegistry,
  assertions: readonly AssertionConfig[],
  content: string,
  context: TurnContext,
  options: EvaluateOptions = {}
): Promise<EvaluationResult> {
  const debug = options.onDebug ?? (() => {});
  const results: AssertionOutcome[] = [];

  for (const assertion of assertions) {
    const validator = registry.createTurn(assertion.type, assertion.params);
    const outcome = toOutcome(assertion, await validator.validate(content, context));
    debug(`[Assert] ${assertion.type}: ${describe(outcome)}`);
    results.push(outcome);
  }

  return summarize(results);
}

/**
 * Evaluate conversation-level assertions against the whole transcript
 */
export async function evaluateConversationAssertions(
  registry: ValidatorRegistry,
  assertions: readonly AssertionConfig[],
  conversation: ConversationContext,
  options: EvaluateOptions = {}
): Promise<EvaluationResult> {
  const debug = options.onDebug ?? (() => {});
  const results: AssertionOutcome[] = [];

  for (const assertion of assertions) {
    const validator = registry.createConversation(assertion.type, assertion.params);
    const outcome = toOutcome(assertion, await validator.validateConversation(conversation));
    debug(`[Assert] ${assertion.type} (conversation): ${describe(outcome)}`);
    results.push(outcome);
  }

  return summarize(results);
}

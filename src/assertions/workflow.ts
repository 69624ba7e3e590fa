import type { z } from 'zod';
import type { ConversationContext } from './conversation.js';
import {
  parseParams,
  WorkflowStateParamsSchema,
  WorkflowCompleteParamsSchema,
  type ParsedParams,
} from './params.js';
import { pass, fail, type ConversationValidator, type ValidationResult } from './types.js';

function currentState(conversation: ConversationContext): string | undefined {
  const state = conversation.metadata.workflow_state;
  return typeof state === 'string' ? state : undefined;
}

function transitions(conversation: ConversationContext): string[] {
  const value = conversation.metadata.workflow_transitions;
  return Array.isArray(value) ? value.filter((s): s is string => typeof s === 'string') : [];
}

/**
 * The workflow must end in the given state
 */
export class StateIsValidator implements ConversationValidator {
  readonly type = 'state_is';
  private readonly parsed: ParsedParams<{ state: string }>;

  constructor(params: Record<string, unknown> = {}) {
    this.parsed = parseParams(this.type, WorkflowStateParamsSchema, params);
  }

  validateConversation(conversation: ConversationContext): ValidationResult {
    if (!this.parsed.ok) return this.parsed.result;
    const expected = this.parsed.value.state;
    const actual = currentState(conversation);

    return actual === expected
      ? pass({ expected_state: expected, actual_state: actual })
      : fail(`Expected workflow state "${expected}", got ${actual ? `"${actual}"` : 'none'}`, {
          expected_state: expected,
          actual_state: actual ?? null,
        });
  }
}

/**
 * The workflow must have passed through the given state at some point
 */
export class TransitionedToValidator implements ConversationValidator {
  readonly type = 'transitioned_to';
  private readonly parsed: ParsedParams<{ state: string }>;

  constructor(params: Record<string, unknown> = {}) {
    this.parsed = parseParams(this.type, WorkflowStateParamsSchema, params);
  }

  validateConversation(conversation: ConversationContext): ValidationResult {
    if (!this.parsed.ok) return this.parsed.result;
    const expected = this.parsed.value.state;
    const history = transitions(conversation);
    const details = { expected_state: expected, transitions: history };

    return history.includes(expected)
      ? pass(details)
      : fail(`Workflow never transitioned to "${expected}"`, details);
  }
}

export class WorkflowCompleteValidator implements ConversationValidator {
  readonly type = 'workflow_complete';
  private readonly parsed: ParsedParams<z.infer<typeof WorkflowCompleteParamsSchema>>;

  constructor(params: Record<string, unknown> = {}) {
    this.parsed = parseParams(this.type, WorkflowCompleteParamsSchema, params);
  }

  validateConversation(conversation: ConversationContext): ValidationResult {
    if (!this.parsed.ok) return this.parsed.result;
    const complete = conversation.metadata.workflow_complete === true;
    const details = { workflow_complete: complete, workflow_state: currentState(conversation) ?? null };

    return complete ? pass(details) : fail('Workflow did not complete', details);
  }
}

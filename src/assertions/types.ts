import type { Message } from '../types/message.js';
import type { ConversationContext } from './conversation.js';

export type ValidationDetails = Record<string, unknown>;

export interface ValidationResult {
  passed: boolean;
  skipped?: boolean;
  message?: string;
  details: ValidationDetails;
}

/**
 * Configuration mistakes, reported separately from behavioral mismatches
 */
export type ConfigErrorKind =
  | 'invalid_params'
  | 'invalid_regex'
  | 'invalid_args_json'
  | 'judge_not_configured'
  | 'judge_error'
  | 'unknown_assertion_type';

/**
 * Runtime inputs injected by the host next to a turn's content
 */
export interface TurnContext {
  _turn_messages?: readonly Message[];
  _execution_context_messages?: readonly Message[];
  _metadata?: Record<string, unknown>;
}

export interface Validator {
  readonly type: string;
  validate(
    content: string,
    context: TurnContext
  ): ValidationResult | Promise<ValidationResult>;
}

export interface ConversationValidator {
  readonly type: string;
  validateConversation(
    conversation: ConversationContext
  ): ValidationResult | Promise<ValidationResult>;
}

export function pass(details: ValidationDetails = {}, message?: string): ValidationResult {
  return { passed: true, message, details };
}

export function fail(message: string, details: ValidationDetails = {}): ValidationResult {
  return { passed: false, message, details };
}

export function skip(reason: string): ValidationResult {
  return {
    passed: true,
    skipped: true,
    message: `skipped: ${reason}`,
    details: { skip_reason: reason },
  };
}

export function configError(
  kind: ConfigErrorKind,
  message: string,
  details: ValidationDetails = {}
): ValidationResult {
  return {
    passed: false,
    message,
    details: { ...details, error: kind },
  };
}

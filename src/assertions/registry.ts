import type { Judge } from '../judge/types.js';
import { TOOL_CHECKS } from './tools.js';
import { TurnToolValidator } from './turn-validators.js';
import { ConversationToolValidator } from './conversation-validators.js';
import { LatencyBudgetValidator } from './timing.js';
import {
  ContentIncludesValidator,
  ContentExcludesValidator,
  ContentMatchesValidator,
} from './text.js';
import { StateIsValidator, TransitionedToValidator, WorkflowCompleteValidator } from './workflow.js';
import { LLMJudgeValidator, LLMJudgeSessionValidator } from './judge.js';
import {
  configError,
  type ConversationValidator,
  type ValidationResult,
  type Validator,
} from './types.js';

export type ValidatorParams = Record<string, unknown>;
export type TurnValidatorFactory = (params: ValidatorParams) => Validator;
export type ConversationValidatorFactory = (params: ValidatorParams) => ConversationValidator;

export interface ValidatorRegistry {
  has(type: string): boolean;
  types(): { turn: string[]; conversation: string[] };
  createTurn(type: string, params?: ValidatorParams): Validator;
  createConversation(type: string, params?: ValidatorParams): ConversationValidator;
  registerTurn(type: string, factory: TurnValidatorFactory): void;
  registerConversation(type: string, factory: ConversationValidatorFactory): void;
}

export interface RegistryOptions {
  judge?: Judge;
}

/**
 * Validator for an unregistered type; always reports unknown_assertion_type
 */
class UnknownAssertionValidator implements Validator, ConversationValidator {
  constructor(
    readonly type: string,
    private readonly level: 'turn' | 'conversation'
  ) {}

  private result(): ValidationResult {
    return configError(
      'unknown_assertion_type',
      `Unknown ${this.level} assertion type "${this.type}"`,
      { type: this.type }
    );
  }

  validate(): ValidationResult {
    return this.result();
  }

  validateConversation(): ValidationResult {
    return this.result();
  }
}

export function createRegistry(options: RegistryOptions = {}): ValidatorRegistry {
  const { judge } = options;
  const turn = new Map<string, TurnValidatorFactory>();
  const conversation = new Map<string, ConversationValidatorFactory>();

  for (const [type, factory] of Object.entries(TOOL_CHECKS)) {
    turn.set(type, (params) => new TurnToolValidator(type, factory, params));
    conversation.set(type, (params) => new ConversationToolValidator(type, factory, params));
  }

  turn.set('latency_budget', (params) => new LatencyBudgetValidator(params));
  turn.set('content_includes', (params) => new ContentIncludesValidator(params));
  turn.set('content_excludes', (params) => new ContentExcludesValidator(params));
  turn.set('content_matches', (params) => new ContentMatchesValidator(params));
  turn.set('llm_judge', (params) => new LLMJudgeValidator(params, judge));

  conversation.set('state_is', (params) => new StateIsValidator(params));
  conversation.set('transitioned_to', (params) => new TransitionedToValidator(params));
  conversation.set('workflow_complete', (params) => new WorkflowCompleteValidator(params));
  conversation.set('llm_judge_session', (params) => new LLMJudgeSessionValidator(params, judge));

  return {
    has: (type) => turn.has(type) || conversation.has(type),
    types: () => ({
      turn: [...turn.keys()].sort(),
      conversation: [...conversation.keys()].sort(),
    }),
    createTurn: (type, params = {}) => {
      const factory = turn.get(type);
      return factory ? factory(params) : new UnknownAssertionValidator(type, 'turn');
    },
    createConversation: (type, params = {}) => {
      const factory = conversation.get(type);
      return factory ? factory(params) : new UnknownAssertionValidator(type, 'conversation');
    },
    registerTurn: (type, factory) => {
      turn.set(type, factory);
    },
    registerConversation: (type, factory) => {
      conversation.set(type, factory);
    },
  };
}

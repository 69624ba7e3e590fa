import type { ConversationContext } from './conversation.js';
import { viewsFromRecords } from './view.js';
import type { ToolCheck, ToolCheckFactory } from './tools.js';
import type { ConversationValidator, ValidationResult } from './types.js';

/**
 * Runs a tool check against every tool call of the conversation
 */
export class ConversationToolValidator implements ConversationValidator {
  readonly type: string;
  private readonly check: ToolCheck;

  constructor(type: string, factory: ToolCheckFactory, params: Record<string, unknown> = {}) {
    this.type = type;
    this.check = factory(params);
  }

  validateConversation(conversation: ConversationContext): ValidationResult {
    return this.check(viewsFromRecords(conversation.toolCalls));
  }
}

import type { Judge, JudgeRequest, JudgeVerdict } from '../judge/types.js';
import type { Message } from '../types/message.js';
import type { ConversationContext } from './conversation.js';
import { parseParams, JudgeParamsSchema, type JudgeParams, type ParsedParams } from './params.js';
import {
  pass,
  fail,
  configError,
  type ConversationValidator,
  type TurnContext,
  type ValidationResult,
  type Validator,
} from './types.js';

/**
 * With min_score the score decides (a missing score fails); otherwise the verdict does
 */
export function verdictPasses(verdict: JudgeVerdict, minScore: number | undefined): boolean {
  if (minScore === undefined) return verdict.passed;
  return verdict.score !== undefined && verdict.score >= minScore;
}

/**
 * Plain-text rendering of a conversation for the judge
 */
export function renderTranscript(messages: readonly Message[]): string {
  const lines: string[] = [];
  for (const message of messages) {
    const result = message.toolResult;
    if (result) {
      lines.push(result.error ? `tool: [error] ${result.error}` : `tool: ${result.content ?? ''}`);
      continue;
    }
    if (message.content) {
      lines.push(`${message.role}: ${message.content}`);
    }
    for (const call of message.toolCalls ?? []) {
      const args = typeof call.args === 'string' ? call.args : JSON.stringify(call.args ?? {});
      lines.push(`${message.role}: [tool call] ${call.name}(${args})`);
    }
  }
  return lines.join('\n');
}

async function runJudge(
  judge: Judge | undefined,
  type: string,
  params: JudgeParams,
  request: Omit<JudgeRequest, 'criteria' | 'rubric'>
): Promise<ValidationResult> {
  if (!judge) {
    return configError('judge_not_configured', `"${type}" requires a judge; none is configured`);
  }

  let verdict: JudgeVerdict;
  try {
    verdict = await judge.evaluate({ ...request, criteria: params.criteria, rubric: params.rubric });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return configError('judge_error', `Judge failed: ${reason}`, { reason });
  }

  const details = {
    criteria: params.criteria,
    score: verdict.score ?? null,
    min_score: params.min_score ?? null,
    reasoning: verdict.reasoning ?? '',
  };
  if (verdictPasses(verdict, params.min_score)) {
    return pass(details);
  }
  const scoreNote =
    params.min_score === undefined
      ? ''
      : ` (score ${verdict.score ?? 'missing'}, required ${params.min_score})`;
  return fail(`Judge rejected: ${params.criteria}${scoreNote}`, details);
}

/**
 * Asks the judge whether a turn's response meets the criteria
 */
export class LLMJudgeValidator implements Validator {
  readonly type = 'llm_judge';
  private readonly parsed: ParsedParams<JudgeParams>;

  constructor(
    params: Record<string, unknown> = {},
    private readonly judge?: Judge
  ) {
    this.parsed = parseParams(this.type, JudgeParamsSchema, params);
  }

  async validate(content: string, context: TurnContext): Promise<ValidationResult> {
    if (!this.parsed.ok) return this.parsed.result;
    return runJudge(this.judge, this.type, this.parsed.value, {
      scope: 'turn',
      content,
      messages: context._turn_messages ?? [],
    });
  }
}

export class LLMJudgeSessionValidator implements ConversationValidator {
  readonly type = 'llm_judge_session';
  private readonly parsed: ParsedParams<JudgeParams>;

  constructor(
    params: Record<string, unknown> = {},
    private readonly judge?: Judge
  ) {
    this.parsed = parseParams(this.type, JudgeParamsSchema, params);
  }

  async validateConversation(conversation: ConversationContext): Promise<ValidationResult> {
    if (!this.parsed.ok) return this.parsed.result;
    return runJudge(this.judge, this.type, this.parsed.value, {
      scope: 'conversation',
      content: renderTranscript(conversation.allTurns),
      messages: conversation.allTurns,
    });
  }
}

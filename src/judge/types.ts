import { z } from 'zod';
import type { Message } from '../types/message.js';

export interface JudgeRequest {
  scope: 'turn' | 'conversation';
  criteria: string;
  rubric?: string;
  /** The assistant response for a turn, or the rendered transcript for a conversation */
  content: string;
  messages: readonly Message[];
}

export const JudgeVerdictSchema = z.object({
  passed: z.boolean(),
  score: z.number().min(0).max(1).optional(),
  reasoning: z.string().optional(),
});

export type JudgeVerdict = z.infer<typeof JudgeVerdictSchema>;

/**
 * Scores a response or a whole conversation against free-form criteria
 */
export interface Judge {
  evaluate(request: JudgeRequest): Promise<JudgeVerdict>;
}

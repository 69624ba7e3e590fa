import { z } from "zod";

const ToolCallRequestSchema = z.object({
  id: z.string().default(""),
  name: z.string(),
  // Raw payload: a JSON string as emitted by the provider, or an already-parsed object
  args: z.union([z.string(), z.record(z.unknown())]).optional(),
});

const ToolResultPayloadSchema = z.object({
  id: z.string().default(""),
  name: z.string(),
  content: z.string().default(""),
  error: z.string().default(""),
  latencyMs: z.number().default(0),
});

const CostInfoSchema = z.object({
  inputTokens: z.number().default(0),
  outputTokens: z.number().default(0),
  cachedTokens: z.number().default(0),
  inputCostUsd: z.number().default(0),
  outputCostUsd: z.number().default(0),
  cachedCostUsd: z.number().default(0),
  totalCostUsd: z.number().default(0),
});

export const MessageSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string().default(""),
  toolCalls: z.array(ToolCallRequestSchema).optional(),
  toolResult: ToolResultPayloadSchema.optional(),
  source: z.string().optional(),
  timestamp: z.string().optional(),
  latencyMs: z.number().optional(),
  costInfo: CostInfoSchema.optional(),
  meta: z.record(z.unknown()).optional(),
});

export type ToolCallRequest = z.input<typeof ToolCallRequestSchema>;
export type ToolResultPayload = z.input<typeof ToolResultPayloadSchema>;
export type CostInfo = z.infer<typeof CostInfoSchema>;
export type Message = z.input<typeof MessageSchema>;
export type MessageRole = Message["role"];

/** Messages carrying this source were loaded from persisted history, not produced this turn. */
export const HISTORY_SOURCE = "statestore";

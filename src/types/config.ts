import { z } from "zod";

// One assertion: a validator type plus its raw params, checked by the validator itself
export const AssertionConfigSchema = z
  .object({
    type: z.string().min(1),
    params: z.record(z.unknown()).default({}),
    message: z.string().optional(),
  })
  .strict();

export const JudgeConfigSchema = z
  .object({
    cmd: z.array(z.string()).min(1),
    timeout_ms: z.number().positive().optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    version: z.string().default("1.0"),
    judge: JudgeConfigSchema.optional(),
    assert: z.array(AssertionConfigSchema).default([]),
    conversation_assert: z.array(AssertionConfigSchema).default([]),
  })
  .strict();

// Type exports
export type AssertionConfig = z.infer<typeof AssertionConfigSchema>;
export type JudgeConfig = z.infer<typeof JudgeConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

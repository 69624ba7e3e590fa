import { z } from "zod";
import { AssertionConfigSchema } from "./config.js";

const TurnAssertSchema = z
  .object({
    index: z.number().int().nonnegative(),
    assert: z.array(AssertionConfigSchema).default([]),
  })
  .strict();

export const SuiteFileSchema = z
  .object({
    version: z.string(),
    name: z.string(),
    // Relative to the suite file
    transcript: z.string().optional(),
    vars: z.record(z.string()).optional(),
    assert: z.array(AssertionConfigSchema).default([]),
    turns: z.array(TurnAssertSchema).default([]),
    conversation_assert: z.array(AssertionConfigSchema).default([]),
  })
  .strict();

export type SuiteFile = z.infer<typeof SuiteFileSchema>;
export type TurnAssert = z.infer<typeof TurnAssertSchema>;

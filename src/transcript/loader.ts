import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import { z } from 'zod';
import { MessageSchema, type Message } from '../types/message.js';

const TranscriptDocumentSchema = z.union([
  z.array(MessageSchema),
  z.object({
    messages: z.array(MessageSchema),
    metadata: z.record(z.unknown()).optional(),
  }),
]);

export interface Transcript {
  messages: Message[];
  metadata: Record<string, unknown>;
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

function parseJsonl(content: string, filePath: string): Transcript {
  const messages: Message[] = [];
  const lines = content.split('\n');

  for (const [i, line] of lines.entries()) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      throw new Error(`Invalid JSON on line ${i + 1} of ${filePath}`);
    }
    const result = MessageSchema.safeParse(raw);
    if (!result.success) {
      throw new Error(`Invalid message on line ${i + 1} of ${filePath}:\n${formatIssues(result.error)}`);
    }
    messages.push(result.data);
  }

  return { messages, metadata: {} };
}

function parseJson(content: string, filePath: string): Transcript {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new Error(`Transcript is not valid JSON: ${filePath}`);
  }

  const result = TranscriptDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid transcript ${filePath}:\n${formatIssues(result.error)}`);
  }
  const doc = result.data;
  return Array.isArray(doc)
    ? { messages: doc, metadata: {} }
    : { messages: doc.messages, metadata: doc.metadata ?? {} };
}

/**
 * Load a recorded conversation: a .json array or { messages, metadata } document,
 * or .jsonl with one message per line
 */
export async function loadTranscript(filePath: string): Promise<Transcript> {
  if (!existsSync(filePath)) {
    throw new Error(`Transcript not found: ${filePath}`);
  }

  const content = await readFile(filePath, 'utf-8');
  return extname(filePath) === '.jsonl'
    ? parseJsonl(content, filePath)
    : parseJson(content, filePath);
}

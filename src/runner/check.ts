import type { AssertionConfig, CostInfo, Message, SuiteFile } from "../types/index.js";
import type { Transcript } from "../transcript/index.js";
import {
  buildConversationContext,
  emptyCost,
  evaluateTurnAssertions,
  evaluateConversationAssertions,
  type AssertionOutcome,
  type EvaluationResult,
  type ValidatorRegistry,
} from "../assertions/index.js";
import { mergeAssertions } from "./merge.js";

export interface AssertionDefaults {
  assert?: readonly AssertionConfig[];
  conversation_assert?: readonly AssertionConfig[];
}

export interface SuiteRunnerOptions {
  suite: SuiteFile;
  transcript: Transcript;
  registry: ValidatorRegistry;
  defaults?: AssertionDefaults;
  verbose?: boolean;
  failFast?: boolean;
  onLog?: (message: string) => void;
  onDebug?: (message: string) => void;
}

export interface RecordedOutcome extends AssertionOutcome {
  /** null for conversation-level assertions */
  turnIndex: number | null;
}

export interface SuiteResult {
  suiteName: string;
  passed: boolean;
  failures: string[];
  outcomes: RecordedOutcome[];
  turnCount: number;
  cost: CostInfo;
  error?: string;
}

/**
 * Split a transcript into turns. Each user message opens a new turn;
 * anything before the first user message belongs to turn 0.
 */
export function splitTurns(messages: readonly Message[]): Message[][] {
  const turns: Message[][] = [];
  let current: Message[] = [];
  let seenUser = false;

  for (const message of messages) {
    if (message.role === "user") {
      if (seenUser) {
        turns.push(current);
        current = [];
      }
      seenUser = true;
    }
    current.push(message);
  }
  if (current.length > 0) {
    turns.push(current);
  }
  return turns;
}

function lastAssistantMessage(turn: readonly Message[]): Message | undefined {
  for (let i = turn.length - 1; i >= 0; i--) {
    if (turn[i].role === "assistant") return turn[i];
  }
  return undefined;
}

export function formatFailure(outcome: AssertionOutcome, turnIndex?: number): string {
  const prefix = turnIndex !== undefined ? `[Turn ${turnIndex + 1}] ` : "";
  let msg = `${prefix}${outcome.type}`;
  if (outcome.label) {
    msg += ` - ${outcome.label}`;
  }
  if (outcome.message) {
    msg += `: ${outcome.message}`;
  }
  return msg;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Check one suite against a recorded transcript
 */
export async function runSuite(options: SuiteRunnerOptions): Promise<SuiteResult> {
  const { suite, transcript, registry, defaults = {}, verbose, failFast, onLog, onDebug } = options;
  const log = onLog ?? (() => {});
  const debug = onDebug ?? (() => {});

  const messages = transcript.messages;
  const turns = splitTurns(messages);
  const outcomes: RecordedOutcome[] = [];
  const failures: string[] = [];
  let conversationCost = emptyCost();

  const result = (error?: string): SuiteResult => ({
    suiteName: suite.name,
    passed: failures.length === 0,
    failures,
    outcomes,
    turnCount: turns.length,
    cost: conversationCost,
    error,
  });

  const record = (evaluation: EvaluationResult, turnIndex?: number): void => {
    for (const outcome of evaluation.results) {
      outcomes.push({ ...outcome, turnIndex: turnIndex ?? null });
      if (!outcome.passed) {
        const msg = formatFailure(outcome, turnIndex);
        failures.push(msg);
        if (verbose) log(`    ${msg}`);
      }
    }
  };

  for (const entry of suite.turns) {
    if (entry.index >= turns.length) {
      failures.push(`[Turn ${entry.index + 1}] no such turn (transcript has ${turns.length})`);
    }
  }

  let consumed = 0;
  for (const [i, turn] of turns.entries()) {
    consumed += turn.length;
    const response = lastAssistantMessage(turn);
    if (!response) {
      debug(`[Turn ${i + 1}] No assistant response, skipping`);
      continue;
    }

    const assertions = mergeAssertions(
      defaults.assert,
      suite.assert,
      suite.turns.filter((t) => t.index === i).flatMap((t) => t.assert)
    );
    if (verbose) {
      const tools = turn.flatMap((m) => (m.toolCalls ?? []).map((c) => c.name));
      log(`  Turn ${i + 1}: ${assertions.length} assertion(s), tools: ${tools.join(", ") || "(none)"}`);
    }
    if (assertions.length === 0) continue;

    // Validators get their own copies of the messages
    const context = {
      _turn_messages: structuredClone(turn),
      _execution_context_messages: structuredClone(messages.slice(0, consumed)),
      _metadata: { ...transcript.metadata, suite: suite.name, turn_index: i },
    };

    try {
      const evaluation = await evaluateTurnAssertions(
        registry,
        assertions,
        response.content ?? "",
        context,
        { onDebug: debug }
      );
      record(evaluation, i);
      if (!evaluation.passed && failFast) {
        return result();
      }
    } catch (err) {
      const msg = `Turn ${i + 1} failed: ${errorMessage(err)}`;
      failures.push(msg);
      return result(msg);
    }
  }

  const conversation = buildConversationContext(structuredClone(messages), transcript.metadata);
  conversationCost = conversation.cost;
  debug(
    `[Conversation] ${conversation.toolCalls.length} tool call(s), ` +
      `${conversation.cost.inputTokens + conversation.cost.outputTokens} token(s), ` +
      `$${conversation.cost.totalCostUsd.toFixed(4)}`
  );

  const conversationAssertions = mergeAssertions(
    defaults.conversation_assert,
    suite.conversation_assert
  );
  if (conversationAssertions.length > 0) {
    try {
      record(
        await evaluateConversationAssertions(registry, conversationAssertions, conversation, {
          onDebug: debug,
        })
      );
    } catch (err) {
      const msg = `Conversation assertions failed: ${errorMessage(err)}`;
      failures.push(msg);
      return result(msg);
    }
  }

  return result();
}

import { describe, it, expect } from "vitest";
import { runSuite, splitTurns, formatFailure } from "./check.js";
import { createRegistry } from "../assertions/index.js";
import { SuiteFileSchema, type Message } from "../types/index.js";

const messages: Message[] = [
  { role: "system", content: "You are a shop assistant." },
  { role: "user", content: "Where is order 42?" },
  {
    role: "assistant",
    toolCalls: [{ id: "c1", name: "get_order", args: '{"id":42}' }],
    costInfo: { inputTokens: 10, outputTokens: 5, totalCostUsd: 0.001 },
  },
  { role: "tool", toolResult: { id: "c1", name: "get_order", content: '{"status":"shipped"}' } },
  { role: "assistant", content: "Order 42 has shipped." },
  { role: "user", content: "Cancel it" },
  { role: "assistant", toolCalls: [{ id: "c2", name: "cancel_order", args: '{"id":42}' }] },
  { role: "tool", toolResult: { id: "c2", name: "cancel_order", error: "already shipped" } },
  { role: "assistant", content: "Sorry, it has already shipped." },
];

const suite = (raw: Record<string, unknown>) =>
  SuiteFileSchema.parse({ version: "1", name: "orders", ...raw });

describe("splitTurns", () => {
  it("opens a turn at each user message and keeps the preamble in turn 0", () => {
    const turns = splitTurns(messages);
    expect(turns.map((t) => t.length)).toEqual([5, 4]);
    expect(turns[0][0].role).toBe("system");
    expect(turns[1][0].content).toBe("Cancel it");
  });

  it("returns no turns for an empty transcript", () => {
    expect(splitTurns([])).toEqual([]);
  });
});

describe("formatFailure", () => {
  it("prefixes the one-based turn number and the label", () => {
    expect(
      formatFailure(
        { type: "tools_called", label: "must look up", passed: false, message: "Expected tools not called: x", details: {} },
        0
      )
    ).toBe("[Turn 1] tools_called - must look up: Expected tools not called: x");
  });
});

describe("runSuite", () => {
  it("passes when every assertion holds", async () => {
    const result = await runSuite({
      suite: suite({
        turns: [
          {
            index: 0,
            assert: [{ type: "tool_result_includes", params: { tool: "get_order", patterns: ["shipped"] } }],
          },
        ],
        conversation_assert: [{ type: "tool_call_sequence", params: { sequence: ["get_order", "cancel_order"] } }],
      }),
      transcript: { messages, metadata: {} },
      registry: createRegistry(),
    });

    expect(result.passed).toBe(true);
    expect(result.failures).toEqual([]);
    expect(result.turnCount).toBe(2);
    expect(result.outcomes.map((o) => [o.type, o.turnIndex])).toEqual([
      ["tool_result_includes", 0],
      ["tool_call_sequence", null],
    ]);
    expect(result.cost.inputTokens).toBe(10);
  });

  it("applies suite-level and default assertions to every turn", async () => {
    const result = await runSuite({
      suite: suite({ assert: [{ type: "no_tool_errors", params: {} }] }),
      transcript: { messages, metadata: {} },
      registry: createRegistry(),
      defaults: { assert: [{ type: "content_includes", params: { patterns: ["shipped"] } }] },
    });

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual(["[Turn 2] no_tool_errors: 1 tool call(s) returned an error"]);
    expect(result.outcomes).toHaveLength(4);
  });

  it("stops at the first failing turn with failFast", async () => {
    const result = await runSuite({
      suite: suite({
        assert: [{ type: "content_includes", params: { patterns: ["refund"] } }],
        conversation_assert: [{ type: "workflow_complete", params: {} }],
      }),
      transcript: { messages, metadata: {} },
      registry: createRegistry(),
      failFast: true,
    });

    expect(result.failures).toEqual(["[Turn 1] content_includes: Response is missing: refund"]);
    expect(result.outcomes).toHaveLength(1);
  });

  it("reports turn blocks that point past the transcript", async () => {
    const result = await runSuite({
      suite: suite({ turns: [{ index: 5, assert: [{ type: "no_tool_errors", params: {} }] }] }),
      transcript: { messages, metadata: {} },
      registry: createRegistry(),
    });

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual(["[Turn 6] no such turn (transcript has 2)"]);
  });

  it("passes turn messages and history to validators without sharing them", async () => {
    const registry = createRegistry();
    const seen: number[][] = [];
    registry.registerTurn("probe", () => ({
      type: "probe",
      validate: (_content, context) => {
        seen.push([context._turn_messages?.length ?? -1, context._execution_context_messages?.length ?? -1]);
        context._turn_messages?.forEach((m) => {
          m.content = "tampered";
        });
        return { passed: true, details: {} };
      },
    }));

    await runSuite({
      suite: suite({ assert: [{ type: "probe", params: {} }] }),
      transcript: { messages, metadata: {} },
      registry,
    });

    expect(seen).toEqual([
      [5, 5],
      [4, 9],
    ]);
    expect(messages[1].content).toBe("Where is order 42?");
  });

  it("logs failures when verbose", async () => {
    const logs: string[] = [];
    await runSuite({
      suite: suite({ conversation_assert: [{ type: "state_is", params: { state: "done" } }] }),
      transcript: { messages, metadata: {} },
      registry: createRegistry(),
      verbose: true,
      onLog: (msg) => logs.push(msg),
    });

    expect(logs).toContain('    state_is: Expected workflow state "done", got none');
  });
});

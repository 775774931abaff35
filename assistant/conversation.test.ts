/**
 * Unit tests for conversation history, ordering and model message rendering.
 *
 * Run: npx tsx --test assistant/conversation.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { ConversationHistory, FOLLOW_UP_INSTRUCTION, renderToolData, toModelMessages } from "./conversation.js";
import type { HistoryMessage, ToolDataMessage, UserMessage } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

function user(content: string): UserMessage {
  return { role: "user", content, timestamp: 0 };
}

function toolData(content: string, placement: ToolDataMessage["placement"], ok = true): ToolDataMessage {
  return { role: "tool_data", toolName: "get_weather", content, ok, placement, timestamp: 0 };
}

// ============================================================================
// TESTS
// ============================================================================

test("commitTurn puts tool data after the question by default", () => {
  const history = new ConversationHistory(20, [], () => 7);
  history.commitTurn({ question: user("weather?"), toolData: toolData("Sunny", "after_question"), reply: "It is sunny." });

  assert.deepEqual(
    history.messages.map((m) => m.role),
    ["user", "tool_data", "assistant"],
  );
  assert.deepEqual(history.messages[2], { role: "assistant", content: "It is sunny.", timestamp: 7 });
  assert.equal(history.lastTurnUsedTool(), true);
});

test("screen data goes ahead of the question", () => {
  const history = new ConversationHistory(20);
  history.commitTurn({ question: user("what's on screen?"), toolData: toolData("A terminal", "before_question"), reply: "A terminal." });

  assert.deepEqual(
    history.messages.map((m) => m.role),
    ["tool_data", "user", "assistant"],
  );
});

test("a turn without a tool clears the tool hint", () => {
  const history = new ConversationHistory(20);
  history.commitTurn({ question: user("a"), toolData: toolData("x", "after_question"), reply: "b" });
  history.commitTurn({ question: user("c"), toolData: null, reply: "d" });

  assert.equal(history.lastTurnUsedTool(), false);
});

test("history is trimmed to the window, oldest first", () => {
  const history = new ConversationHistory(3);
  history.commitTurn({ question: user("one"), toolData: null, reply: "two" });
  history.commitTurn({ question: user("three"), toolData: null, reply: "four" });

  assert.deepEqual(history.messages.map((m) => m.content), ["two", "three", "four"]);
});

test("transcript leaves tool data out", () => {
  const history = new ConversationHistory(20);
  history.commitTurn({ question: user("weather?"), toolData: toolData("Sunny", "after_question"), reply: "Sunny." });

  assert.deepEqual(history.transcript().map((m) => m.content), ["weather?", "Sunny."]);
});

test("renderToolData adds the follow-up instruction only after the question", () => {
  assert.equal(renderToolData(toolData("Sunny", "before_question")), "[DATA] Sunny");
  assert.equal(renderToolData(toolData("Sunny", "after_question")), `[DATA] Sunny\n\n${FOLLOW_UP_INSTRUCTION}`);
  assert.equal(renderToolData(toolData("timed out", "before_question", false)), "[DATA] The get_weather tool failed: timed out");
});

test("toModelMessages merges same-side messages and drops a leading reply", () => {
  const messages: HistoryMessage[] = [
    { role: "assistant", content: "left over", timestamp: 0 },
    user("weather?"),
    toolData("Sunny", "after_question"),
    { role: "assistant", content: "It is sunny.", timestamp: 0 },
  ];

  assert.deepEqual(toModelMessages(messages), [
    { role: "user", content: `weather?\n\n[DATA] Sunny\n\n${FOLLOW_UP_INSTRUCTION}` },
    { role: "assistant", content: "It is sunny." },
  ]);
});

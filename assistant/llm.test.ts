/**
 * Unit tests for the Anthropic adapter, using a stand-in messages resource.
 *
 * Run: npx tsx --test assistant/llm.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import Anthropic from "@anthropic-ai/sdk";

import { InterruptedError, ModelTimeoutError, ModelUnavailableError } from "./errors.js";
import { collectText, createAnthropicModel, mapError, textDelta, type LlmConfig, type MessagesPort } from "./llm.js";

// ============================================================================
// HELPERS
// ============================================================================

const CONFIG: LlmConfig = {
  apiKey: "test-secret",
  fastModel: "fast-model",
  mainModel: "main-model",
  visionModel: "vision-model",
  requestTimeoutMs: 5000,
};

interface RecordedCall {
  body: Anthropic.MessageCreateParamsNonStreaming | Anthropic.MessageStreamParams;
  options: { signal?: AbortSignal; timeout?: number } | undefined;
}

/** SDK content blocks and stream events, loosely typed */
type Loose = { type: string; [key: string]: unknown };

function fakeMessages(content: readonly Loose[], events: readonly Loose[] = []) {
  const calls: RecordedCall[] = [];
  const port: MessagesPort = {
    async create(body, options) {
      calls.push({ body, options });
      return { content };
    },
    async *stream(body, options) {
      calls.push({ body, options });
      for (const event of events) yield event;
    },
  };
  return { port, calls };
}

// ============================================================================
// TESTS
// ============================================================================

test("fast completions use the fast model at temperature 0", async () => {
  const { port, calls } = fakeMessages([{ type: "text", text: "calculate" }]);
  const model = createAnthropicModel(CONFIG, port);
  const signal = new AbortController().signal;

  const text = await model.complete({ messages: [{ role: "user", content: "2+2" }], maxTokens: 16 }, "fast", { signal });

  assert.equal(text, "calculate");
  assert.deepEqual(calls[0]?.body, {
    model: "fast-model",
    max_tokens: 16,
    messages: [{ role: "user", content: "2+2" }],
    temperature: 0,
  });
  assert.equal(calls[0]?.options?.signal, signal);
  assert.equal(calls[0]?.options?.timeout, 5000);
});

test("main completions carry the system prompt and default token limit", async () => {
  const { port, calls } = fakeMessages([{ type: "text", text: "Hi" }]);
  const model = createAnthropicModel(CONFIG, port);

  await model.complete({ system: "Be brief.", messages: [{ role: "user", content: "hello" }] }, "main", {
    signal: new AbortController().signal,
  });

  assert.deepEqual(calls[0]?.body, {
    model: "main-model",
    max_tokens: 1024,
    messages: [{ role: "user", content: "hello" }],
    system: "Be brief.",
  });
});

test("stream yields only text deltas", async () => {
  const { port } = fakeMessages(
    [],
    [
      { type: "message_start" },
      { type: "content_block_delta", delta: { type: "text_delta", text: "Hel" } },
      { type: "content_block_delta", delta: { type: "input_json_delta", partial_json: "{" } },
      { type: "content_block_delta", delta: { type: "text_delta", text: "lo" } },
      { type: "message_stop" },
    ],
  );
  const model = createAnthropicModel(CONFIG, port);

  const pieces: string[] = [];
  for await (const piece of model.stream({ messages: [{ role: "user", content: "hi" }] }, "main", {
    signal: new AbortController().signal,
  })) {
    pieces.push(piece);
  }

  assert.deepEqual(pieces, ["Hel", "lo"]);
});

test("describeImage sends the image as base64 to the vision model", async () => {
  const { port, calls } = fakeMessages([{ type: "text", text: "A code editor" }]);
  const model = createAnthropicModel(CONFIG, port);

  const text = await model.describeImage(Buffer.from("png-bytes"), "image/png", "Describe the screen.", {
    signal: new AbortController().signal,
  });

  assert.equal(text, "A code editor");
  assert.deepEqual(calls[0]?.body, {
    model: "vision-model",
    max_tokens: 1024,
    messages: [
      {
        role: "user",
        content: [
          { type: "image", source: { type: "base64", media_type: "image/png", data: Buffer.from("png-bytes").toString("base64") } },
          { type: "text", text: "Describe the screen." },
        ],
      },
    ],
  });
});

test("collectText joins text blocks and skips others", () => {
  const blocks: Loose[] = [{ type: "text", text: "a" }, { type: "tool_use" }, { type: "text", text: "b" }];
  assert.equal(collectText(blocks), "ab");
});

test("textDelta ignores events without text", () => {
  const stop: Loose = { type: "message_stop" };
  const delta: Loose = { type: "content_block_delta", delta: { type: "text_delta", text: "x" } };
  assert.equal(textDelta(stop), null);
  assert.equal(textDelta(delta), "x");
});

test("mapError turns aborts into InterruptedError", () => {
  const controller = new AbortController();
  controller.abort();
  assert.ok(mapError(new Error("aborted"), controller.signal) instanceof InterruptedError);
});

test("mapError separates timeouts from other failures", () => {
  const signal = new AbortController().signal;

  const timeout = mapError(new Anthropic.APIConnectionTimeoutError(), signal);
  const other = mapError(new Error("boom"), signal);

  assert.ok(timeout instanceof ModelTimeoutError);
  assert.ok(other instanceof ModelUnavailableError);
  assert.equal(other.message, "model unavailable: boom");
});

/**
 * Unit tests for tool execution: extraction failures, confirmation,
 * timeouts, interrupts and output handling.
 *
 * Run: npx tsx --test assistant/tool-executor.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import type { ArgumentExtractor } from "./argument-extractor.js";
import { ExtractionError, InterruptedError, ModelTimeoutError, ToolError } from "./errors.js";
import { InterruptToken } from "./interrupt.js";
import { hangUntilAborted } from "./testing/fakes.js";
import { createToolExecutor, summarizeInvocation, truncateWords, type ConfirmAction } from "./tool-executor.js";
import type { ToolArgs, ToolDescriptor, ToolHandler } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

function fixedExtractor(args: ToolArgs): ArgumentExtractor {
  return { extract: async () => args };
}

function failingExtractor(err: Error): ArgumentExtractor {
  return {
    extract: async () => {
      throw err;
    },
  };
}

function tool(handler: ToolHandler, overrides: Partial<ToolDescriptor> = {}): ToolDescriptor {
  return { name: "demo", description: "Demo tool", parameters: {}, handler, ...overrides };
}

const approve: ConfirmAction = async () => true;

function executor(extractor: ArgumentExtractor = fixedExtractor({}), maxResultWords = 300) {
  return createToolExecutor({ extractor, defaultTimeoutMs: 1000, maxResultWords });
}

// ============================================================================
// TESTS
// ============================================================================

test("a successful run returns trimmed output and the arguments", async () => {
  let received: ToolArgs = {};
  const invocation = await executor(fixedExtractor({ city: "Oslo" })).invoke(
    tool(async (args) => {
      received = args;
      return "  Sunny, 21°C  ";
    }),
    "weather in Oslo",
    new InterruptToken(),
    approve,
  );

  assert.deepEqual(received, { city: "Oslo" });
  assert.deepEqual(invocation.args, { city: "Oslo" });
  assert.deepEqual(invocation.result, { ok: true, text: "Sunny, 21°C" });
  assert.equal(invocation.toolName, "demo");
});

test("empty output becomes a short note", async () => {
  const invocation = await executor().invoke(tool(async () => "   "), "x", new InterruptToken(), approve);
  assert.deepEqual(invocation.result, { ok: true, text: "The tool returned no output." });
});

test("long output is cut to the word budget", async () => {
  const invocation = await executor(fixedExtractor({}), 3).invoke(
    tool(async () => "one two\n three four five"),
    "x",
    new InterruptToken(),
    approve,
  );
  assert.deepEqual(invocation.result, { ok: true, text: "one two three ..." });
});

test("a ToolError keeps its kind", async () => {
  const invocation = await executor().invoke(
    tool(async () => {
      throw new ToolError("not_found", "no such city");
    }),
    "x",
    new InterruptToken(),
    approve,
  );
  assert.deepEqual(invocation.result, { ok: false, error: { kind: "not_found", message: "no such city" } });
});

test("any other handler error is reported as failed", async () => {
  const invocation = await executor().invoke(
    tool(async () => {
      throw new Error("socket hang up");
    }),
    "x",
    new InterruptToken(),
    approve,
  );
  assert.deepEqual(invocation.result, { ok: false, error: { kind: "failed", message: "socket hang up" } });
});

test("a slow handler times out and is aborted", async () => {
  let aborted = false;
  const invocation = await executor().invoke(
    tool(
      (_args, signal) => {
        signal.addEventListener("abort", () => {
          aborted = true;
        });
        return hangUntilAborted(signal);
      },
      { name: "slow", timeoutMs: 20 },
    ),
    "x",
    new InterruptToken(),
    approve,
  );

  assert.deepEqual(invocation.result, { ok: false, error: { kind: "timeout", message: "slow did not finish within 20ms" } });
  assert.equal(aborted, true);
});

test("extraction failures map to structured failures without running the handler", async () => {
  let ran = false;
  const handler: ToolHandler = async () => {
    ran = true;
    return "";
  };

  const missing = await executor(failingExtractor(new ExtractionError("missing required argument"))).invoke(
    tool(handler),
    "x",
    new InterruptToken(),
    approve,
  );
  const slow = await executor(failingExtractor(new ModelTimeoutError("extraction timed out"))).invoke(
    tool(handler),
    "x",
    new InterruptToken(),
    approve,
  );

  assert.deepEqual(missing.result, { ok: false, error: { kind: "invalid_arguments", message: "missing required argument" } });
  assert.deepEqual(slow.result, { ok: false, error: { kind: "timeout", message: "extraction timed out" } });
  assert.equal(ran, false);
});

test("a destructive tool reads its action back and stops when declined", async () => {
  let ran = false;
  const asked: string[] = [];
  const destructive = tool(
    async () => {
      ran = true;
      return "done";
    },
    { describeAction: (args) => `rm ${String(args.path)}` },
  );

  const invocation = await executor(fixedExtractor({ path: "notes.txt" })).invoke(
    destructive,
    "delete my notes",
    new InterruptToken(),
    async (action) => {
      asked.push(action);
      return false;
    },
  );

  assert.deepEqual(asked, ["rm notes.txt"]);
  assert.equal(ran, false);
  assert.deepEqual(invocation.result, { ok: false, error: { kind: "declined", message: "The user declined: rm notes.txt" } });
});

test("a destructive tool runs after approval", async () => {
  const invocation = await executor(fixedExtractor({ path: "a" })).invoke(
    tool(async () => "removed", { describeAction: () => "rm a" }),
    "x",
    new InterruptToken(),
    approve,
  );
  assert.deepEqual(invocation.result, { ok: true, text: "removed" });
});

test("an interrupt during the handler unwinds with InterruptedError", async () => {
  const token = new InterruptToken();
  const pending = executor().invoke(
    tool((_args, signal) => hangUntilAborted(signal)),
    "x",
    token,
    approve,
  );
  token.interrupt();

  await assert.rejects(pending, InterruptedError);
});

test("truncateWords leaves short text untouched", () => {
  assert.equal(truncateWords("a  b\nc", 3), "a  b\nc");
});

test("summarizeInvocation names the tool, status and time", () => {
  assert.equal(
    summarizeInvocation({ toolName: "get_weather", args: {}, result: { ok: true, text: "x" }, elapsedMs: 42 }),
    "tool get_weather ok (42ms)",
  );
  assert.equal(
    summarizeInvocation({
      toolName: "get_weather",
      args: {},
      result: { ok: false, error: { kind: "not_found", message: "x" } },
      elapsedMs: 7,
    }),
    "tool get_weather not_found (7ms)",
  );
});

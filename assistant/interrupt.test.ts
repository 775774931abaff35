/**
 * Unit tests for the interrupt token and stage wrappers.
 *
 * Run: npx tsx --test assistant/interrupt.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { InterruptedError, ModelTimeoutError } from "./errors.js";
import { InterruptToken, runStage, untilInterrupted } from "./interrupt.js";

// ============================================================================
// HELPERS
// ============================================================================

/** A promise that never settles unless its signal aborts */
function hang(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("aborted by stage")), { once: true });
  });
}

const timeoutError = () => new ModelTimeoutError("stage timed out");

// ============================================================================
// TESTS
// ============================================================================

test("interrupt sets the token once and aborts its signal", () => {
  const token = new InterruptToken();
  assert.equal(token.interrupted, false);

  token.interrupt();
  token.interrupt();

  assert.equal(token.interrupted, true);
  assert.equal(token.signal.aborted, true);
  assert.throws(() => token.throwIfInterrupted("respond"), (err: unknown) => {
    return err instanceof InterruptedError && err.stage === "respond";
  });
});

test("runStage returns the work's result", async () => {
  const token = new InterruptToken();
  const result = await runStage(token, "classify", 1000, async () => "weather", timeoutError);
  assert.equal(result, "weather");
});

test("runStage refuses to start once the token is set", async () => {
  const token = new InterruptToken();
  token.interrupt();
  let started = false;

  await assert.rejects(
    runStage(token, "classify", 1000, async () => {
      started = true;
      return "x";
    }, timeoutError),
    InterruptedError,
  );
  assert.equal(started, false);
});

test("runStage rejects with InterruptedError while the work is in flight and aborts it", async () => {
  const token = new InterruptToken();
  let workSignal: AbortSignal | undefined;

  const stage = runStage(token, "respond", 10_000, (signal) => {
    workSignal = signal;
    return hang(signal);
  }, timeoutError);
  token.interrupt();

  await assert.rejects(stage, (err: unknown) => err instanceof InterruptedError && err.stage === "respond");
  assert.equal(workSignal?.aborted, true);
});

test("runStage rejects with the timeout error when the work is too slow", async () => {
  const token = new InterruptToken();
  await assert.rejects(runStage(token, "respond", 10, hang, timeoutError), ModelTimeoutError);
  assert.equal(token.interrupted, false);
});

test("runStage passes through errors thrown by the work", async () => {
  const token = new InterruptToken();
  await assert.rejects(
    runStage(token, "tool", 1000, async () => {
      throw new Error("handler exploded");
    }, timeoutError),
    { message: "handler exploded" },
  );
});

test("untilInterrupted resolves with the promise's value", async () => {
  const token = new InterruptToken();
  assert.equal(await untilInterrupted(token, "speak", Promise.resolve("completed")), "completed");
});

test("untilInterrupted rejects as soon as the token is set", async () => {
  const token = new InterruptToken();
  const wait = untilInterrupted(token, "speak", new Promise<string>(() => {}));
  token.interrupt();
  await assert.rejects(wait, InterruptedError);
});

test("runStage reports the interrupt even when the work fails from its abort handler", async () => {
  const token = new InterruptToken();
  const stage = runStage(token, "transcribe", 10_000, async (signal) => {
    try {
      return await hang(signal);
    } catch {
      throw new Error("recognizer torn down");
    }
  }, timeoutError);
  token.interrupt();

  await assert.rejects(stage, (err: unknown) => err instanceof InterruptedError && err.stage === "transcribe");
});

/**
 * Unit tests for the listening session.
 *
 * Frames are 100 samples at 1 kHz, so each one is 100 ms of audio time.
 *
 * Run: npx tsx --test assistant/listener.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { AsyncQueue } from "./async-queue.js";
import { startListening, type ListenOptions } from "./listener.js";
import type { AudioFrame, CaptureSource } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const SAMPLE_RATE = 1000;
const FRAME_SAMPLES = 100;

const OPTIONS: ListenOptions = { silenceMs: 500, timeoutMs: 1000, maxDurationMs: 60_000 };

function frame(voiceActive: boolean): AudioFrame {
  return { samples: new Float32Array(FRAME_SAMPLES), voiceActive };
}

function frames(pattern: string): AudioFrame[] {
  return [...pattern].map((c) => frame(c === "v"));
}

/** Capture source that replays a fixed list of frames, then ends */
function scriptedSource(script: AudioFrame[]): CaptureSource & { stops: number } {
  const source = {
    sampleRate: SAMPLE_RATE,
    stops: 0,
    async *start(): AsyncGenerator<AudioFrame> {
      for (const f of script) yield f;
    },
    stop(): void {
      source.stops++;
    },
  };
  return source;
}

/** Capture source fed by the test; stop() ends the stream */
function liveSource(): CaptureSource & { feed: AsyncQueue<AudioFrame> } {
  const feed = new AsyncQueue<AudioFrame>();
  return {
    sampleRate: SAMPLE_RATE,
    feed,
    start: () => feed,
    stop: () => feed.close(),
  };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

// ============================================================================
// TESTS
// ============================================================================

test("silence after speech ends the utterance and keeps a short pre-roll", async () => {
  // 2 quiet, 3 speech, then quiet: ends after the 5th quiet frame (500 ms)
  const source = scriptedSource(frames("ssvvv" + "s".repeat(20)));
  const outcome = await startListening(source, OPTIONS).result;

  assert.equal(outcome.kind, "speech");
  if (outcome.kind !== "speech") return;
  assert.equal(outcome.reason, "silence");
  assert.equal(outcome.audio.length, 10 * FRAME_SAMPLES);
  assert.equal(source.stops, 1);
});

test("pre-roll before speech is capped at about 300 ms", async () => {
  // 10 quiet frames, then speech, then silence
  const source = scriptedSource(frames("s".repeat(9) + "v" + "sssss"));
  const outcome = await startListening(source, { ...OPTIONS, timeoutMs: 5000 }).result;

  assert.equal(outcome.kind, "speech");
  if (outcome.kind !== "speech") return;
  // 3 pre-roll frames + 1 speech + 5 silence
  assert.equal(outcome.audio.length, 9 * FRAME_SAMPLES);
});

test("no speech before the listening timeout ends with no_speech", async () => {
  const source = scriptedSource(frames("s".repeat(30)));
  const outcome = await startListening(source, OPTIONS).result;

  assert.deepEqual(outcome, { kind: "no_speech", reason: "timeout" });
});

test("continuous speech is cut at the maximum duration", async () => {
  const source = scriptedSource(frames("v".repeat(30)));
  const outcome = await startListening(source, { ...OPTIONS, maxDurationMs: 500 }).result;

  assert.equal(outcome.kind, "speech");
  if (outcome.kind !== "speech") return;
  assert.equal(outcome.reason, "max_duration");
  assert.equal(outcome.audio.length, 5 * FRAME_SAMPLES);
});

test("a stream that ends before any speech reports a failure", async () => {
  const outcome = await startListening(scriptedSource(frames("ss")), OPTIONS).result;
  assert.deepEqual(outcome, { kind: "failed", message: "microphone stream ended" });
});

test("stop keeps what was recorded", async () => {
  const source = liveSource();
  const session = startListening(source, OPTIONS);
  source.feed.push(frame(true));
  source.feed.push(frame(true));
  await tick();

  session.stop();
  const outcome = await session.result;

  assert.equal(outcome.kind, "speech");
  if (outcome.kind !== "speech") return;
  assert.equal(outcome.reason, "stopped");
  assert.equal(outcome.audio.length, 2 * FRAME_SAMPLES);
  assert.equal(source.feed.closed, true);
});

test("stop before any audio arrives reports no speech", async () => {
  const session = startListening(liveSource(), OPTIONS);
  session.stop();
  assert.deepEqual(await session.result, { kind: "no_speech", reason: "stopped" });
});

test("cancel discards the recording and the first outcome wins", async () => {
  const source = liveSource();
  const session = startListening(source, OPTIONS);
  source.feed.push(frame(true));
  await tick();

  session.cancel();
  session.stop();

  assert.deepEqual(await session.result, { kind: "interrupted" });
});

test("a capture error ends the session as failed", async () => {
  const source: CaptureSource = {
    sampleRate: SAMPLE_RATE,
    async *start(): AsyncGenerator<AudioFrame> {
      yield frame(false);
      throw new Error("device busy");
    },
    stop(): void {},
  };

  assert.deepEqual(await startListening(source, OPTIONS).result, { kind: "failed", message: "device busy" });
});

test("a recorder that delivers nothing still times out on the wall clock", async () => {
  const source = liveSource();
  const started = Date.now();
  const outcome = await startListening(source, { ...OPTIONS, timeoutMs: 200 }).result;

  assert.deepEqual(outcome, { kind: "no_speech", reason: "timeout" });
  assert.ok(Date.now() - started < 1000);
  assert.equal(source.feed.closed, true);
});

test("speech before the wall-clock timeout keeps the session open", async () => {
  const source = liveSource();
  const session = startListening(source, { ...OPTIONS, timeoutMs: 100 });
  source.feed.push(frame(true));
  await new Promise((resolve) => setTimeout(resolve, 250));

  source.feed.push(frame(true));
  await tick();
  session.stop();
  const outcome = await session.result;

  assert.equal(outcome.kind, "speech");
  if (outcome.kind !== "speech") return;
  assert.equal(outcome.audio.length, 2 * FRAME_SAMPLES);
});

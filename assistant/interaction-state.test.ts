/**
 * Unit tests for the recording state machine and mode switching.
 *
 * Run: npx tsx --test assistant/interaction-state.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { InteractionState, nextRecordingState } from "./interaction-state.js";

test("the transition table accepts the voice turn path", () => {
  assert.equal(nextRecordingState("idle", "start_listening"), "listening");
  assert.equal(nextRecordingState("listening", "speech_ended"), "processing");
  assert.equal(nextRecordingState("listening", "stop_signal"), "processing");
  assert.equal(nextRecordingState("processing", "turn_finished"), "idle");
});

test("typed input goes straight from idle to processing", () => {
  assert.equal(nextRecordingState("idle", "submit_text"), "processing");
});

test("processing cannot be entered twice or left by listening events", () => {
  assert.equal(nextRecordingState("processing", "submit_text"), null);
  assert.equal(nextRecordingState("processing", "start_listening"), null);
  assert.equal(nextRecordingState("processing", "speech_ended"), null);
});

test("interrupt and timeout return to idle; reset works from anywhere", () => {
  assert.equal(nextRecordingState("listening", "listen_timeout"), "idle");
  assert.equal(nextRecordingState("listening", "interrupt"), "idle");
  assert.equal(nextRecordingState("processing", "interrupt"), "idle");
  assert.equal(nextRecordingState("idle", "interrupt"), null);
  assert.equal(nextRecordingState("processing", "reset"), "idle");
});

test("transition reports the change and leaves state alone on rejection", async () => {
  const state = new InteractionState("voice");

  assert.deepEqual(await state.transition("start_listening"), { from: "idle", to: "listening" });
  assert.equal(await state.transition("submit_text"), null);
  assert.equal(state.recordingState, "listening");
});

test("concurrent transitions are serialized so only one enters processing", async () => {
  const state = new InteractionState("chat");
  const results = await Promise.all([state.transition("submit_text"), state.transition("submit_text")]);

  assert.deepEqual(results, [{ from: "idle", to: "processing" }, null]);
});

test("a mode switch at idle applies immediately", async () => {
  const state = new InteractionState("voice");

  assert.equal(await state.requestMode("chat"), "applied");
  assert.equal(state.interactionMode, "chat");
  assert.equal(await state.requestMode("chat"), "unchanged");
});

test("a mode switch mid-turn is deferred until idle", async () => {
  const state = new InteractionState("voice");
  await state.transition("start_listening");

  assert.equal(await state.toggleMode(), "deferred");
  assert.equal(state.interactionMode, "voice");
  assert.equal(state.pendingMode, "chat");

  // Still listening: nothing to apply yet
  assert.equal(await state.applyDeferredMode(), null);

  await state.transition("listen_timeout");
  assert.equal(await state.applyDeferredMode(), "chat");
  assert.equal(state.interactionMode, "chat");
  assert.equal(state.pendingMode, null);
});

test("toggling twice mid-turn cancels the pending switch", async () => {
  const state = new InteractionState("voice");
  await state.transition("start_listening");

  await state.toggleMode();
  assert.equal(await state.toggleMode(), "unchanged");
  assert.equal(state.pendingMode, null);
});

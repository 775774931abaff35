/**
 * Unit tests for building the typed config from environment values.
 *
 * Run: npx tsx --test assistant/config.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { loadAssistantConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";

const BASE = { ANTHROPIC_API_KEY: "test-secret" };

test("a missing Anthropic key stops startup", () => {
  assert.throws(() => loadAssistantConfig({}, "/work"), {
    name: "ConfigurationError",
    message: "ANTHROPIC_API_KEY is not set in .env",
  });
});

test("defaults apply when only the key is set", () => {
  const config = loadAssistantConfig(BASE, "/work");

  assert.equal(config.llm.fastModel, "claude-haiku-4-5-20251001");
  assert.equal(config.llm.mainModel, "claude-sonnet-4-5-20250929");
  assert.equal(config.llm.visionModel, config.llm.mainModel);
  assert.equal(config.pipeline.silenceMs, 2000);
  assert.equal(config.pipeline.listenTimeoutMs, 5000);
  assert.equal(config.pipeline.autoListenTimeoutMs, 3000);
  assert.equal(config.pipeline.maxHistoryMessages, 20);
  assert.equal(config.pipeline.memoryEnabled, true);
  assert.equal(config.pipeline.speakInChat, false);
  assert.equal(config.capture.vadThreshold, 0.5);
  assert.equal(config.capture.sampleRate, 16000);
  assert.equal(config.stt.provider, "local");
  assert.deepEqual(config.tts, { provider: "system" });
  assert.equal(config.dataDir, "/work/data");
  assert.equal(config.dashboardPort, 3456);
  assert.equal(config.profile, undefined);
});

test("values from the environment override the defaults", () => {
  const config = loadAssistantConfig(
    {
      ...BASE,
      SILENCE_DURATION_SEC: "1.5",
      MAX_HISTORY_MESSAGES: "8",
      MEMORY_ENABLED: "no",
      VISION_MODEL: "vision-x",
      DATA_DIR: "/var/assistant",
      ACTIVE_PROFILE: "kitchen",
      FILE_ROOT: "notes",
    },
    "/work",
  );

  assert.equal(config.pipeline.silenceMs, 1500);
  assert.equal(config.pipeline.maxHistoryMessages, 8);
  assert.equal(config.pipeline.memoryEnabled, false);
  assert.equal(config.llm.visionModel, "vision-x");
  assert.equal(config.dataDir, "/var/assistant");
  assert.equal(config.profile, "kitchen");
  assert.equal(config.fileRoot, "/work/notes");
});

test("invalid numbers fall back to defaults", () => {
  const config = loadAssistantConfig(
    { ...BASE, SILENCE_DURATION_SEC: "soon", MAX_HISTORY_MESSAGES: "2.5", VAD_THRESHOLD: "1.2", MEMORY_ENABLED: "maybe" },
    "/work",
  );

  assert.equal(config.pipeline.silenceMs, 2000);
  assert.equal(config.pipeline.maxHistoryMessages, 20);
  assert.equal(config.capture.vadThreshold, 0.5);
  assert.equal(config.pipeline.memoryEnabled, true);
});

test("ElevenLabs providers need their key", () => {
  assert.throws(() => loadAssistantConfig({ ...BASE, TTS_PROVIDER: "elevenlabs" }, "/work"), {
    message: "ELEVENLABS_API_KEY is not set in .env (required by TTS_PROVIDER=elevenlabs)",
  });

  const config = loadAssistantConfig({ ...BASE, STT_PROVIDER: "ElevenLabs", ELEVENLABS_API_KEY: "test-secret" }, "/work");
  assert.deepEqual(config.stt, { provider: "elevenlabs", apiKey: "test-secret", modelId: "scribe_v1" });
});

test("an unknown provider is a configuration error", () => {
  assert.throws(() => loadAssistantConfig({ ...BASE, STT_PROVIDER: "cloud" }, "/work"), ConfigurationError);
});

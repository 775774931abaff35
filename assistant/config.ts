/**
 * Typed assistant configuration built from the process environment.
 *
 * Responsibilities:
 * - Apply defaults for every timing, model id and provider setting
 * - Fall back to defaults on unparseable numbers, logging the bad value
 * - Refuse to start when a selected provider lacks its API key
 */

import { homedir } from "os";
import { join, resolve } from "path";

import type { PipelineConfig } from "./context.js";
import { ConfigurationError } from "./errors.js";
import type { LlmConfig } from "./llm.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_FAST_MODEL = "claude-haiku-4-5-20251001";
const DEFAULT_MAIN_MODEL = "claude-sonnet-4-5-20250929";

const DEFAULT_STT_MODEL_DIR = join(homedir(), ".voice-assistant-models", "whisper-small");
const DEFAULT_ELEVENLABS_STT_MODEL = "scribe_v1";
const DEFAULT_ELEVENLABS_TTS_MODEL = "eleven_turbo_v2_5";
/** ElevenLabs "Rachel" premade voice */
const DEFAULT_ELEVENLABS_VOICE = "21m00Tcm4TlvDq8ikWAM";

const DEFAULT_DASHBOARD_PORT = 3456;

/** Silero VAD expects 512-sample frames at 16kHz */
const CAPTURE_SAMPLE_RATE = 16000;
const CAPTURE_FRAME_SAMPLES = 512;

const STT_PROVIDERS = ["local", "elevenlabs"] as const;
const TTS_PROVIDERS = ["elevenlabs", "system", "none"] as const;

// ============================================================================
// INTERFACES
// ============================================================================

export type SttProviderType = (typeof STT_PROVIDERS)[number];
export type TtsProviderType = (typeof TTS_PROVIDERS)[number];

export type SttProviderConfig =
  | { provider: "local"; modelPath: string }
  | { provider: "elevenlabs"; apiKey: string; modelId: string };

export type TtsProviderConfig =
  | { provider: "elevenlabs"; apiKey: string; voiceId: string; modelId: string }
  | { provider: "system" }
  | { provider: "none" };

export interface CaptureConfig {
  sampleRate: number;
  frameSamples: number;
  /** PulseAudio source name; the default device when unset */
  device: string | undefined;
  vadThreshold: number;
}

export interface AssistantConfig {
  llm: LlmConfig;
  pipeline: PipelineConfig;
  stt: SttProviderConfig;
  tts: TtsProviderConfig;
  capture: CaptureConfig;
  /** Profiles, sessions and memories live here */
  dataDir: string;
  /** Overrides the profile remembered in the data directory */
  profile: string | undefined;
  dashboardPort: number;
  /** read_file is confined to this directory */
  fileRoot: string;
  openWeatherMapApiKey: string | undefined;
}

export type Env = Readonly<Record<string, string | undefined>>;

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the configuration.
 *
 * @param env - Usually process.env after dotenv has loaded .env
 * @param cwd - Base for relative paths
 * @throws ConfigurationError when a required key is missing or a provider is unknown
 */
export function loadAssistantConfig(env: Env, cwd: string = process.cwd()): AssistantConfig {
  const apiKey = nonEmpty(env.ANTHROPIC_API_KEY);
  if (apiKey === undefined) {
    throw new ConfigurationError("ANTHROPIC_API_KEY is not set in .env");
  }

  const modelTimeoutMs = seconds(env, "MODEL_TIMEOUT_SEC", 30);
  const mainModel = nonEmpty(env.MAIN_MODEL) ?? DEFAULT_MAIN_MODEL;

  const pipeline: PipelineConfig = {
    silenceMs: seconds(env, "SILENCE_DURATION_SEC", 2.0),
    listenTimeoutMs: seconds(env, "LISTENING_TIMEOUT_SEC", 5.0),
    autoListenTimeoutMs: seconds(env, "AUTO_LISTEN_TIMEOUT_SEC", 3.0),
    maxRecordingMs: seconds(env, "MAX_RECORDING_SEC", 60),
    transcriptionTimeoutMs: seconds(env, "TRANSCRIPTION_TIMEOUT_SEC", 30),
    classifierTimeoutMs: seconds(env, "CLASSIFIER_TIMEOUT_SEC", 10),
    extractionTimeoutMs: seconds(env, "CLASSIFIER_TIMEOUT_SEC", 10),
    responseTimeoutMs: modelTimeoutMs,
    toolTimeoutMs: seconds(env, "TOOL_TIMEOUT_SEC", 20),
    memoryTimeoutMs: modelTimeoutMs,
    maxResultWords: integer(env, "MAX_TOOL_RESULT_WORDS", 300),
    maxHistoryMessages: integer(env, "MAX_HISTORY_MESSAGES", 20),
    memoryEnabled: flag(env, "MEMORY_ENABLED", true),
    speakInChat: flag(env, "SPEAK_IN_CHAT", false),
  };

  return {
    llm: {
      apiKey,
      fastModel: nonEmpty(env.FAST_MODEL) ?? DEFAULT_FAST_MODEL,
      mainModel,
      visionModel: nonEmpty(env.VISION_MODEL) ?? mainModel,
      requestTimeoutMs: modelTimeoutMs,
    },
    pipeline,
    stt: sttConfig(env, cwd),
    tts: ttsConfig(env),
    capture: {
      sampleRate: CAPTURE_SAMPLE_RATE,
      frameSamples: CAPTURE_FRAME_SAMPLES,
      device: nonEmpty(env.AUDIO_DEVICE),
      vadThreshold: fraction(env, "VAD_THRESHOLD", 0.5),
    },
    dataDir: resolve(cwd, nonEmpty(env.DATA_DIR) ?? "data"),
    profile: nonEmpty(env.ACTIVE_PROFILE),
    dashboardPort: integer(env, "DASHBOARD_PORT", DEFAULT_DASHBOARD_PORT),
    fileRoot: resolve(cwd, nonEmpty(env.FILE_ROOT) ?? homedir()),
    openWeatherMapApiKey: nonEmpty(env.OPENWEATHERMAP_API_KEY),
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function sttConfig(env: Env, cwd: string): SttProviderConfig {
  const provider = choice(env, "STT_PROVIDER", STT_PROVIDERS, "local");
  switch (provider) {
    case "local":
      return { provider, modelPath: resolve(cwd, nonEmpty(env.STT_MODEL_PATH) ?? DEFAULT_STT_MODEL_DIR) };
    case "elevenlabs":
      return {
        provider,
        apiKey: requireKey(env, "ELEVENLABS_API_KEY", "STT_PROVIDER=elevenlabs"),
        modelId: nonEmpty(env.ELEVENLABS_STT_MODEL) ?? DEFAULT_ELEVENLABS_STT_MODEL,
      };
  }
}

function ttsConfig(env: Env): TtsProviderConfig {
  const provider = choice(env, "TTS_PROVIDER", TTS_PROVIDERS, "system");
  switch (provider) {
    case "elevenlabs":
      return {
        provider,
        apiKey: requireKey(env, "ELEVENLABS_API_KEY", "TTS_PROVIDER=elevenlabs"),
        voiceId: nonEmpty(env.ELEVENLABS_VOICE_ID) ?? DEFAULT_ELEVENLABS_VOICE,
        modelId: nonEmpty(env.ELEVENLABS_TTS_MODEL) ?? DEFAULT_ELEVENLABS_TTS_MODEL,
      };
    case "system":
    case "none":
      return { provider };
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function requireKey(env: Env, key: string, requiredBy: string): string {
  const value = nonEmpty(env[key]);
  if (value === undefined) {
    throw new ConfigurationError(`${key} is not set in .env (required by ${requiredBy})`);
  }
  return value;
}

function choice<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const raw = nonEmpty(env[key])?.toLowerCase();
  if (raw === undefined) return fallback;
  const match = allowed.find((option) => option === raw);
  if (match === undefined) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(", ")} (got "${raw}")`);
  }
  return match;
}

function number(env: Env, key: string, fallback: number, valid: (n: number) => boolean): number {
  const raw = nonEmpty(env[key]);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || !valid(parsed)) {
    console.warn(`[config] ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return parsed;
}

/** Reads a positive duration in seconds, returns milliseconds */
function seconds(env: Env, key: string, fallbackSec: number): number {
  return Math.round(number(env, key, fallbackSec, (n) => n > 0) * 1000);
}

function integer(env: Env, key: string, fallback: number): number {
  return number(env, key, fallback, (n) => Number.isInteger(n) && n > 0);
}

function fraction(env: Env, key: string, fallback: number): number {
  return number(env, key, fallback, (n) => n > 0 && n < 1);
}

function flag(env: Env, key: string, fallback: boolean): boolean {
  const raw = nonEmpty(env[key])?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  console.warn(`[config] ignoring invalid ${key}="${raw}", using ${fallback}`);
  return fallback;
}

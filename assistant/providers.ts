/**
 * Speech provider factories.
 *
 * Routes transcriber and synthesizer creation to the implementation the
 * config selects, and reports provider readiness for the dashboard.
 */

import { existsSync } from "fs";
import { join } from "path";

import type { SttProviderConfig, TtsProviderConfig } from "./config.js";
import { createLocalTranscriber, REQUIRED_MODEL_SUFFIXES, DEFAULT_MODEL_PREFIX } from "./stt.js";
import { createElevenlabsTranscriber } from "./stt-elevenlabs.js";
import { createSilentSynthesizer, createSystemSynthesizer } from "./tts.js";
import { createElevenlabsSynthesizer } from "./tts-elevenlabs.js";
import type { Synthesizer, Transcriber } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export type ProviderStatus = { ready: true } | { ready: false; detail: string };

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * @throws TranscriptionError when local model files are missing
 */
export async function createTranscriberForProvider(config: SttProviderConfig): Promise<Transcriber> {
  switch (config.provider) {
    case "local":
      return createLocalTranscriber(config.modelPath);
    case "elevenlabs":
      return createElevenlabsTranscriber({ apiKey: config.apiKey, modelId: config.modelId });
  }
}

export function createSynthesizerForProvider(config: TtsProviderConfig): Synthesizer {
  switch (config.provider) {
    case "elevenlabs":
      return createElevenlabsSynthesizer({ apiKey: config.apiKey, voiceId: config.voiceId, modelId: config.modelId });
    case "system":
      return createSystemSynthesizer();
    case "none":
      return createSilentSynthesizer();
  }
}

/**
 * Local Whisper needs its three model files; ElevenLabs only needs its key,
 * which config loading already checked.
 */
export function getSttProviderStatus(config: SttProviderConfig): ProviderStatus {
  if (config.provider !== "local") return { ready: true };

  const missing = REQUIRED_MODEL_SUFFIXES.map((suffix) => `${DEFAULT_MODEL_PREFIX}${suffix}`).filter(
    (file) => !existsSync(join(config.modelPath, file)),
  );
  if (missing.length > 0) {
    return { ready: false, detail: `Missing model files in ${config.modelPath}: ${missing.join(", ")}` };
  }
  return { ready: true };
}

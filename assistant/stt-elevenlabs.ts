/**
 * ElevenLabs speech-to-text via the batch transcription API.
 *
 * The recorded utterance is encoded as a 16kHz mono WAV and uploaded as
 * multipart/form-data.
 */

import { encodeWav } from "./audio.js";
import { TranscriptionError } from "./errors.js";
import { STT_SAMPLE_RATE, checkUtteranceLength } from "./stt.js";
import type { Transcriber } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const ELEVENLABS_STT_URL = "https://api.elevenlabs.io/v1/speech-to-text";

// ============================================================================
// INTERFACES
// ============================================================================

export interface ElevenlabsSttConfig {
  apiKey: string;
  /** e.g. "scribe_v1" */
  modelId: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * @param config - API key and model
 * @param fetchImpl - Injectable for tests
 */
export function createElevenlabsTranscriber(config: ElevenlabsSttConfig, fetchImpl: typeof fetch = fetch): Transcriber {
  const { apiKey, modelId } = config;

  return {
    async transcribe(audio: Float32Array, signal: AbortSignal): Promise<string> {
      checkUtteranceLength(audio);

      const formData = new FormData();
      formData.append("file", new Blob([encodeWav(audio, STT_SAMPLE_RATE)], { type: "audio/wav" }), "audio.wav");
      formData.append("model_id", modelId);

      const response = await fetchImpl(ELEVENLABS_STT_URL, {
        method: "POST",
        headers: { "xi-api-key": apiKey },
        body: formData,
        signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "unknown error");
        throw new TranscriptionError(`ElevenLabs STT API error ${response.status}: ${errorText}`);
      }

      const result: unknown = await response.json();
      const text = typeof result === "object" && result !== null && "text" in result && typeof result.text === "string" ? result.text.trim() : "";
      if (text === "") throw new TranscriptionError("no speech recognized");
      return text;
    },
  };
}

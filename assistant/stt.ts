/**
 * Local speech-to-text via sherpa-onnx with a Whisper ONNX model (offline/batch).
 *
 * Whisper models in sherpa-onnx are offline-only, so each utterance is decoded
 * in one pass once the listener has finished recording it.
 *
 * Responsibilities:
 * - Validate and load the Whisper model files
 * - Decode one utterance per call
 * - Reject empty or too-short audio with TranscriptionError
 */

import { existsSync } from "fs";
import { join } from "path";

import { durationMs } from "./audio.js";
import { InterruptedError, TranscriptionError } from "./errors.js";
import type { Transcriber } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Sample rate expected by the Whisper model */
export const STT_SAMPLE_RATE = 16000;

/** Utterances shorter than this are noise, not speech */
export const MIN_UTTERANCE_MS = 250;

/** Model file prefix (sherpa-onnx naming convention: "small.en", "tiny.en", etc.) */
export const DEFAULT_MODEL_PREFIX = "small.en";

export const REQUIRED_MODEL_SUFFIXES = ["-encoder.int8.onnx", "-decoder.int8.onnx", "-tokens.txt"];

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load the Whisper model and return a transcriber.
 *
 * @param modelPath - Directory holding the encoder, decoder and tokens files
 * @param modelPrefix - File name prefix of the model
 * @throws TranscriptionError if any model file is missing
 */
export async function createLocalTranscriber(modelPath: string, modelPrefix: string = DEFAULT_MODEL_PREFIX): Promise<Transcriber> {
  validateModelFiles(modelPath, modelPrefix);

  const sherpa = (await import("sherpa-onnx-node")).default;
  const recognizer = new sherpa.OfflineRecognizer({
    modelConfig: {
      whisper: {
        encoder: join(modelPath, `${modelPrefix}-encoder.int8.onnx`),
        decoder: join(modelPath, `${modelPrefix}-decoder.int8.onnx`),
      },
      tokens: join(modelPath, `${modelPrefix}-tokens.txt`),
    },
  });

  return {
    async transcribe(audio: Float32Array, signal: AbortSignal): Promise<string> {
      checkUtteranceLength(audio);
      if (signal.aborted) throw new InterruptedError("transcription");

      const started = Date.now();
      const stream = recognizer.createStream();
      stream.acceptWaveform({ sampleRate: STT_SAMPLE_RATE, samples: audio });
      recognizer.decode(stream);
      const text = recognizer.getResult(stream).text.trim();
      console.log(`[stt] decoded ${Math.round(durationMs(audio.length, STT_SAMPLE_RATE))}ms of audio in ${Date.now() - started}ms`);

      if (text === "") throw new TranscriptionError("no speech recognized");
      return text;
    },
  };
}

/**
 * @throws TranscriptionError when the audio is empty or shorter than MIN_UTTERANCE_MS
 */
export function checkUtteranceLength(audio: Float32Array): void {
  if (durationMs(audio.length, STT_SAMPLE_RATE) < MIN_UTTERANCE_MS) {
    throw new TranscriptionError(audio.length === 0 ? "empty audio" : "audio too short to transcribe");
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function validateModelFiles(modelPath: string, prefix: string): void {
  if (!existsSync(modelPath)) {
    throw new TranscriptionError(
      `STT model directory not found: ${modelPath}. ` +
        "Download a Whisper ONNX model for sherpa-onnx and set STT_MODEL_PATH.",
    );
  }

  const expected = REQUIRED_MODEL_SUFFIXES.map((suffix) => `${prefix}${suffix}`);
  const missing = expected.filter((file) => !existsSync(join(modelPath, file)));
  if (missing.length > 0) {
    throw new TranscriptionError(`Missing STT model files in ${modelPath}: ${missing.join(", ")}.`);
  }
}

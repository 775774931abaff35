/**
 * ElevenLabs synthesizer via the streaming TTS HTTP API.
 *
 * Each sentence is POSTed to the streaming endpoint and the returned 24kHz
 * 16-bit PCM is written straight into a player process. stop() aborts the
 * in-flight request and kills the player.
 */

import { SynthesisError, errorMessage } from "./errors.js";
import { splitSentences, spawnPcmPlayer, type PcmPlayer, type PcmPlayerFactory } from "./tts.js";
import type { SpeechHandle, Synthesizer } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const ELEVENLABS_TTS_BASE_URL = "https://api.elevenlabs.io/v1/text-to-speech";

/** PCM output sample rate in Hz */
export const TTS_SAMPLE_RATE = 24000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface ElevenlabsTtsConfig {
  apiKey: string;
  voiceId: string;
  /** e.g. "eleven_turbo_v2_5" */
  modelId: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * @param config - API key, voice and model
 * @param openPlayer - Player factory, injectable for tests
 * @param fetchImpl - Injectable for tests
 */
export function createElevenlabsSynthesizer(
  config: ElevenlabsTtsConfig,
  openPlayer: PcmPlayerFactory = spawnPcmPlayer,
  fetchImpl: typeof fetch = fetch,
): Synthesizer {
  const { apiKey, voiceId, modelId } = config;
  const url = `${ELEVENLABS_TTS_BASE_URL}/${voiceId}/stream?output_format=pcm_${TTS_SAMPLE_RATE}`;

  function speak(text: string): SpeechHandle {
    const controller = new AbortController();
    const player: PcmPlayer = openPlayer(TTS_SAMPLE_RATE);
    let stopped = false;

    async function play(): Promise<"completed" | "stopped"> {
      const t0 = Date.now();
      let first = true;

      for (const sentence of splitSentences(text)) {
        if (stopped) return "stopped";

        const response = await fetchImpl(url, {
          method: "POST",
          headers: { "Content-Type": "application/json", "xi-api-key": apiKey },
          body: JSON.stringify({ text: sentence, model_id: modelId }),
          signal: controller.signal,
        });

        if (!response.ok) {
          const errorText = await response.text().catch(() => "unknown error");
          throw new SynthesisError(`ElevenLabs TTS API error ${response.status}: ${errorText}`);
        }

        for await (const chunk of readResponseChunks(response)) {
          if (stopped) return "stopped";
          if (first) {
            console.log(`[tts] first audio at +${Date.now() - t0}ms`);
            first = false;
          }
          await player.write(Buffer.from(chunk));
        }
      }

      if (stopped) return "stopped";
      await player.finish();
      return stopped ? "stopped" : "completed";
    }

    const done = play().catch((err: unknown): "stopped" => {
      player.kill();
      if (stopped) return "stopped";
      throw err instanceof SynthesisError ? err : new SynthesisError(`playback failed: ${errorMessage(err)}`, { cause: err });
    });

    return {
      done,
      stop() {
        if (stopped) return;
        stopped = true;
        controller.abort();
        player.kill();
      },
    };
  }

  return { speak };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read chunks from a fetch Response body.
 *
 * @yields Uint8Array chunks of raw PCM audio data
 */
async function* readResponseChunks(response: Response): AsyncGenerator<Uint8Array> {
  const body = response.body;
  if (!body) throw new SynthesisError("ElevenLabs TTS response has no body");

  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

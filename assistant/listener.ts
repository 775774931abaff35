/**
 * Listening session: records one utterance from the capture source.
 *
 * Timing runs on audio time (sample counts), so the silence and timeout rules
 * behave the same under load and in tests. The wait for first speech is also
 * bounded on the wall clock, for a recorder that stays open but delivers nothing.
 *
 * Responsibilities:
 * - End after a run of non-speech once speech was heard (silence)
 * - End with no speech when nothing was heard before the listening timeout
 * - End on explicit stop, cancel, a maximum duration, or capture failure
 * - Resolve exactly once per session and release the microphone
 */

import { concatenateChunks, durationMs } from "./audio.js";
import { errorMessage } from "./errors.js";
import type { CaptureSource, ListenOutcome } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Audio kept from before the first speech frame so word onsets are not clipped */
const PRE_ROLL_MS = 300;

// ============================================================================
// INTERFACES
// ============================================================================

export interface ListenOptions {
  /** Continuous non-speech after speech that ends the utterance */
  silenceMs: number;
  /** Give up when no speech at all was heard in this long */
  timeoutMs: number;
  /** Hard cap on a single utterance */
  maxDurationMs: number;
}

export interface ListenSession {
  /** Settles exactly once */
  readonly result: Promise<ListenOutcome>;
  /** End now and keep what was recorded */
  stop(): void;
  /** End now and discard the recording */
  cancel(): void;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Start recording one utterance.
 *
 * @param source - Microphone frames; started here, stopped when the session settles
 * @param options - Silence, timeout and maximum duration
 * @returns A handle whose result resolves with the outcome
 */
export function startListening(source: CaptureSource, options: ListenOptions): ListenSession {
  let settled = false;
  let resolveResult: (outcome: ListenOutcome) => void = () => {};
  const result = new Promise<ListenOutcome>((resolve) => {
    resolveResult = resolve;
  });

  const chunks: Float32Array[] = [];
  let preRollMs = 0;
  let heardSpeech = false;
  let elapsedMs = 0;
  let silenceRunMs = 0;

  // Fires only while no speech has been heard
  const noSpeechTimer = setTimeout(() => {
    if (!heardSpeech) settle({ kind: "no_speech", reason: "timeout" });
  }, options.timeoutMs);

  function settle(outcome: ListenOutcome): void {
    if (settled) return;
    settled = true;
    clearTimeout(noSpeechTimer);
    source.stop();
    resolveResult(outcome);
  }

  function recorded(reason: "silence" | "stopped" | "max_duration"): ListenOutcome {
    return { kind: "speech", audio: concatenateChunks(chunks), reason };
  }

  async function pump(): Promise<void> {
    for await (const frame of source.start()) {
      if (settled) break;

      const frameMs = durationMs(frame.samples.length, source.sampleRate);
      elapsedMs += frameMs;
      chunks.push(frame.samples);

      if (frame.voiceActive) {
        if (!heardSpeech) clearTimeout(noSpeechTimer);
        heardSpeech = true;
        silenceRunMs = 0;
      } else if (heardSpeech) {
        silenceRunMs += frameMs;
      } else {
        // Before speech only a short pre-roll is kept
        preRollMs += frameMs;
        while (chunks.length > 1 && preRollMs - durationMs(chunks[0].length, source.sampleRate) >= PRE_ROLL_MS) {
          preRollMs -= durationMs(chunks[0].length, source.sampleRate);
          chunks.shift();
        }
      }

      if (heardSpeech && silenceRunMs >= options.silenceMs) {
        settle(recorded("silence"));
      } else if (!heardSpeech && elapsedMs >= options.timeoutMs) {
        settle({ kind: "no_speech", reason: "timeout" });
      } else if (elapsedMs >= options.maxDurationMs) {
        settle(heardSpeech ? recorded("max_duration") : { kind: "no_speech", reason: "timeout" });
      }
    }

    // The stream ended without any rule firing
    settle(heardSpeech ? recorded("stopped") : { kind: "failed", message: "microphone stream ended" });
  }

  pump().catch((err: unknown) => {
    console.error(`[listener] capture failed: ${errorMessage(err)}`);
    settle({ kind: "failed", message: errorMessage(err) });
  });

  return {
    result,
    stop() {
      settle(chunks.length > 0 ? recorded("stopped") : { kind: "no_speech", reason: "stopped" });
    },
    cancel() {
      settle({ kind: "interrupted" });
    },
  };
}

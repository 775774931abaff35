/**
 * Voice activity detection via avr-vad (Silero VAD v5).
 *
 * avr-vad reports a speech probability per 512-sample frame at 16kHz through
 * its onFrameProcessed callback. The gate feeds one frame at a time and
 * returns the probability of the frame just processed.
 *
 * Responsibilities:
 * - Initialize the Silero VAD v5 model
 * - Score frames and compare them with the configured threshold
 * - Reset between listening sessions, free the model on shutdown
 */

// ============================================================================
// INTERFACES
// ============================================================================

export interface VadGate {
  /**
   * @param samples - One frame of 16kHz samples
   * @returns true when the frame's speech probability reaches the threshold
   */
  isSpeech(samples: Float32Array): Promise<boolean>;
  /** Clear model state between listening sessions */
  reset(): void;
  /** Free the model; called once on shutdown */
  destroy(): Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load the Silero model and return a gate.
 *
 * @param threshold - Speech probability at or above which a frame counts as speech
 * @throws Error if the ONNX model fails to load
 */
export async function createVadGate(threshold: number): Promise<VadGate> {
  // Dynamic import keeps the ONNX runtime out of processes that never open the mic
  const { RealTimeVAD } = await import("avr-vad");

  let lastProbability = 0;

  const vad = await RealTimeVAD.new({
    onFrameProcessed: (probs: { isSpeech: number }) => {
      lastProbability = probs.isSpeech;
    },
  });

  vad.start();

  return {
    async isSpeech(samples: Float32Array): Promise<boolean> {
      await vad.processAudio(samples);
      return lastProbability >= threshold;
    },

    reset(): void {
      lastProbability = 0;
      vad.reset();
    },

    async destroy(): Promise<void> {
      await vad.destroy();
    },
  };
}

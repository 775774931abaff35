/**
 * Microphone capture source.
 *
 * Spawns a recorder process (parec on Linux, sox `rec` on macOS) writing raw
 * 16-bit mono PCM, cuts it into fixed frames, scores each frame with the VAD
 * gate, and hands frames to the listener through a bounded queue.
 *
 * Responsibilities:
 * - Check the recorder exists before the first session
 * - Start and stop the recorder per listening session (restartable)
 * - Convert PCM to Float32 frames tagged with voice activity
 * - Drop the oldest frames if the consumer falls behind
 */

import { spawn, exec, type ChildProcess } from "child_process";

import { AsyncQueue } from "./async-queue.js";
import { BYTES_PER_SAMPLE, bufferToFloat32 } from "./audio.js";
import { CaptureError, errorMessage } from "./errors.js";
import type { VadGate } from "./vad.js";
import type { AudioFrame, CaptureSource } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Frames buffered between the recorder and the listener (about 16s at 512 samples / 16kHz) */
const FRAME_QUEUE_CAPACITY = 500;

// ============================================================================
// INTERFACES
// ============================================================================

export interface MicrophoneConfig {
  sampleRate: number;
  /** Samples per frame handed to the VAD */
  frameSamples: number;
  /** PulseAudio source name; default device when omitted */
  device?: string;
}

interface RecorderCommand {
  command: string;
  args: string[];
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create the microphone source.
 *
 * @param config - Sample rate, frame size and optional device
 * @param vad - Voice activity gate applied to every frame
 * @returns A restartable CaptureSource
 * @throws CaptureError when no supported recorder is installed
 */
export async function createMicrophoneSource(config: MicrophoneConfig, vad: VadGate): Promise<CaptureSource> {
  const recorder = recorderCommand(config);
  if (!(await commandExists(recorder.command))) {
    throw new CaptureError(
      process.platform === "darwin"
        ? "sox not found. Install with: brew install sox"
        : "parec not found. Install with: sudo apt install pulseaudio-utils",
    );
  }

  const frameBytes = config.frameSamples * BYTES_PER_SAMPLE;
  let proc: ChildProcess | null = null;
  let queue: AsyncQueue<AudioFrame> | null = null;

  function stop(): void {
    if (proc) {
      proc.kill();
      proc = null;
    }
    if (queue) {
      if (queue.dropped > 0) console.warn(`[capture] dropped ${queue.dropped} frames`);
      queue.close();
      queue = null;
    }
    vad.reset();
  }

  function start(): AsyncIterable<AudioFrame> {
    stop();

    const frames = new AsyncQueue<AudioFrame>(FRAME_QUEUE_CAPACITY);
    const child = spawn(recorder.command, recorder.args);
    queue = frames;
    proc = child;

    let pending = Buffer.alloc(0);
    // VAD scoring is async; chain it so frames stay in order
    let scoring: Promise<void> = Promise.resolve();

    child.stdout?.on("data", (data: Buffer) => {
      pending = Buffer.concat([pending, data]);
      while (pending.length >= frameBytes) {
        const samples = bufferToFloat32(pending.subarray(0, frameBytes));
        pending = pending.subarray(frameBytes);
        scoring = scoring
          .then(async () => {
            if (frames.closed) return;
            const voiceActive = await vad.isSpeech(samples);
            frames.push({ samples, voiceActive });
          })
          .catch((err: unknown) => {
            console.error(`[capture] VAD failed: ${errorMessage(err)}`);
            frames.close();
          });
      }
    });

    child.on("error", (err) => {
      console.error(`[capture] ${recorder.command} error: ${err.message}`);
      frames.close();
    });

    child.on("exit", (code, signal) => {
      if (proc === child) {
        console.error(`[capture] ${recorder.command} exited unexpectedly (code=${code}, signal=${signal})`);
        proc = null;
      }
      // Let already-read frames drain before ending the stream
      scoring.then(() => frames.close()).catch((err: unknown) => console.error(`[capture] ${errorMessage(err)}`));
    });

    child.stderr?.on("data", (data: Buffer) => {
      const text = data.toString().trim();
      if (text) console.log(`[capture] ${text}`);
    });

    return frames;
  }

  return { sampleRate: config.sampleRate, start, stop };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function recorderCommand(config: MicrophoneConfig): RecorderCommand {
  if (process.platform === "darwin") {
    return {
      command: "rec",
      args: ["-q", "-t", "raw", "-b", "16", "-e", "signed-integer", "-c", "1", "-r", String(config.sampleRate), "-"],
    };
  }
  const args = ["--format=s16le", `--rate=${config.sampleRate}`, "--channels=1", "--raw"];
  if (config.device) args.unshift(`--device=${config.device}`);
  return { command: "parec", args };
}

/**
 * Check whether a command exists on the system PATH.
 *
 * @param cmd - The command name to check
 */
export function commandExists(cmd: string): Promise<boolean> {
  return new Promise((resolve) => {
    exec(`command -v ${cmd}`, (error) => {
      resolve(error === null);
    });
  });
}

/**
 * Speech synthesis: playback handles, PCM player processes and the simple providers.
 *
 * Every provider returns a SpeechHandle right away; `done` settles with
 * "completed" after the audio has played out or "stopped" after stop(), and
 * rejects with SynthesisError when playback cannot happen. stop() kills the
 * player process, so sound ends within the audio daemon's buffer period.
 *
 * Responsibilities:
 * - Split replies into sentences so the first one plays while the rest generate
 * - Spawn and feed raw PCM players (pacat on Linux, sox `play` on macOS)
 * - System voice provider (say / espeak-ng) and a silent provider
 */

import { spawn, type ChildProcess } from "child_process";
import type { Writable } from "stream";

import { SynthesisError, errorMessage } from "./errors.js";
import type { SpeechHandle, Synthesizer } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** A running raw PCM playback process (16-bit signed mono) */
export interface PcmPlayer {
  /** Resolves once the chunk is accepted (honors backpressure) */
  write(pcm: Buffer): Promise<void>;
  /** Close the input and wait for the queued audio to play out */
  finish(): Promise<void>;
  /** Stop sound now */
  kill(): void;
}

export type PcmPlayerFactory = (sampleRate: number) => PcmPlayer;

/** Player executable and its arguments */
export interface PlayerCommand {
  command: string;
  args: string[];
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Synthesizer that never makes a sound. Used when TTS is disabled.
 */
export function createSilentSynthesizer(): Synthesizer {
  return {
    speak(): SpeechHandle {
      return { done: Promise.resolve("completed"), stop() {} };
    },
  };
}

/**
 * Synthesizer using the operating system's voice (`say` on macOS, `espeak-ng` elsewhere).
 */
export function createSystemSynthesizer(): Synthesizer {
  const command = process.platform === "darwin" ? "say" : "espeak-ng";

  return {
    speak(text: string): SpeechHandle {
      let stopped = false;
      const proc = spawn(command, [text], { stdio: "ignore" });

      const done = new Promise<"completed" | "stopped">((resolve, reject) => {
        proc.on("error", (err) => reject(new SynthesisError(`${command} failed: ${err.message}`, { cause: err })));
        proc.on("exit", (code) => {
          if (stopped) resolve("stopped");
          else if (code === 0) resolve("completed");
          else reject(new SynthesisError(`${command} exited with code ${code}`));
        });
      });

      return {
        done,
        stop() {
          if (stopped) return;
          stopped = true;
          proc.kill();
        },
      };
    },
  };
}

/**
 * The raw PCM player for the current platform.
 *
 * @param sampleRate - Sample rate of the PCM that will be written
 */
export function playerCommand(sampleRate: number): PlayerCommand {
  return process.platform === "darwin"
    ? { command: "play", args: ["-q", "-t", "raw", "-b", "16", "-e", "signed-integer", "-c", "1", "-r", String(sampleRate), "-"] }
    : { command: "pacat", args: ["--format=s16le", `--rate=${sampleRate}`, "--channels=1", "--raw", "--playback"] };
}

/**
 * Spawn a raw PCM player.
 *
 * A player that fails to start is logged once; later writes and finish()
 * reject with that SynthesisError.
 *
 * @param sampleRate - Sample rate of the PCM that will be written
 * @param player - Executable to run, the platform player by default
 */
export function spawnPcmPlayer(sampleRate: number, player: PlayerCommand = playerCommand(sampleRate)): PcmPlayer {
  const proc = spawn(player.command, player.args);

  let killed = false;
  let failure: SynthesisError | null = null;
  const exited = waitForExit(proc).catch((err: unknown) => {
    failure = err instanceof SynthesisError ? err : new SynthesisError(`audio player failed: ${errorMessage(err)}`, { cause: err });
    console.error(`[tts] ${failure.message}`);
  });
  const stdin = proc.stdin;

  // A killed player's stdin errors with EPIPE; report anything else
  stdin?.on("error", (err) => {
    if (!killed && !failure) console.error(`[tts] player input error: ${err.message}`);
  });

  return {
    async write(pcm: Buffer): Promise<void> {
      if (failure) throw failure;
      if (killed) return;
      if (!stdin) throw new SynthesisError("audio player has no input stream");
      await writePcm(stdin, pcm);
    },

    async finish(): Promise<void> {
      stdin?.end();
      await exited;
      if (failure) throw failure;
    },

    kill(): void {
      if (killed) return;
      killed = true;
      proc.kill();
    },
  };
}

/**
 * Write a PCM buffer to a stream, respecting backpressure.
 *
 * @param stream - Player input
 * @param pcmBuffer - Raw PCM bytes
 */
export function writePcm(stream: Writable, pcmBuffer: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ok = stream.write(pcmBuffer, (err: Error | null | undefined) => {
      if (err) reject(err);
    });
    if (ok) {
      resolve();
    } else {
      stream.once("drain", () => resolve());
    }
  });
}

/**
 * Split reply text into sentences for incremental synthesis.
 *
 * @param text - Reply text
 * @returns Non-empty sentences in order
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function waitForExit(proc: ChildProcess): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    proc.on("error", (err) => reject(new SynthesisError(`audio player failed: ${errorMessage(err)}`, { cause: err })));
    proc.on("exit", () => resolve());
  });
}

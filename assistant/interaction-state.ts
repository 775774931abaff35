/**
 * Recording state and interaction mode, each behind its own mutex.
 *
 * Responsibilities:
 * - Pure transition table for the recording state (IDLE / LISTENING / PROCESSING)
 * - Apply transitions under the state lock, rejecting illegal ones as no-ops
 * - Switch the interaction mode under the mode lock, deferring the switch
 *   until the next IDLE entry when a turn or listening session is active
 */

import { Mutex } from "./mutex.js";
import type { InteractionMode, RecordingState } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Inputs to the recording state machine */
export type StateEvent =
  | "start_listening"
  | "speech_ended"
  | "stop_signal"
  | "listen_timeout"
  | "submit_text"
  | "turn_finished"
  | "interrupt"
  | "reset";

export interface StateChange {
  from: RecordingState;
  to: RecordingState;
}

export type ModeRequestResult = "applied" | "deferred" | "unchanged";

// ============================================================================
// TRANSITIONS
// ============================================================================

/**
 * Compute the next recording state.
 *
 * PROCESSING only leaves through turn completion or interrupt; a second
 * attempt to enter it is rejected. Entering LISTENING from PROCESSING is not
 * a transition here: the orchestrator interrupts the turn first.
 *
 * @param from - Current state
 * @param event - What happened
 * @returns The next state, or null when the event is not accepted in `from`
 */
export function nextRecordingState(from: RecordingState, event: StateEvent): RecordingState | null {
  if (event === "reset") return "idle";

  switch (from) {
    case "idle":
      if (event === "start_listening") return "listening";
      if (event === "submit_text") return "processing";
      return null;

    case "listening":
      if (event === "speech_ended" || event === "stop_signal") return "processing";
      if (event === "listen_timeout" || event === "interrupt") return "idle";
      return null;

    case "processing":
      if (event === "turn_finished" || event === "interrupt") return "idle";
      return null;
  }
}

// ============================================================================
// INTERACTION STATE
// ============================================================================

export class InteractionState {
  private recording: RecordingState = "idle";
  private mode: InteractionMode;
  private deferredMode: InteractionMode | null = null;
  private readonly stateLock = new Mutex();
  private readonly modeLock = new Mutex();

  constructor(initialMode: InteractionMode) {
    this.mode = initialMode;
  }

  get recordingState(): RecordingState {
    return this.recording;
  }

  get interactionMode(): InteractionMode {
    return this.mode;
  }

  /** Mode waiting for the next IDLE entry, if any */
  get pendingMode(): InteractionMode | null {
    return this.deferredMode;
  }

  /**
   * Apply a state event under the state lock.
   *
   * @param event - What happened
   * @returns The change, or null when the event was rejected
   */
  async transition(event: StateEvent): Promise<StateChange | null> {
    return this.stateLock.runExclusive(() => {
      const from = this.recording;
      const to = nextRecordingState(from, event);
      if (to === null) return null;
      this.recording = to;
      return { from, to };
    });
  }

  /**
   * Request a mode switch under the mode lock. Outside IDLE the switch is
   * remembered and applied by applyDeferredMode.
   *
   * @param mode - Requested mode
   */
  async requestMode(mode: InteractionMode): Promise<ModeRequestResult> {
    return this.modeLock.runExclusive(() => {
      if (this.recording !== "idle") {
        if (mode === this.mode) {
          // Switching back before IDLE cancels the pending switch
          this.deferredMode = null;
          return "unchanged";
        }
        this.deferredMode = mode;
        return "deferred";
      }
      if (mode === this.mode) return "unchanged";
      this.mode = mode;
      this.deferredMode = null;
      return "applied";
    });
  }

  /**
   * Flip between voice and chat, honoring a pending switch.
   */
  async toggleMode(): Promise<ModeRequestResult> {
    const effective = this.deferredMode ?? this.mode;
    return this.requestMode(effective === "voice" ? "chat" : "voice");
  }

  /**
   * Apply a deferred mode switch. Called on every IDLE entry.
   *
   * @returns The new mode, or null when nothing was pending
   */
  async applyDeferredMode(): Promise<InteractionMode | null> {
    return this.modeLock.runExclusive(() => {
      if (this.recording !== "idle" || this.deferredMode === null) return null;
      this.mode = this.deferredMode;
      this.deferredMode = null;
      return this.mode;
    });
  }
}

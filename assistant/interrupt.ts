/**
 * Per-turn cancellation and stage wrapping.
 *
 * Responsibilities:
 * - InterruptToken: created at turn start, set on interrupt, discarded at turn end
 * - runStage: check the token before an external call, race the call against
 *   interrupt and an upstream timeout, and discard results that arrive late
 */

import { InterruptedError } from "./errors.js";

// ============================================================================
// INTERRUPT TOKEN
// ============================================================================

export class InterruptToken {
  private readonly controller = new AbortController();

  /** True once interrupt() has been called */
  get interrupted(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborts when the turn is interrupted. Pass it down to fetches and child processes. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Set the token. Later calls are no-ops. */
  interrupt(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new InterruptedError("turn"));
    }
  }

  /**
   * @param stage - Name used in the unwind error
   * @throws InterruptedError when the token is set
   */
  throwIfInterrupted(stage: string): void {
    if (this.interrupted) {
      throw new InterruptedError(stage);
    }
  }
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Run one external call as an interruptible, time-limited stage.
 *
 * The work receives a signal that aborts on interrupt or on timeout. If the
 * token is set while the call is in flight the stage rejects with
 * InterruptedError right away and whatever the call later produces is dropped.
 *
 * @param token - The turn's interrupt token
 * @param stage - Stage name for errors and logs
 * @param timeoutMs - Upstream timeout for the call
 * @param work - The external call
 * @param onTimeout - Builds the stage's timeout failure
 * @returns The call's result
 * @throws InterruptedError, the onTimeout error, or whatever the work throws
 */
export async function runStage<T>(
  token: InterruptToken,
  stage: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  onTimeout: () => Error,
): Promise<T> {
  token.throwIfInterrupted(stage);

  const stageController = new AbortController();
  let rejectCutoff: (err: Error) => void = () => {};
  const cutoff = new Promise<never>((_, reject) => {
    rejectCutoff = reject;
  });

  const timer = setTimeout(() => {
    const err = onTimeout();
    rejectCutoff(err);
    stageController.abort(err);
  }, timeoutMs);

  const onInterrupt = (): void => {
    const err = new InterruptedError(stage);
    rejectCutoff(err);
    stageController.abort(err);
  };
  token.signal.addEventListener("abort", onInterrupt, { once: true });

  const pending = work(stageController.signal);

  try {
    const result = await Promise.race([pending, cutoff]);
    // A result that lands in the same tick as the interrupt is still discarded
    token.throwIfInterrupted(stage);
    return result;
  } catch (err) {
    const reason: unknown = stageController.signal.reason;
    if (stageController.signal.aborted && reason instanceof Error) {
      pending.catch((late: unknown) => {
        console.log(`[stage] ${stage} settled after cutoff: ${late instanceof Error ? late.message : String(late)}`);
      });
      // The cutoff wins even when the work rejects from its own abort listener
      throw reason;
    }
    throw err;
  } finally {
    clearTimeout(timer);
    token.signal.removeEventListener("abort", onInterrupt);
  }
}

/**
 * Wait for a promise unless the token is set first.
 * Used for waits that have no upstream timeout, such as playback.
 *
 * @param token - The turn's interrupt token
 * @param stage - Stage name for the unwind error
 * @param promise - The promise to wait on
 * @returns The promise's value
 * @throws InterruptedError when the token is set first
 */
export async function untilInterrupted<T>(token: InterruptToken, stage: string, promise: Promise<T>): Promise<T> {
  token.throwIfInterrupted(stage);
  let rejectWait: (err: Error) => void = () => {};
  const interrupted = new Promise<never>((_, reject) => {
    rejectWait = reject;
  });
  const onInterrupt = (): void => rejectWait(new InterruptedError(stage));
  token.signal.addEventListener("abort", onInterrupt, { once: true });
  try {
    return await Promise.race([promise, interrupted]);
  } finally {
    token.signal.removeEventListener("abort", onInterrupt);
  }
}

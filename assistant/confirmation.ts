/**
 * Confirmation for destructive tools.
 *
 * The orchestrator reads the literal action back, collects the user's next
 * utterance, and asks this judge whether it explicitly approves. Anything
 * short of a clear yes, including a failed model call, counts as declined.
 */

import { InterruptedError, ModelTimeoutError, errorMessage } from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import type { LanguageModel } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface ConfirmationJudgeConfig {
  model: LanguageModel;
  timeoutMs: number;
}

export interface ConfirmationJudge {
  /**
   * @param action - The literal action that was read back
   * @param reply - What the user said next
   * @returns true only for an explicit approval
   * @throws InterruptedError when the turn is interrupted
   */
  approves(action: string, reply: string, token: InterruptToken): Promise<boolean>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * The question put to the user before a destructive tool runs.
 *
 * @param action - Literal command or text the tool will act on
 */
export function confirmationQuestion(action: string): string {
  return `I'm about to run: ${action}. Should I go ahead?`;
}

export function createConfirmationJudge(config: ConfirmationJudgeConfig): ConfirmationJudge {
  const { model, timeoutMs } = config;

  async function approves(action: string, reply: string, token: InterruptToken): Promise<boolean> {
    if (reply.trim() === "") return false;

    const prompt =
      `The assistant asked: "${confirmationQuestion(action)}"\n` +
      `The user replied: "${reply}"\n\n` +
      "Does the reply explicitly approve running it? Hesitation, questions, or changes of plan are not approval. " +
      "Reply with ONLY YES or NO.";

    let answer: string;
    try {
      answer = await runStage(
        token,
        "confirmation",
        timeoutMs,
        (signal) => model.complete({ messages: [{ role: "user", content: prompt }], maxTokens: 4 }, "fast", { signal }),
        () => new ModelTimeoutError(`confirmation check timed out after ${timeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      console.warn(`[confirm] could not judge reply, treating as declined: ${errorMessage(err)}`);
      return false;
    }

    return answer.trim().toUpperCase().replace(/[^A-Z]/g, "") === "YES";
  }

  return { approves };
}

/**
 * User memory extraction.
 *
 * After a completed exchange a fast-tier call picks out durable facts about
 * the user ("works night shifts", "has a dog called Pepper"). Storage,
 * deduplication and the per-profile cap live in the profile store.
 */

import { ModelTimeoutError } from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import type { LanguageModel } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Model answer meaning "nothing worth remembering" */
const NOTHING = "NONE";

/** Facts longer than this are model rambling, not facts */
const MAX_FACT_LENGTH = 160;

// ============================================================================
// INTERFACES
// ============================================================================

export interface MemoryExtractorConfig {
  model: LanguageModel;
  timeoutMs: number;
}

export interface MemoryExtractor {
  /**
   * @returns New facts, possibly empty
   * @throws ModelUnavailableError / ModelTimeoutError when the model call fails
   */
  extractFacts(user: string, assistant: string, known: readonly string[], token: InterruptToken): Promise<string[]>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createMemoryExtractor(config: MemoryExtractorConfig): MemoryExtractor {
  const { model, timeoutMs } = config;

  async function extractFacts(
    user: string,
    assistant: string,
    known: readonly string[],
    token: InterruptToken,
  ): Promise<string[]> {
    const knownBlock = known.length > 0 ? `Already known:\n${known.map((f) => `- ${f}`).join("\n")}\n\n` : "";
    const prompt =
      "Pick out lasting facts about the user from this exchange: name, preferences, family, work, plans. " +
      "Skip anything temporary or about the assistant, and anything already known.\n\n" +
      knownBlock +
      `User: "${user}"\nAssistant: "${assistant}"\n\n` +
      `Reply with one short fact per line starting with "- ", or ${NOTHING} if there is nothing new.`;

    const answer = await runStage(
      token,
      "memory",
      timeoutMs,
      (signal) => model.complete({ messages: [{ role: "user", content: prompt }], maxTokens: 200 }, "fast", { signal }),
      () => new ModelTimeoutError(`memory extraction timed out after ${timeoutMs}ms`),
    );

    return parseFactLines(answer);
  }

  return { extractFacts };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read "- fact" lines from model output.
 *
 * @returns Facts without the bullet, empty when the model answered NONE
 */
export function parseFactLines(answer: string): string[] {
  if (answer.trim().toUpperCase() === NOTHING) return [];
  return answer
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("- ") || line.startsWith("* "))
    .map((line) => line.slice(2).trim())
    .filter((fact) => fact !== "" && fact.length <= MAX_FACT_LENGTH && fact.toUpperCase() !== NOTHING);
}

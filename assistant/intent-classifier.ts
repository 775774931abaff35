/**
 * Intent classifier: picks at most one tool for an utterance.
 *
 * A separate fast-tier call so tool reasoning never leaks into the reply.
 *
 * Responsibilities:
 * - Build the routing prompt from the registry's names and descriptions
 * - Normalize the model's answer and map anything unknown to "none"
 * - Degrade model failures to "none"; only interrupts propagate
 */

import { ClassificationError, InterruptedError, ModelTimeoutError, errorMessage } from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import { NO_TOOL, describeTools, type ToolRegistry } from "./tool-registry.js";
import type { LanguageModel } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Characters stripped from the model's answer before matching */
const STRIP_PATTERN = /["'`.,!?:;()[\]{}*<>]/g;

const CLASSIFIER_MAX_TOKENS = 16;

// ============================================================================
// INTERFACES
// ============================================================================

export interface IntentClassifierConfig {
  model: LanguageModel;
  registry: ToolRegistry;
  timeoutMs: number;
}

export interface ClassificationContext {
  /** True when the previous turn already produced tool data */
  previousTurnUsedTool: boolean;
}

export interface IntentClassifier {
  /**
   * @returns A registered tool name, or "none"
   * @throws InterruptedError when the turn is interrupted
   */
  classify(utterance: string, context: ClassificationContext, token: InterruptToken): Promise<string>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createIntentClassifier(config: IntentClassifierConfig): IntentClassifier {
  const { model, registry, timeoutMs } = config;
  const toolLines = describeTools(registry);

  async function classify(utterance: string, context: ClassificationContext, token: InterruptToken): Promise<string> {
    if (registry.size === 0) return NO_TOOL;

    const prompt = buildPrompt(toolLines, utterance, context);

    let raw: string;
    try {
      raw = await runStage(
        token,
        "classification",
        timeoutMs,
        (signal) => model.complete({ messages: [{ role: "user", content: prompt }], maxTokens: CLASSIFIER_MAX_TOKENS }, "fast", { signal }),
        () => new ModelTimeoutError(`classifier timed out after ${timeoutMs}ms`),
      );
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      const failure = new ClassificationError(`classification failed: ${errorMessage(err)}`, { cause: err });
      console.warn(`[classifier] ${failure.message}, falling back to ${NO_TOOL}`);
      return NO_TOOL;
    }

    const choice = normalizeToolChoice(raw, registry);
    console.log(`[classifier] "${raw.trim()}" -> ${choice}`);
    return choice;
  }

  return { classify };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Map raw model output onto the registry vocabulary.
 *
 * Trims, lower-cases and strips quotes and punctuation, then accepts the
 * result only if it is a registered tool name.
 *
 * @param raw - Model output
 * @param registry - Registered tools
 * @returns The tool name, or "none"
 */
export function normalizeToolChoice(raw: string, registry: ToolRegistry): string {
  const cleaned = raw.trim().toLowerCase().replace(STRIP_PATTERN, "").trim();
  return registry.has(cleaned) ? cleaned : NO_TOOL;
}

function buildPrompt(toolLines: string, utterance: string, context: ClassificationContext): string {
  const followUp = context.previousTurnUsedTool
    ? "The previous turn already fetched tool data. Follow-up questions about that data need no tool.\n"
    : "";

  return (
    "You route requests for a voice assistant. Decide which single tool, if any, " +
    "is needed to answer the user's message.\n\n" +
    `Tools:\n${toolLines}\n- ${NO_TOOL}: greetings, opinions, general knowledge, and anything else. When in doubt, pick ${NO_TOOL}.\n\n` +
    followUp +
    `User message: "${utterance}"\n\n` +
    `Reply with ONLY the tool name or "${NO_TOOL}". Nothing else.`
  );
}

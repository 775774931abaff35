/**
 * Argument extractor: turns an utterance into a tool's typed arguments.
 *
 * Responsibilities:
 * - Skip the model call for tools without parameters
 * - single_value strategy: ask a tool-specific question, take the bare answer
 * - json strategy: ask for a JSON object covering the parameter schema
 * - Validate and coerce values against the schema, raising ExtractionError
 *   for missing required or malformed values
 */

import { ExtractionError, ModelTimeoutError, errorMessage } from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import type { ArgumentValue, ExtractionStrategy, LanguageModel, ParameterSpec, ToolArgs, ToolDescriptor } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Answer the single-value prompt asks for when the utterance holds no value */
const NO_VALUE = "NONE";

const EXTRACTOR_MAX_TOKENS = 200;

// ============================================================================
// INTERFACES
// ============================================================================

export interface ArgumentExtractorConfig {
  model: LanguageModel;
  timeoutMs: number;
}

export interface ArgumentExtractor {
  /**
   * @returns Arguments satisfying the tool's schema
   * @throws ExtractionError when required values are missing or malformed
   * @throws ModelTimeoutError / ModelUnavailableError when the model call fails
   * @throws InterruptedError when the turn is interrupted
   */
  extract(tool: Readonly<ToolDescriptor>, utterance: string, token: InterruptToken): Promise<ToolArgs>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createArgumentExtractor(config: ArgumentExtractorConfig): ArgumentExtractor {
  const { model, timeoutMs } = config;

  async function ask(prompt: string, token: InterruptToken): Promise<string> {
    return runStage(
      token,
      "extraction",
      timeoutMs,
      (signal) => model.complete({ messages: [{ role: "user", content: prompt }], maxTokens: EXTRACTOR_MAX_TOKENS }, "fast", { signal }),
      () => new ModelTimeoutError(`argument extraction timed out after ${timeoutMs}ms`),
    );
  }

  async function extract(tool: Readonly<ToolDescriptor>, utterance: string, token: InterruptToken): Promise<ToolArgs> {
    if (Object.keys(tool.parameters).length === 0) return {};

    const strategy: ExtractionStrategy = tool.extraction ?? { kind: "json" };

    if (strategy.kind === "single_value") {
      const answer = await ask(
        `${strategy.prompt} Reply with ONLY the value, nothing else. ` +
          `If the message does not contain one, reply ${NO_VALUE}.\n\nMessage: "${utterance}"`,
        token,
      );
      const value = stripQuotes(answer);
      const raw: Record<string, unknown> = {};
      if (value !== "" && value.toUpperCase() !== NO_VALUE) {
        raw[strategy.parameter] = value;
      }
      return validateArgs(tool.name, tool.parameters, raw);
    }

    const answer = await ask(buildJsonPrompt(tool, utterance, strategy.hint), token);
    let parsed: unknown;
    try {
      parsed = parseJsonObject(answer);
    } catch (err) {
      throw new ExtractionError(`could not read arguments for ${tool.name}: ${errorMessage(err)}`, { cause: err });
    }
    return validateArgs(tool.name, tool.parameters, parsed);
  }

  return { extract };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Check raw values against a parameter schema.
 *
 * Unknown keys are dropped; null and empty strings count as absent; numeric
 * and boolean strings are coerced; numbers become strings where a string is
 * expected.
 *
 * @param toolName - For error messages
 * @param parameters - The tool's schema
 * @param raw - Decoded model output
 * @returns Validated arguments
 * @throws ExtractionError on a missing required value or a value of the wrong type
 */
export function validateArgs(toolName: string, parameters: Readonly<Record<string, ParameterSpec>>, raw: unknown): ToolArgs {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ExtractionError(`arguments for ${toolName} must be an object`);
  }

  const args: Record<string, ArgumentValue> = {};
  for (const [name, spec] of Object.entries(parameters)) {
    const value: unknown = Reflect.get(raw, name);
    if (value === undefined || value === null || value === "") {
      if (spec.required) {
        throw new ExtractionError(`missing required argument "${name}" for ${toolName}`);
      }
      continue;
    }
    args[name] = coerce(toolName, name, spec, value);
  }
  return args;
}

function coerce(toolName: string, name: string, spec: ParameterSpec, value: unknown): ArgumentValue {
  switch (spec.type) {
    case "string":
      if (typeof value === "string") return value.trim();
      if (typeof value === "number" && Number.isFinite(value)) return String(value);
      break;
    case "number":
      if (typeof value === "number" && Number.isFinite(value)) return value;
      if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
      break;
    case "boolean":
      if (typeof value === "boolean") return value;
      if (value === "true" || value === "false") return value === "true";
      break;
  }
  throw new ExtractionError(`argument "${name}" for ${toolName} must be a ${spec.type}`);
}

/**
 * Pull the first JSON object out of model output, tolerating code fences and
 * surrounding prose.
 *
 * @throws SyntaxError when no object can be parsed
 */
export function parseJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end < start) {
    throw new SyntaxError("no JSON object in model output");
  }
  return JSON.parse(text.slice(start, end + 1));
}

function stripQuotes(text: string): string {
  return text.trim().replace(/^["'`]+|["'`]+$/g, "").trim();
}

function buildJsonPrompt(tool: Readonly<ToolDescriptor>, utterance: string, hint: string | undefined): string {
  const fields = Object.entries(tool.parameters)
    .map(([name, spec]) => `- ${name} (${spec.type}, ${spec.required ? "required" : "optional"}): ${spec.description}`)
    .join("\n");

  return (
    `Extract the arguments for the ${tool.name} tool from the user's message.\n\n` +
    `Arguments:\n${fields}\n\n` +
    (hint ? `${hint}\n\n` : "") +
    `Message: "${utterance}"\n\n` +
    "Reply with ONLY a JSON object using these argument names. Leave out arguments the message does not give."
  );
}

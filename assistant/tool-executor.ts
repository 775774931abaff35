/**
 * Tool executor: runs at most one tool per turn.
 *
 * Responsibilities:
 * - Extract arguments, mapping extraction failures to structured tool failures
 * - Read destructive actions back and run them only after explicit approval
 * - Run the handler under the turn's interrupt token and a timeout
 * - Capture the result or failure, truncate long output, time the call
 */

import {
  ExtractionError,
  InterruptedError,
  ModelTimeoutError,
  ModelUnavailableError,
  ToolError,
  errorMessage,
} from "./errors.js";
import { runStage, type InterruptToken } from "./interrupt.js";
import type { ArgumentExtractor } from "./argument-extractor.js";
import type { ToolArgs, ToolDescriptor, ToolFailure, ToolInvocation, ToolResult } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const EMPTY_OUTPUT = "The tool returned no output.";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Reads the action back and collects the user's decision.
 * Resolves true only on an explicit approval.
 */
export type ConfirmAction = (action: string, token: InterruptToken) => Promise<boolean>;

export interface ToolExecutorConfig {
  extractor: ArgumentExtractor;
  /** Used when a descriptor sets no timeout of its own */
  defaultTimeoutMs: number;
  /** Output beyond this many words is cut */
  maxResultWords: number;
}

export interface ToolExecutor {
  /**
   * Extract arguments and run the tool.
   *
   * @returns The invocation, successful or failed
   * @throws InterruptedError when the turn is interrupted
   */
  invoke(tool: Readonly<ToolDescriptor>, utterance: string, token: InterruptToken, confirm: ConfirmAction): Promise<ToolInvocation>;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createToolExecutor(config: ToolExecutorConfig): ToolExecutor {
  const { extractor, defaultTimeoutMs, maxResultWords } = config;

  async function invoke(
    tool: Readonly<ToolDescriptor>,
    utterance: string,
    token: InterruptToken,
    confirm: ConfirmAction,
  ): Promise<ToolInvocation> {
    const started = performance.now();
    const finish = (args: ToolArgs, result: ToolResult): ToolInvocation => ({
      toolName: tool.name,
      args,
      result,
      elapsedMs: Math.round(performance.now() - started),
    });

    let args: ToolArgs;
    try {
      args = await extractor.extract(tool, utterance, token);
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      return finish({}, { ok: false, error: extractionFailure(err) });
    }

    if (tool.describeAction) {
      const action = tool.describeAction(args);
      const approved = await confirm(action, token);
      token.throwIfInterrupted(`confirm:${tool.name}`);
      if (!approved) {
        console.log(`[tool] ${tool.name} declined: ${action}`);
        return finish(args, { ok: false, error: { kind: "declined", message: `The user declined: ${action}` } });
      }
    }

    const timeoutMs = tool.timeoutMs ?? defaultTimeoutMs;
    try {
      const text = await runStage(
        token,
        `tool:${tool.name}`,
        timeoutMs,
        (signal) => tool.handler(args, signal),
        () => new ToolError("timeout", `${tool.name} did not finish within ${timeoutMs}ms`),
      );
      const trimmed = text.trim();
      return finish(args, { ok: true, text: trimmed === "" ? EMPTY_OUTPUT : truncateWords(trimmed, maxResultWords) });
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      if (err instanceof ToolError) return finish(args, { ok: false, error: err.toFailure() });
      return finish(args, { ok: false, error: { kind: "failed", message: errorMessage(err) } });
    }
  }

  return { invoke };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function extractionFailure(err: unknown): ToolFailure {
  if (err instanceof ExtractionError) return { kind: "invalid_arguments", message: err.message };
  if (err instanceof ModelTimeoutError) return { kind: "timeout", message: err.message };
  if (err instanceof ModelUnavailableError) return { kind: "network_unavailable", message: err.message };
  return { kind: "invalid_arguments", message: errorMessage(err) };
}

/**
 * Cut text to a word budget. Whitespace is collapsed only when a cut happens.
 *
 * @param text - Tool output
 * @param maxWords - Word budget
 * @returns The text, or its first maxWords words followed by " ..."
 */
export function truncateWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/).filter((w) => w !== "");
  if (words.length <= maxWords) return text;
  return `${words.slice(0, maxWords).join(" ")} ...`;
}

/**
 * One-line event log summary of an invocation.
 */
export function summarizeInvocation(invocation: ToolInvocation): string {
  const status = invocation.result.ok ? "ok" : `${invocation.result.error.kind}`;
  return `tool ${invocation.toolName} ${status} (${invocation.elapsedMs}ms)`;
}

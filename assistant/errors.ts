/**
 * Error classes for the assistant pipeline.
 *
 * Each stage of a turn fails with its own class so the orchestrator can decide
 * whether the failure ends the turn, degrades it, or becomes tool data.
 */

import type { ToolErrorKind, ToolFailure } from "./types.js";

/** Base class so callers can tell pipeline failures from programming errors */
export class AssistantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Microphone could not be opened or stopped producing audio */
export class CaptureError extends AssistantError {}

/** Audio was empty, too short, or the STT backend failed */
export class TranscriptionError extends AssistantError {}

/** Classifier call failed. Never escapes the classifier: it degrades to "none". */
export class ClassificationError extends AssistantError {}

/** Arguments missing or malformed. Becomes an invalid_arguments tool failure. */
export class ExtractionError extends AssistantError {}

/** Structured tool failure, passed to the responder as tool data */
export class ToolError extends AssistantError {
  readonly kind: ToolErrorKind;

  constructor(kind: ToolErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
  }

  toFailure(): ToolFailure {
    return { kind: this.kind, message: this.message };
  }
}

/** Responder could not produce a reply */
export class ResponseError extends AssistantError {}

/** Playback could not start. The reply stays visible as text. */
export class SynthesisError extends AssistantError {}

export class ModelUnavailableError extends AssistantError {}

export class ModelTimeoutError extends AssistantError {}

/** Internal unwind of an interrupted turn. Never shown to the user. */
export class InterruptedError extends AssistantError {
  readonly stage: string;

  constructor(stage: string) {
    super(`interrupted during ${stage}`);
    this.stage = stage;
  }
}

/** Bad setup detected at startup: duplicate tool names, missing API keys */
export class ConfigurationError extends AssistantError {}

/**
 * Render any thrown value as a one-line message.
 *
 * @param err - The caught value
 * @returns Its message, or its string form when it is not an Error
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

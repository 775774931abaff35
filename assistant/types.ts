/**
 * Shared types for the voice/chat assistant pipeline.
 *
 * Defines the DTOs and collaborator interfaces used across the assistant modules:
 * - Recording state and interaction mode
 * - Conversation messages (tagged union, tool data kept distinct)
 * - Tool descriptors, arguments and invocation results
 * - Event log entries and the orchestrator signal channel
 * - External collaborators (capture, transcriber, language model, synthesizer, display)
 */

// ============================================================================
// STATE
// ============================================================================

/** Where the pipeline currently is. Mutated only under the state lock. */
export type RecordingState = "idle" | "listening" | "processing";

/** How the user talks to the assistant. Mutated only under the mode lock. */
export type InteractionMode = "voice" | "chat";

// ============================================================================
// CONVERSATION
// ============================================================================

/** Something the user said or typed */
export interface UserMessage {
  role: "user";
  content: string;
  timestamp: number;
}

/** A reply produced by the responder */
export interface AssistantMessage {
  role: "assistant";
  content: string;
  timestamp: number;
}

/**
 * Output of a tool run, kept in history so follow-up turns can use it.
 * Never shown in the user-facing transcript.
 */
export interface ToolDataMessage {
  role: "tool_data";
  toolName: string;
  content: string;
  ok: boolean;
  /** Whether the data sits ahead of the user's question or after it */
  placement: ResultPlacement;
  timestamp: number;
}

export type HistoryMessage = UserMessage | AssistantMessage | ToolDataMessage;

/** The part of history a person sees */
export type TranscriptMessage = UserMessage | AssistantMessage;

// ============================================================================
// TOOLS
// ============================================================================

export type ParameterType = "string" | "number" | "boolean";

export interface ParameterSpec {
  type: ParameterType;
  description: string;
  required: boolean;
}

export type ArgumentValue = string | number | boolean;

/** Validated tool arguments keyed by parameter name */
export type ToolArgs = Readonly<Record<string, ArgumentValue>>;

/**
 * How the argument extractor turns an utterance into arguments.
 * - json: ask the model for a JSON object covering every parameter
 * - single_value: ask a tool-specific question whose answer is one parameter
 */
export type ExtractionStrategy =
  | { kind: "json"; hint?: string }
  | { kind: "single_value"; parameter: string; prompt: string };

export type ResultPlacement = "before_question" | "after_question";

/**
 * Tool handler. Receives validated arguments and an abort signal that fires
 * on interrupt or timeout. Throws ToolError for structured failures.
 */
export type ToolHandler = (args: ToolArgs, signal: AbortSignal) => Promise<string>;

export interface ToolDescriptor {
  /** Unique, lower snake case, never "none" */
  name: string;
  /** Shown to the classifier */
  description: string;
  parameters: Readonly<Record<string, ParameterSpec>>;
  handler: ToolHandler;
  /** Defaults to json extraction */
  extraction?: ExtractionStrategy;
  /**
   * Present on destructive tools. Returns the literal action read back to
   * the user before the handler is allowed to run.
   */
  describeAction?: (args: ToolArgs) => string;
  /** Defaults to after_question */
  resultPlacement?: ResultPlacement;
  /** Overrides the default tool timeout */
  timeoutMs?: number;
}

export type ToolErrorKind =
  | "permission_denied"
  | "network_unavailable"
  | "not_found"
  | "out_of_range"
  | "invalid_arguments"
  | "timeout"
  | "declined"
  | "failed";

export interface ToolFailure {
  kind: ToolErrorKind;
  message: string;
}

export type ToolResult = { ok: true; text: string } | { ok: false; error: ToolFailure };

/** One tool run. Lives for a single turn; only a summary reaches the event log. */
export interface ToolInvocation {
  toolName: string;
  args: ToolArgs;
  result: ToolResult;
  elapsedMs: number;
}

// ============================================================================
// EVENTS AND SIGNALS
// ============================================================================

export type EventLevel = "info" | "warn" | "error";

export interface EventLogEntry {
  timestamp: number;
  level: EventLevel;
  summary: string;
}

/** How a listening session ended. Produced exactly once per session. */
export type ListenOutcome =
  | { kind: "speech"; audio: Float32Array; reason: "silence" | "stopped" | "max_duration" }
  | { kind: "no_speech"; reason: "timeout" | "stopped" }
  | { kind: "interrupted" }
  | { kind: "failed"; message: string };

/** How a pipeline turn ended */
export type TurnOutcome = "completed" | "interrupted" | "failed";

export interface TurnReport {
  outcome: TurnOutcome;
  /** True when playback finished in voice mode and the mic should reopen */
  autoListen: boolean;
  /** Set once user and assistant text were committed to history */
  exchange: { user: string; assistant: string } | null;
  /** Status line to leave up on IDLE instead of the usual prompt */
  status?: string;
}

/** Messages accepted by the orchestrator's signal channel */
export type Signal =
  | { kind: "push_to_talk" }
  | { kind: "stop_listening" }
  | { kind: "interrupt" }
  | { kind: "toggle_mode" }
  | { kind: "set_mode"; mode: InteractionMode }
  | { kind: "chat_input"; text: string }
  | { kind: "listen_finished"; listenId: number; outcome: ListenOutcome }
  | { kind: "turn_finished"; turnId: number; report: TurnReport }
  | { kind: "switch_profile"; profile: string }
  /** Settings or facts were edited outside the pipeline */
  | { kind: "reload_profile" }
  | { kind: "shutdown" };

// ============================================================================
// EXTERNAL COLLABORATORS
// ============================================================================

export interface AudioFrame {
  /** Mono samples normalized to -1.0..1.0 */
  samples: Float32Array;
  voiceActive: boolean;
}

/** Microphone stream. start() may be called again after stop(). */
export interface CaptureSource {
  readonly sampleRate: number;
  start(): AsyncIterable<AudioFrame>;
  stop(): void;
}

export interface Transcriber {
  /** @throws TranscriptionError on empty or unusable audio */
  transcribe(audio: Float32Array, signal: AbortSignal): Promise<string>;
}

export type ModelTier = "fast" | "main";

export interface ModelMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  system?: string;
  messages: ModelMessage[];
  maxTokens?: number;
}

export interface CallOptions {
  signal: AbortSignal;
}

export type ImageMediaType = "image/png" | "image/jpeg";

/** Fails with ModelUnavailableError or ModelTimeoutError */
export interface LanguageModel {
  complete(request: CompletionRequest, tier: ModelTier, options: CallOptions): Promise<string>;
  stream(request: CompletionRequest, tier: ModelTier, options: CallOptions): AsyncIterable<string>;
  describeImage(image: Buffer, mediaType: ImageMediaType, prompt: string, options: CallOptions): Promise<string>;
}

export interface SpeechHandle {
  done: Promise<"completed" | "stopped">;
  /** Idempotent */
  stop(): void;
}

export interface Synthesizer {
  /** @throws SynthesisError when playback cannot start */
  speak(text: string): SpeechHandle;
}

/** Rendering layer. Every call is fire-and-forget. */
export interface DisplaySink {
  onStateChanged(state: RecordingState, mode: InteractionMode): void;
  onMessage(role: TranscriptMessage["role"], text: string): void;
  onEvent(entry: EventLogEntry): void;
  onStatus(text: string): void;
  onToken(text: string): void;
}

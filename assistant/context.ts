/**
 * AssistantContext: everything one orchestrator owns, built in one place.
 *
 * Responsibilities:
 * - Validate and freeze the tool registry before anything can run
 * - Own the event log, the interaction state (with its two locks) and the
 *   active profile's conversation history
 * - Wire the pipeline stages (classifier, extractor, executor, responder,
 *   confirmation judge, memory extractor) to the shared language model
 */

import { createArgumentExtractor } from "./argument-extractor.js";
import { createConfirmationJudge, type ConfirmationJudge } from "./confirmation.js";
import { ConversationHistory } from "./conversation.js";
import { EventLog } from "./event-log.js";
import { createIntentClassifier, type IntentClassifier } from "./intent-classifier.js";
import { InteractionState } from "./interaction-state.js";
import { createMemoryExtractor, type MemoryExtractor } from "./memory.js";
import { createResponder, type Responder } from "./responder.js";
import { createToolExecutor, type ToolExecutor } from "./tool-executor.js";
import { buildToolRegistry, type ToolRegistry } from "./tool-registry.js";
import type {
  CaptureSource,
  DisplaySink,
  HistoryMessage,
  InteractionMode,
  LanguageModel,
  Synthesizer,
  ToolDescriptor,
  Transcriber,
} from "./types.js";
import type { ProfileStore } from "../services/profile-store.js";

// ============================================================================
// INTERFACES
// ============================================================================

/** Durations in milliseconds plus the tool output budget */
export interface PipelineConfig {
  /** Continuous non-speech after speech that ends an utterance */
  silenceMs: number;
  /** No speech at all within this window ends a manual listen */
  listenTimeoutMs: number;
  /** Shorter window for the automatic re-listen after a spoken reply */
  autoListenTimeoutMs: number;
  maxRecordingMs: number;
  transcriptionTimeoutMs: number;
  classifierTimeoutMs: number;
  extractionTimeoutMs: number;
  responseTimeoutMs: number;
  toolTimeoutMs: number;
  memoryTimeoutMs: number;
  maxResultWords: number;
  /** History window sent to the responder */
  maxHistoryMessages: number;
  /** Global switches layered over the profile's own settings */
  memoryEnabled: boolean;
  speakInChat: boolean;
}

export interface AssistantCollaborators {
  capture: CaptureSource;
  transcriber: Transcriber;
  model: LanguageModel;
  synthesizer: Synthesizer;
  display: DisplaySink;
  profiles: ProfileStore;
}

export interface AssistantContext extends AssistantCollaborators {
  readonly config: PipelineConfig;
  readonly registry: ToolRegistry;
  readonly eventLog: EventLog;
  readonly state: InteractionState;
  readonly history: ConversationHistory;
  readonly classifier: IntentClassifier;
  readonly executor: ToolExecutor;
  readonly responder: Responder;
  readonly judge: ConfirmationJudge;
  readonly memory: MemoryExtractor;
}

export interface AssistantContextOptions extends AssistantCollaborators {
  config: PipelineConfig;
  tools: readonly ToolDescriptor[];
  initialMode: InteractionMode;
  initialHistory?: readonly HistoryMessage[];
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the context. Fails before any audio or model work starts.
 *
 * @throws ConfigurationError on an invalid or duplicate tool
 */
export function createAssistantContext(options: AssistantContextOptions): AssistantContext {
  const { config, tools, initialMode, initialHistory, ...collaborators } = options;
  const { model } = collaborators;

  const registry = buildToolRegistry(tools);
  const extractor = createArgumentExtractor({ model, timeoutMs: config.extractionTimeoutMs });

  return {
    ...collaborators,
    config,
    registry,
    eventLog: new EventLog(),
    state: new InteractionState(initialMode),
    history: new ConversationHistory(config.maxHistoryMessages, initialHistory ?? []),
    classifier: createIntentClassifier({ model, registry, timeoutMs: config.classifierTimeoutMs }),
    executor: createToolExecutor({
      extractor,
      defaultTimeoutMs: config.toolTimeoutMs,
      maxResultWords: config.maxResultWords,
    }),
    responder: createResponder({ model, timeoutMs: config.responseTimeoutMs }),
    judge: createConfirmationJudge({ model, timeoutMs: config.classifierTimeoutMs }),
    memory: createMemoryExtractor({ model, timeoutMs: config.memoryTimeoutMs }),
  };
}

/**
 * Pipeline orchestrator: the only writer of interaction state, history and
 * the event log.
 *
 * Everything that happens to the assistant arrives as a Signal on one queue:
 * key presses, dashboard requests, finished listening sessions and finished
 * turns. The loop handles signals one at a time; listening and turns run as
 * tasks that report back through the same queue.
 *
 * Responsibilities:
 * - Drive IDLE -> LISTENING -> PROCESSING -> IDLE and the deferred mode switch
 * - Run one turn at a time: transcribe, classify, run at most one tool,
 *   respond, commit history, speak
 * - Interrupt any stage through the turn's InterruptToken and wait for the
 *   unwind before listening again
 * - Ask for confirmation before destructive tools, by voice or by text
 * - Re-listen after a spoken reply in voice mode
 * - Persist exchanges and learned facts per profile, off the turn's path
 * - Switch profiles, force-interrupting a turn in flight
 */

import { confirmationQuestion } from "./confirmation.js";
import type { AssistantContext } from "./context.js";
import { InterruptedError, SynthesisError, TranscriptionError, errorMessage } from "./errors.js";
import type { StateEvent } from "./interaction-state.js";
import { InterruptToken, runStage, untilInterrupted } from "./interrupt.js";
import { startListening, type ListenSession } from "./listener.js";
import { APOLOGY_REPLY, type ResponseResult } from "./responder.js";
import { buildSystemPrompt } from "./system-prompt.js";
import { summarizeInvocation } from "./tool-executor.js";
import { AsyncQueue } from "./async-queue.js";
import type {
  EventLevel,
  EventLogEntry,
  InteractionMode,
  ListenOutcome,
  RecordingState,
  Signal,
  SpeechHandle,
  ToolDataMessage,
  TurnReport,
  UserMessage,
} from "./types.js";
import { DEFAULT_PROFILE_SETTINGS, isValidProfileName, type ProfileSettings } from "../services/profile-store.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const STATUS = {
  idleVoice: "Press SPACE to talk",
  idleChat: "Type your message",
  listening: "Listening...",
  processing: "Processing...",
  speaking: "Speaking... (press SPACE to interrupt)",
  noSpeech: "No speech detected",
  confirmTyped: "Type yes to go ahead, anything else to cancel",
  modelUnavailable: "Could not get a reply, please try again",
} as const;

/** How long a typed confirmation may take before it counts as declined */
const TYPED_CONFIRMATION_TIMEOUT_MS = 60_000;

// ============================================================================
// INTERFACES
// ============================================================================

type TurnInput = { kind: "voice"; audio: Float32Array } | { kind: "text"; text: string };

interface ActiveTurn {
  id: number;
  token: InterruptToken;
  done: Promise<TurnReport>;
}

interface ActiveListen {
  id: number;
  session: ListenSession;
}

export interface AssistantDiagnostics {
  state: RecordingState;
  mode: InteractionMode;
  pendingMode: InteractionMode | null;
  profile: string;
  sessionId: string;
  historyLength: number;
  tools: string[];
  events: readonly EventLogEntry[];
}

export interface Orchestrator {
  /** Enqueue a signal. Safe to call from any task. */
  send(signal: Signal): void;
  /** Process signals until shutdown */
  run(): Promise<void>;
  diagnostics(): AssistantDiagnostics;
  readonly profile: string;
  readonly sessionId: string;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create an orchestrator over a context and activate the starting profile:
 * its settings, facts and recent messages are loaded and a session is opened.
 *
 * @param context - Registry, state, history and collaborators
 * @param profileName - Profile to start with
 */
export async function createOrchestrator(context: AssistantContext, profileName: string): Promise<Orchestrator> {
  const { config, state, history, eventLog, registry, display, profiles, capture, transcriber, synthesizer } = context;

  const queue = new AsyncQueue<Signal>();
  let nextId = 0;
  let listen: ActiveListen | null = null;
  let turn: ActiveTurn | null = null;
  let typedReply: ((text: string) => void) | null = null;
  let persistence: Promise<void> = Promise.resolve();

  let profile = profileName;
  let settings: ProfileSettings = { ...DEFAULT_PROFILE_SETTINGS };
  let facts: string[] = [];
  let sessionId = "";

  // ==========================================================================
  // STATE AND DISPLAY
  // ==========================================================================

  function record(level: EventLevel, summary: string): void {
    const entry = eventLog.record(level, summary);
    display.onEvent(entry);
    const line = `[orchestrator] ${summary}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  function publishState(): void {
    display.onStateChanged(state.recordingState, state.interactionMode);
  }

  function idlePrompt(): string {
    return state.interactionMode === "voice" ? STATUS.idleVoice : STATUS.idleChat;
  }

  async function transition(event: StateEvent): Promise<boolean> {
    const change = await state.transition(event);
    if (change === null) {
      console.log(`[orchestrator] ${event} ignored while ${state.recordingState}`);
      return false;
    }
    console.log(`[orchestrator] ${change.from} -> ${change.to} (${event})`);
    publishState();
    return true;
  }

  function memoryOn(): boolean {
    return config.memoryEnabled && settings.memoryEnabled;
  }

  function speaksInChat(): boolean {
    return config.speakInChat || settings.speakInChat;
  }

  /** Apply a deferred mode switch, then re-listen or show the idle prompt */
  async function enterIdle(options: { autoListen?: boolean; status?: string } = {}): Promise<void> {
    await applyDeferredMode();
    if (options.autoListen && state.interactionMode === "voice") {
      await beginListening(config.autoListenTimeoutMs);
      return;
    }
    display.onStatus(options.status ?? idlePrompt());
  }

  async function applyDeferredMode(): Promise<void> {
    const applied = await state.applyDeferredMode();
    if (applied !== null) {
      record("info", `mode switched to ${applied}`);
      publishState();
      rememberMode(applied);
    }
  }

  function rememberMode(mode: InteractionMode): void {
    settings = { ...settings, interactionMode: mode };
    const owner = profile;
    const snapshot = settings;
    persistence = persistence
      .then(() => profiles.saveProfile(owner, snapshot))
      .catch((err) => console.error(`[orchestrator] could not save mode for ${owner}: ${errorMessage(err)}`));
  }

  // ==========================================================================
  // LISTENING
  // ==========================================================================

  async function beginListening(timeoutMs: number): Promise<void> {
    if (!(await transition("start_listening"))) return;

    const id = ++nextId;
    const session = startListening(capture, {
      silenceMs: config.silenceMs,
      timeoutMs,
      maxDurationMs: config.maxRecordingMs,
    });
    listen = { id, session };
    display.onStatus(STATUS.listening);

    session.result
      .then((outcome) => queue.push({ kind: "listen_finished", listenId: id, outcome }))
      .catch((err) => console.error(`[orchestrator] listen ${id} failed: ${errorMessage(err)}`));
  }

  /** Discard the current recording. The caller moves the state. */
  function cancelListen(): void {
    if (listen === null) return;
    const { session } = listen;
    listen = null;
    session.cancel();
  }

  async function onListenFinished(id: number, outcome: ListenOutcome): Promise<void> {
    // A session cancelled by an interrupt or profile switch reports late
    if (listen === null || listen.id !== id) return;
    listen = null;

    switch (outcome.kind) {
      case "speech":
        if (await transition(outcome.reason === "stopped" ? "stop_signal" : "speech_ended")) {
          startTurn({ kind: "voice", audio: outcome.audio });
        }
        return;
      case "no_speech":
        await transition("listen_timeout");
        await enterIdle({ status: STATUS.noSpeech });
        return;
      case "interrupted":
        return;
      case "failed":
        record("error", `microphone failed: ${outcome.message}`);
        await transition("reset");
        await enterIdle({ status: `Microphone error: ${outcome.message}` });
        return;
      default: {
        const unreachable: never = outcome;
        throw new Error(`unknown listen outcome ${JSON.stringify(unreachable)}`);
      }
    }
  }

  // ==========================================================================
  // TURNS
  // ==========================================================================

  function startTurn(input: TurnInput): void {
    const id = ++nextId;
    const token = new InterruptToken();
    const done = runTurn(input, token).catch((err: unknown): TurnReport => {
      console.error(`[orchestrator] turn ${id} crashed: ${errorMessage(err)}`);
      return { outcome: "failed", autoListen: false, exchange: null, status: "Something went wrong, please try again" };
    });
    turn = { id, token, done };

    done
      .then((report) => queue.push({ kind: "turn_finished", turnId: id, report }))
      .catch((err) => console.error(`[orchestrator] turn ${id} report lost: ${errorMessage(err)}`));
  }

  async function onTurnFinished(id: number, report: TurnReport): Promise<void> {
    // Interrupted turns are settled by interruptTurn; their report arrives stale
    if (turn === null || turn.id !== id) return;
    turn = null;
    if (report.exchange !== null) schedulePersist(report.exchange);
    if (report.outcome !== "completed") record("warn", `turn ${report.outcome}`);
    await transition("turn_finished");
    await enterIdle({ autoListen: report.autoListen, status: report.status });
  }

  /** Interrupt the turn in flight and wait until it has fully unwound. Leaves the state IDLE. */
  async function interruptTurn(reason: string): Promise<void> {
    if (turn === null) return;
    const active = turn;
    turn = null;

    const started = Date.now();
    active.token.interrupt();
    const report = await active.done;
    record("info", `turn interrupted by ${reason} (+${Date.now() - started}ms)`);

    if (report.exchange !== null) schedulePersist(report.exchange);
    await transition("interrupt");
  }

  async function runTurn(input: TurnInput, token: InterruptToken): Promise<TurnReport> {
    const mode = state.interactionMode;
    const turnSettings = settings;
    const turnFacts = memoryOn() ? facts : [];
    let exchange: TurnReport["exchange"] = null;

    try {
      display.onStatus(STATUS.processing);

      let text: string;
      if (input.kind === "voice") {
        text = await transcribe(input.audio, token);
        if (text === "") {
          return { outcome: "failed", autoListen: false, exchange: null, status: STATUS.noSpeech };
        }
      } else {
        text = input.text;
      }
      display.onMessage("user", text);

      const question: UserMessage = { role: "user", content: text, timestamp: Date.now() };

      // Classify, then run at most one tool
      const toolName = await context.classifier.classify(text, { previousTurnUsedTool: history.lastTurnUsedTool() }, token);
      const tool = registry.get(toolName);
      let toolData: ToolDataMessage | null = null;

      if (tool !== undefined) {
        record("info", `tool ${tool.name} selected`);
        display.onStatus(`Using ${tool.name}...`);
        const invocation = await context.executor.invoke(tool, text, token, (action, t) => confirm(action, mode, t));
        const { result } = invocation;
        record(result.ok ? "info" : "warn", summarizeInvocation(invocation));
        toolData = {
          role: "tool_data",
          toolName: tool.name,
          content: result.ok ? result.text : result.error.message,
          ok: result.ok,
          placement: tool.resultPlacement ?? "after_question",
          timestamp: Date.now(),
        };
        display.onStatus(STATUS.processing);
      }

      // Respond; chat mode streams tokens to the display
      let reply: ResponseResult;
      try {
        reply = await context.responder.respond(
          { system: buildSystemPrompt(turnSettings, turnFacts), history: history.messages, question, toolData },
          token,
          mode === "chat" ? (piece) => display.onToken(piece) : undefined,
        );
      } catch (err) {
        if (err instanceof InterruptedError) throw err;
        record("error", errorMessage(err));
        display.onMessage("assistant", APOLOGY_REPLY);
        return { outcome: "failed", autoListen: false, exchange: null, status: STATUS.modelUnavailable };
      }
      if (reply.retried) record("warn", "empty reply with tool data, retried without it");

      token.throwIfInterrupted("response");
      display.onMessage("assistant", reply.text);
      if (!reply.fallback) {
        history.commitTurn({ question, toolData, reply: reply.text });
        exchange = { user: text, assistant: reply.text };
      }

      if (mode === "chat" && !speaksInChat()) {
        return { outcome: "completed", autoListen: false, exchange };
      }
      const playback = await speak(reply.text, token);
      return { outcome: "completed", autoListen: mode === "voice" && playback === "completed", exchange };
    } catch (err) {
      if (err instanceof InterruptedError) {
        console.log(`[orchestrator] turn unwound during ${err.stage}`);
        return { outcome: "interrupted", autoListen: false, exchange };
      }
      throw err;
    }
  }

  /**
   * @returns Trimmed text; empty when nothing usable was said
   */
  async function transcribe(audio: Float32Array, token: InterruptToken): Promise<string> {
    const started = Date.now();
    try {
      const text = await runStage(
        token,
        "transcription",
        config.transcriptionTimeoutMs,
        (signal) => transcriber.transcribe(audio, signal),
        () => new TranscriptionError(`transcription timed out after ${config.transcriptionTimeoutMs}ms`),
      );
      console.log(`[orchestrator] transcribed in +${Date.now() - started}ms`);
      return text.trim();
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      record("warn", `transcription failed: ${errorMessage(err)}`);
      return "";
    }
  }

  /**
   * Speak text and wait for playback. Stops playback on interrupt.
   *
   * @returns How playback ended; "failed" means the reply stays text-only
   */
  async function speak(text: string, token: InterruptToken): Promise<"completed" | "stopped" | "failed"> {
    token.throwIfInterrupted("playback");
    display.onStatus(STATUS.speaking);

    let handle: SpeechHandle;
    try {
      handle = synthesizer.speak(text);
    } catch (err) {
      if (!(err instanceof SynthesisError)) throw err;
      record("warn", `speech unavailable: ${err.message}`);
      return "failed";
    }

    try {
      return await untilInterrupted(token, "playback", handle.done);
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      record("warn", `playback failed: ${errorMessage(err)}`);
      return "failed";
    } finally {
      if (token.interrupted) {
        handle.stop();
        handle.done.catch((err) => console.log(`[orchestrator] playback ended after interrupt: ${errorMessage(err)}`));
      }
    }
  }

  // ==========================================================================
  // CONFIRMATION
  // ==========================================================================

  /** Read the action back and wait for the user's answer within the same turn */
  async function confirm(action: string, mode: InteractionMode, token: InterruptToken): Promise<boolean> {
    const question = confirmationQuestion(action);
    record("info", `confirmation requested: ${action}`);
    display.onMessage("assistant", question);

    let reply: string;
    if (mode === "voice") {
      const playback = await speak(question, token);
      if (playback === "failed") display.onStatus(STATUS.listening);
      reply = await listenForReply(token);
    } else {
      display.onStatus(STATUS.confirmTyped);
      reply = await waitForTypedReply(token);
    }
    if (reply !== "") display.onMessage("user", reply);

    display.onStatus(STATUS.processing);
    const approved = await context.judge.approves(action, reply, token);
    record("info", `confirmation ${approved ? "approved" : "declined"}: ${action}`);
    return approved;
  }

  async function listenForReply(token: InterruptToken): Promise<string> {
    token.throwIfInterrupted("confirmation");
    display.onStatus(STATUS.listening);

    const session = startListening(capture, {
      silenceMs: config.silenceMs,
      timeoutMs: config.listenTimeoutMs,
      maxDurationMs: config.maxRecordingMs,
    });
    let outcome: ListenOutcome;
    try {
      outcome = await untilInterrupted(token, "confirmation", session.result);
    } finally {
      if (token.interrupted) session.cancel();
    }

    if (outcome.kind !== "speech") return "";
    display.onStatus(STATUS.processing);
    return transcribe(outcome.audio, token);
  }

  async function waitForTypedReply(token: InterruptToken): Promise<string> {
    try {
      return await runStage(
        token,
        "confirmation",
        TYPED_CONFIRMATION_TIMEOUT_MS,
        () =>
          new Promise<string>((resolve) => {
            typedReply = resolve;
          }),
        () => new Error("no reply to the confirmation question"),
      );
    } catch (err) {
      if (err instanceof InterruptedError) throw err;
      record("warn", errorMessage(err));
      return "";
    } finally {
      typedReply = null;
    }
  }

  // ==========================================================================
  // PROFILES AND PERSISTENCE
  // ==========================================================================

  async function activateProfile(name: string): Promise<void> {
    settings = await profiles.loadProfile(name);
    facts = await profiles.loadFacts(name);
    const recent = await profiles.loadRecentMessages(name, config.maxHistoryMessages);
    history.replace(recent);
    sessionId = await profiles.startSession(name);
    await profiles.setActiveProfile(name);
    profile = name;

    const result = await state.requestMode(settings.interactionMode);
    if (result === "applied") console.log(`[orchestrator] mode ${settings.interactionMode} from profile ${name}`);
    record("info", `profile ${name} active (${recent.length} messages restored, session ${sessionId})`);
    publishState();
  }

  function schedulePersist(exchange: { user: string; assistant: string }): void {
    const owner = profile;
    const session = sessionId;
    const learn = memoryOn();
    persistence = persistence
      .then(() => persistExchange(owner, session, exchange, learn))
      .catch((err) => record("error", `could not save exchange for ${owner}: ${errorMessage(err)}`));
  }

  async function persistExchange(
    owner: string,
    session: string,
    exchange: { user: string; assistant: string },
    learn: boolean,
  ): Promise<void> {
    await profiles.appendExchange(owner, session, exchange.user, exchange.assistant);
    if (!learn) return;

    let found: string[];
    try {
      const known = await profiles.loadFacts(owner);
      found = await context.memory.extractFacts(exchange.user, exchange.assistant, known, new InterruptToken());
    } catch (err) {
      console.warn(`[orchestrator] memory extraction failed: ${errorMessage(err)}`);
      return;
    }
    if (found.length === 0) return;

    const added = await profiles.addFacts(owner, found);
    if (added.length > 0) {
      record("info", `remembered ${added.length} new fact(s) for ${owner}`);
      if (owner === profile) facts = await profiles.loadFacts(owner);
    }
  }

  // ==========================================================================
  // SIGNAL HANDLERS
  // ==========================================================================

  /** @returns true when the loop should stop */
  async function handle(signal: Signal): Promise<boolean> {
    switch (signal.kind) {
      case "push_to_talk":
        await onPushToTalk();
        return false;

      case "stop_listening":
        if (listen !== null) listen.session.stop();
        return false;

      case "interrupt":
        if (state.recordingState === "listening") {
          cancelListen();
          await transition("interrupt");
          await enterIdle();
        } else if (state.recordingState === "processing") {
          await interruptTurn("interrupt");
          await enterIdle();
        }
        return false;

      case "toggle_mode":
      case "set_mode": {
        const result = signal.kind === "toggle_mode" ? await state.toggleMode() : await state.requestMode(signal.mode);
        if (result === "applied") {
          record("info", `mode switched to ${state.interactionMode}`);
          publishState();
          rememberMode(state.interactionMode);
          display.onStatus(idlePrompt());
        } else if (result === "deferred") {
          record("info", `mode switch to ${state.pendingMode} deferred until idle`);
        }
        return false;
      }

      case "chat_input": {
        const text = signal.text.trim();
        if (text === "") return false;
        if (typedReply !== null) {
          const resolve = typedReply;
          typedReply = null;
          resolve(text);
          return false;
        }
        // Never queued: a second turn while one runs is dropped
        if (await transition("submit_text")) {
          startTurn({ kind: "text", text });
        } else {
          display.onStatus("Still busy with the last message");
        }
        return false;
      }

      case "listen_finished":
        await onListenFinished(signal.listenId, signal.outcome);
        return false;

      case "turn_finished":
        await onTurnFinished(signal.turnId, signal.report);
        return false;

      case "switch_profile":
        await onSwitchProfile(signal.profile);
        return false;

      case "reload_profile":
        settings = await profiles.loadProfile(profile);
        facts = await profiles.loadFacts(profile);
        record("info", `profile ${profile} reloaded`);
        return false;

      case "shutdown":
        cancelListen();
        await interruptTurn("shutdown");
        await persistence;
        capture.stop();
        record("info", "shutting down");
        return true;

      default: {
        const unreachable: never = signal;
        throw new Error(`unknown signal ${JSON.stringify(unreachable)}`);
      }
    }
  }

  async function onPushToTalk(): Promise<void> {
    switch (state.recordingState) {
      case "idle":
        await beginListening(config.listenTimeoutMs);
        return;
      case "listening":
        listen?.session.stop();
        return;
      case "processing":
        await interruptTurn("push-to-talk");
        await applyDeferredMode();
        await beginListening(config.listenTimeoutMs);
        return;
    }
  }

  async function onSwitchProfile(name: string): Promise<void> {
    if (!isValidProfileName(name)) {
      record("warn", `invalid profile name "${name}"`);
      return;
    }
    if (name === profile) return;

    if (state.recordingState === "listening") {
      cancelListen();
      await transition("interrupt");
    } else if (state.recordingState === "processing") {
      await interruptTurn("profile switch");
    }

    // Exchanges of the old profile land in its own session first
    await persistence;
    await activateProfile(name);
    await enterIdle();
  }

  // ==========================================================================
  // LOOP
  // ==========================================================================

  async function run(): Promise<void> {
    publishState();
    display.onStatus(idlePrompt());

    for await (const signal of queue) {
      try {
        if (await handle(signal)) break;
      } catch (err) {
        // No single signal takes the orchestrator down
        record("error", `${signal.kind} failed: ${errorMessage(err)}`);
        if (state.recordingState === "idle") display.onStatus(idlePrompt());
      }
    }
    queue.close();
  }

  await activateProfile(profile);

  return {
    send: (signal) => queue.push(signal),
    run,
    diagnostics: () => ({
      state: state.recordingState,
      mode: state.interactionMode,
      pendingMode: state.pendingMode,
      profile,
      sessionId,
      historyLength: history.length,
      tools: [...registry.keys()],
      events: eventLog.entries(),
    }),
    get profile() {
      return profile;
    },
    get sessionId() {
      return sessionId;
    },
  };
}

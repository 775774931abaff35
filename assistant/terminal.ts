/**
 * Terminal front end: renders the display sink and turns key presses into signals.
 *
 * Responsibilities:
 * - Print state changes, messages, streamed tokens and status lines
 * - Voice mode: SPACE = push to talk / interrupt (debounced), TAB = chat mode
 * - Chat mode: type a line and press ENTER, TAB = voice mode
 * - ESC interrupts in either mode; q (voice mode) or Ctrl+C quits
 */

import { emitKeypressEvents, type Key } from "readline";

import type { DisplaySink, EventLogEntry, InteractionMode, RecordingState, Signal, TranscriptMessage } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const PUSH_TO_TALK_DEBOUNCE_MS = 300;

// ============================================================================
// INTERFACES
// ============================================================================

export type KeyAction =
  | { kind: "signal"; signal: Signal }
  | { kind: "append"; text: string }
  | { kind: "backspace" }
  | { kind: "submit" }
  | { kind: "ignore" };

export interface TerminalOptions {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WritableStream;
  /** Label for assistant lines */
  assistantName?: string;
  now?: () => number;
}

export interface Terminal {
  display: DisplaySink;
  /** Start reading keys. Returns a function that restores the terminal. */
  attach(send: (signal: Signal) => void): () => void;
  setAssistantName(name: string): void;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createTerminal(options: TerminalOptions = {}): Terminal {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const now = options.now ?? Date.now;

  let assistantName = options.assistantName ?? "Assistant";
  let mode: InteractionMode = "voice";
  let buffer = "";
  let streaming = false;
  const debounce = createDebouncer(PUSH_TO_TALK_DEBOUNCE_MS, now);

  function write(text: string): void {
    output.write(text);
  }

  /** Print a full line without losing a half-typed chat message */
  function line(text: string): void {
    if (streaming) {
      write("\n");
      streaming = false;
    }
    write(`\r\x1b[K${text}\n`);
    if (mode === "chat" && buffer !== "") write(`> ${buffer}`);
  }

  const display: DisplaySink = {
    onStateChanged(_state: RecordingState, nextMode: InteractionMode): void {
      if (nextMode === mode) return;
      mode = nextMode;
      line(`-- ${nextMode} mode --`);
    },

    onMessage(role: TranscriptMessage["role"], text: string): void {
      if (role === "assistant" && streaming) {
        write("\n");
        streaming = false;
        return;
      }
      line(role === "user" ? `You: ${text}` : `${assistantName}: ${text}`);
    },

    onEvent(_entry: EventLogEntry): void {
      // The orchestrator logs every event to the console already
    },

    onStatus(text: string): void {
      line(`[${text}]`);
    },

    onToken(text: string): void {
      if (!streaming) {
        write(`\r\x1b[K${assistantName}: `);
        streaming = true;
      }
      write(text);
    },
  };

  function attach(send: (signal: Signal) => void): () => void {
    emitKeypressEvents(input);
    const raw = input.isTTY === true;
    if (raw) input.setRawMode(true);
    input.resume();

    const onKeypress = (sequence: string | undefined, key: Key | undefined): void => {
      const action = interpretKey(sequence, key, mode, buffer);
      switch (action.kind) {
        case "signal":
          if (action.signal.kind === "push_to_talk" && !debounce()) return;
          send(action.signal);
          return;
        case "append":
          buffer += action.text;
          write(action.text);
          return;
        case "backspace":
          if (buffer === "") return;
          buffer = buffer.slice(0, -1);
          write("\b \b");
          return;
        case "submit": {
          const text = buffer;
          buffer = "";
          write("\r\x1b[K");
          send({ kind: "chat_input", text });
          return;
        }
        case "ignore":
          return;
      }
    };

    input.on("keypress", onKeypress);
    return () => {
      input.off("keypress", onKeypress);
      if (raw) input.setRawMode(false);
      input.pause();
    };
  }

  return {
    display,
    attach,
    setAssistantName(name: string): void {
      assistantName = name;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Map one key press to an action for the current mode.
 *
 * @param sequence - Raw characters of the key press
 * @param key - Parsed key, absent for some pasted input
 * @param mode - Current interaction mode
 * @param buffer - Chat text typed so far
 */
export function interpretKey(sequence: string | undefined, key: Key | undefined, mode: InteractionMode, buffer: string): KeyAction {
  const name = key?.name;

  if (key?.ctrl && name === "c") return { kind: "signal", signal: { kind: "shutdown" } };
  if (name === "escape") return { kind: "signal", signal: { kind: "interrupt" } };
  if (name === "tab") return { kind: "signal", signal: { kind: "toggle_mode" } };

  if (mode === "voice") {
    if (name === "space") return { kind: "signal", signal: { kind: "push_to_talk" } };
    if (name === "q") return { kind: "signal", signal: { kind: "shutdown" } };
    return { kind: "ignore" };
  }

  if (name === "return" || name === "enter") return buffer.trim() === "" ? { kind: "ignore" } : { kind: "submit" };
  if (name === "backspace") return { kind: "backspace" };
  if (key?.ctrl || key?.meta) return { kind: "ignore" };
  if (sequence !== undefined && sequence !== "" && !/[\x00-\x1f\x7f]/.test(sequence)) {
    return { kind: "append", text: sequence };
  }
  return { kind: "ignore" };
}

/**
 * Returns a gate that opens at most once per interval.
 */
export function createDebouncer(intervalMs: number, now: () => number = Date.now): () => boolean {
  let last = -Infinity;
  return () => {
    const t = now();
    if (t - last < intervalMs) return false;
    last = t;
    return true;
  };
}

/**
 * Fans display notifications out to several sinks (terminal, dashboard feed).
 * A sink that throws is logged and does not stop the others.
 */

import type { DisplaySink, EventLogEntry, InteractionMode, RecordingState, TranscriptMessage } from "./types.js";

export function createDisplayFanout(sinks: readonly DisplaySink[]): DisplaySink {
  function each(notify: (sink: DisplaySink) => void): void {
    for (const sink of sinks) {
      try {
        notify(sink);
      } catch (err) {
        console.error("[display] sink failed:", err);
      }
    }
  }

  return {
    onStateChanged(state: RecordingState, mode: InteractionMode): void {
      each((sink) => sink.onStateChanged(state, mode));
    },
    onMessage(role: TranscriptMessage["role"], text: string): void {
      each((sink) => sink.onMessage(role, text));
    },
    onEvent(entry: EventLogEntry): void {
      each((sink) => sink.onEvent(entry));
    },
    onStatus(text: string): void {
      each((sink) => sink.onStatus(text));
    },
    onToken(text: string): void {
      each((sink) => sink.onToken(text));
    },
  };
}

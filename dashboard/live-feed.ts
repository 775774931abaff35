/**
 * Live event feed for dashboard clients.
 *
 * Responsibilities:
 * - Act as a display sink and turn each notification into a JSON message
 * - Broadcast to every open WebSocket client, dropping closed ones
 */

import { WebSocket } from "ws";

import type {
  DisplaySink,
  EventLogEntry,
  InteractionMode,
  RecordingState,
  TranscriptMessage,
} from "../assistant/types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export type FeedMessage =
  | { type: "state"; state: RecordingState; mode: InteractionMode }
  | { type: "message"; role: TranscriptMessage["role"]; text: string }
  | { type: "event"; entry: EventLogEntry }
  | { type: "status"; text: string }
  | { type: "token"; text: string };

/** The part of a ws connection the feed writes to */
export interface FeedClient {
  readonly readyState: number;
  send(data: string): void;
}

export interface LiveFeed {
  sink: DisplaySink;
  /** Register a client. Returns a function that unregisters it. */
  addClient(client: FeedClient): () => void;
  readonly clientCount: number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createLiveFeed(): LiveFeed {
  const clients = new Set<FeedClient>();

  function broadcast(message: FeedMessage): void {
    if (clients.size === 0) return;
    const data = JSON.stringify(message);
    for (const client of clients) {
      if (client.readyState !== WebSocket.OPEN) continue;
      try {
        client.send(data);
      } catch (err) {
        console.error("[dashboard] live feed send failed, dropping client:", err);
        clients.delete(client);
      }
    }
  }

  const sink: DisplaySink = {
    onStateChanged(state: RecordingState, mode: InteractionMode): void {
      broadcast({ type: "state", state, mode });
    },
    onMessage(role: TranscriptMessage["role"], text: string): void {
      broadcast({ type: "message", role, text });
    },
    onEvent(entry: EventLogEntry): void {
      broadcast({ type: "event", entry });
    },
    onStatus(text: string): void {
      broadcast({ type: "status", text });
    },
    onToken(text: string): void {
      broadcast({ type: "token", text });
    },
  };

  return {
    sink,
    addClient(client: FeedClient): () => void {
      clients.add(client);
      return () => {
        clients.delete(client);
      };
    },
    get clientCount() {
      return clients.size;
    },
  };
}

/**
 * Remote control routes: forward dashboard buttons to the pipeline's signal channel.
 *
 * - POST /push-to-talk
 * - POST /stop-listening
 * - POST /interrupt
 * - POST /toggle-mode
 * - POST /mode -- body { mode: "voice" | "chat" }
 * - POST /chat -- body { text }
 */

import { Hono } from "hono";

import type { Signal } from "../../assistant/types.js";
import { readJsonObject } from "./request.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Signals that take no payload, keyed by their path segment */
const SIMPLE_SIGNALS: Readonly<Record<string, Signal>> = {
  "push-to-talk": { kind: "push_to_talk" },
  "stop-listening": { kind: "stop_listening" },
  interrupt: { kind: "interrupt" },
  "toggle-mode": { kind: "toggle_mode" },
};

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for pipeline signals. Every route answers 202:
 * the signal is queued, and its effect shows up on the live feed.
 *
 * @param send - Signal channel of the running pipeline
 */
export function signalRoutes(send: (signal: Signal) => void): Hono {
  const app = new Hono();

  app.post("/mode", async (c) => {
    const mode = (await readJsonObject(c))?.mode;
    if (mode !== "voice" && mode !== "chat") {
      return c.json({ error: "'mode' must be \"voice\" or \"chat\"" }, 400);
    }
    send({ kind: "set_mode", mode });
    return c.json({ success: true }, 202);
  });

  app.post("/chat", async (c) => {
    const text = (await readJsonObject(c))?.text;
    if (typeof text !== "string" || text.trim() === "") {
      return c.json({ error: "Missing 'text' in request body" }, 400);
    }
    send({ kind: "chat_input", text: text.trim() });
    return c.json({ success: true }, 202);
  });

  app.post("/:kind", (c) => {
    const kind = c.req.param("kind");
    const signal = Object.hasOwn(SIMPLE_SIGNALS, kind) ? SIMPLE_SIGNALS[kind] : undefined;
    if (!signal) {
      return c.json({ error: `Unknown signal: ${kind}` }, 404);
    }
    send(signal);
    return c.json({ success: true }, 202);
  });

  return app;
}

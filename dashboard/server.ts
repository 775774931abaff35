/**
 * Dashboard HTTP server: REST API over the running assistant plus a live feed.
 *
 * Responsibilities:
 * - Mount the Hono route groups under /api
 * - Accept WebSocket upgrades on /api/events and stream display notifications
 * - Try a few consecutive ports, starting at the configured one
 */

import { createServer, type IncomingMessage, type Server } from "http";
import type { Duplex } from "stream";

import { getRequestListener } from "@hono/node-server";
import { Hono } from "hono";
import { WebSocketServer, type WebSocket } from "ws";

import type { Orchestrator } from "../assistant/orchestrator.js";
import type { ProviderStatus } from "../assistant/providers.js";
import type { ProfileStore } from "../services/profile-store.js";
import type { LiveFeed } from "./live-feed.js";
import { conversationRoutes } from "./routes/conversations.js";
import { diagnosticsRoutes } from "./routes/diagnostics.js";
import { memoryRoutes } from "./routes/memories.js";
import { profileRoutes } from "./routes/profiles.js";
import { settingsRoutes } from "./routes/settings.js";
import { signalRoutes } from "./routes/signals.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const PORT_ATTEMPTS = 5;

const EVENTS_PATH = "/api/events";

/** Keep idle feed connections open through proxies */
const PING_INTERVAL_MS = 30_000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface DashboardDeps {
  orchestrator: Pick<Orchestrator, "send" | "diagnostics" | "profile">;
  profiles: ProfileStore;
  /** .env file edited by the settings routes */
  envPath: string;
  sttStatus: () => ProviderStatus;
}

export interface Dashboard {
  readonly port: number;
  close(): Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Build the Hono app with every route group mounted.
 */
export function createDashboardApp(deps: DashboardDeps): Hono {
  const { orchestrator, profiles } = deps;
  const activeProfile = () => orchestrator.profile;
  const send = orchestrator.send.bind(orchestrator);

  const app = new Hono();

  app.route("/api/diagnostics", diagnosticsRoutes(() => orchestrator.diagnostics(), deps.sttStatus));
  app.route("/api/conversations", conversationRoutes(profiles, activeProfile));
  app.route("/api/memories", memoryRoutes(profiles, activeProfile, send));
  app.route("/api/profiles", profileRoutes(profiles, activeProfile, send));
  app.route("/api/settings", settingsRoutes(deps.envPath));
  app.route("/api/signals", signalRoutes(send));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError((err, c) => {
    console.error(`[dashboard] ${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: err.message }, 500);
  });

  return app;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Start the dashboard. Tries the configured port and the next few after it
 * until one is free.
 *
 * @param app - App from createDashboardApp
 * @param feed - Live feed that WebSocket clients subscribe to
 * @param port - First port to try
 */
export async function startDashboard(app: Hono, feed: LiveFeed, port: number): Promise<Dashboard> {
  for (let attempt = 0; attempt < PORT_ATTEMPTS; attempt++) {
    const candidate = port + attempt;
    try {
      return await listenOnPort(app, feed, candidate);
    } catch (err) {
      if (isAddressInUse(err)) {
        console.log(`[dashboard] port ${candidate} in use, trying next...`);
        continue;
      }
      throw err;
    }
  }
  throw new Error(`All ports in use: ${port}-${port + PORT_ATTEMPTS - 1}`);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function listenOnPort(app: Hono, feed: LiveFeed, port: number): Promise<Dashboard> {
  const server = createServer(getRequestListener(app.fetch));

  // Upgrades only; plain HTTP goes to Hono
  const wss = new WebSocketServer({ noServer: true });
  server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    handleUpgrade(req, socket, head, wss, feed);
  });

  const pingTimer = setInterval(() => {
    wss.clients.forEach((ws) => {
      if (ws.readyState === ws.OPEN) ws.ping();
    });
  }, PING_INTERVAL_MS);
  pingTimer.unref();

  return new Promise((resolve, reject) => {
    server.once("error", (err) => {
      clearInterval(pingTimer);
      wss.close();
      reject(err);
    });
    server.listen(port, () => {
      console.log(`[dashboard] running at http://localhost:${port}`);
      resolve({ port, close: () => closeServer(server, wss, pingTimer) });
    });
  });
}

function handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer, wss: WebSocketServer, feed: LiveFeed): void {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  if (url.pathname !== EVENTS_PATH) {
    console.log(`[dashboard] rejected WebSocket upgrade: invalid path ${url.pathname}`);
    socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
    socket.destroy();
    return;
  }

  wss.handleUpgrade(req, socket, head, (ws: WebSocket) => {
    const remove = feed.addClient(ws);
    console.log(`[dashboard] feed client connected (${feed.clientCount} open)`);
    ws.on("close", () => {
      remove();
      console.log(`[dashboard] feed client disconnected (${feed.clientCount} open)`);
    });
    ws.on("error", (err) => {
      console.error("[dashboard] feed client error:", err);
    });
  });
}

function closeServer(server: Server, wss: WebSocketServer, pingTimer: NodeJS.Timeout): Promise<void> {
  clearInterval(pingTimer);
  wss.clients.forEach((ws) => ws.terminate());
  wss.close();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EADDRINUSE";
}

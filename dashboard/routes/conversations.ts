/**
 * Conversation session API routes.
 *
 * Lists and reads the saved sessions of the active profile:
 * - GET / -- list sessions with summaries, newest first
 * - GET /:sessionId -- get all messages for a specific session
 */

import { Hono } from "hono";

import type { ProfileStore } from "../../services/profile-store.js";

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for conversation operations.
 *
 * @param profiles - Store holding the session files
 * @param activeProfile - Returns the profile currently in use
 * @returns Hono instance with GET / (list) and GET /:sessionId (detail)
 */
export function conversationRoutes(profiles: ProfileStore, activeProfile: () => string): Hono {
  const app = new Hono();

  /** List all conversation sessions with summaries */
  app.get("/", async (c) => {
    const profile = activeProfile();
    const sessions = await profiles.listSessions(profile);
    return c.json({ profile, sessions });
  });

  /** Get all messages for a specific session */
  app.get("/:sessionId", async (c) => {
    const session = await profiles.loadSession(activeProfile(), c.req.param("sessionId"));
    if (!session) {
      return c.json({ error: "Session not found" }, 404);
    }
    return c.json(session);
  });

  return app;
}

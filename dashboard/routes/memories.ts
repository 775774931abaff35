/**
 * Remembered facts API routes for the active profile.
 *
 * - GET / -- list facts, oldest first
 * - DELETE / -- forget every fact, or one when ?fact= is given
 *
 * The pipeline reloads facts after each change so the next reply stops using them.
 */

import { Hono } from "hono";

import type { Signal } from "../../assistant/types.js";
import type { ProfileStore } from "../../services/profile-store.js";

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for memory operations.
 *
 * @param profiles - Store holding the memory files
 * @param activeProfile - Returns the profile currently in use
 * @param send - Signal channel of the running pipeline
 */
export function memoryRoutes(profiles: ProfileStore, activeProfile: () => string, send: (signal: Signal) => void): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    const profile = activeProfile();
    return c.json({ profile, facts: await profiles.loadFacts(profile) });
  });

  app.delete("/", async (c) => {
    const profile = activeProfile();
    const fact = c.req.query("fact");

    if (fact !== undefined) {
      const removed = await profiles.removeFact(profile, fact);
      if (!removed) {
        return c.json({ error: "Fact not found" }, 404);
      }
    } else {
      await profiles.clearFacts(profile);
    }

    send({ kind: "reload_profile" });
    return c.json({ success: true, facts: await profiles.loadFacts(profile) });
  });

  return app;
}

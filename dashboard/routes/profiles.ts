/**
 * Profile API routes.
 *
 * - GET / -- list profiles and the active one
 * - POST / -- create a profile, optionally copying another's settings
 * - GET /:name -- read a profile's settings
 * - PUT /:name -- update settings (missing fields keep their values)
 * - POST /active -- switch the running pipeline to another profile
 */

import { Hono } from "hono";

import type { Signal } from "../../assistant/types.js";
import { isValidProfileName, parseProfileSettings, type ProfileStore } from "../../services/profile-store.js";
import { readJsonObject } from "./request.js";

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for profile operations.
 *
 * @param profiles - Profile store
 * @param activeProfile - Returns the profile currently in use
 * @param send - Signal channel of the running pipeline
 */
export function profileRoutes(profiles: ProfileStore, activeProfile: () => string, send: (signal: Signal) => void): Hono {
  const app = new Hono();

  app.get("/", async (c) => {
    return c.json({ active: activeProfile(), profiles: await profiles.listProfiles() });
  });

  app.post("/", async (c) => {
    const body = await readJsonObject(c);
    const name = body?.name;
    const from = body?.from;
    if (typeof name !== "string" || !isValidProfileName(name)) {
      return c.json({ error: "Missing or invalid 'name' in request body" }, 400);
    }
    if (from !== undefined && (typeof from !== "string" || !isValidProfileName(from))) {
      return c.json({ error: "Invalid 'from' in request body" }, 400);
    }

    if ((await profiles.listProfiles()).includes(name)) {
      return c.json({ error: `Profile "${name}" already exists` }, 409);
    }
    const settings = await profiles.createProfile(name, from);
    return c.json({ name, settings }, 201);
  });

  /** Ask the pipeline to switch; it interrupts any running turn first */
  app.post("/active", async (c) => {
    const body = await readJsonObject(c);
    const name = body?.name;
    if (typeof name !== "string" || !isValidProfileName(name)) {
      return c.json({ error: "Missing or invalid 'name' in request body" }, 400);
    }
    send({ kind: "switch_profile", profile: name });
    return c.json({ success: true }, 202);
  });

  app.get("/:name", async (c) => {
    const name = c.req.param("name");
    if (!isValidProfileName(name)) {
      return c.json({ error: `Invalid profile name "${name}"` }, 400);
    }
    return c.json(await profiles.loadProfile(name));
  });

  app.put("/:name", async (c) => {
    const name = c.req.param("name");
    if (!isValidProfileName(name)) {
      return c.json({ error: `Invalid profile name "${name}"` }, 400);
    }
    const body = await readJsonObject(c);
    if (!body) {
      return c.json({ error: "Expected a JSON object of settings" }, 400);
    }

    const settings = parseProfileSettings({ ...(await profiles.loadProfile(name)), ...body });
    await profiles.saveProfile(name, settings);
    if (name === activeProfile()) send({ kind: "reload_profile" });
    return c.json(settings);
  });

  return app;
}

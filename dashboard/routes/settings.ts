/**
 * Settings (.env) API routes.
 *
 * Read and write .env configuration with secret masking:
 * - GET / -- read .env with masked secrets
 * - POST / -- merge incoming key-value pairs into .env
 *
 * Changes apply on the next start; the running pipeline keeps its config.
 */

import { Hono } from "hono";

import { maskSecrets, mergeEnv, readEnv, writeEnvFile, type EnvRecord } from "../../services/env.js";
import { readJsonObject } from "./request.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const ENV_KEY_PATTERN = /^[A-Z][A-Z0-9_]*$/;

// ============================================================================
// ROUTES
// ============================================================================

/**
 * Create Hono route group for settings operations.
 *
 * @param envPath - Path of the .env file to edit
 * @returns Hono instance with GET / and POST / routes
 */
export function settingsRoutes(envPath: string): Hono {
  const app = new Hono();

  /** Read .env settings with masked secrets */
  app.get("/", async (c) => {
    return c.json(maskSecrets(await readEnv(envPath)));
  });

  /** Merge incoming settings into .env, preserving masked values */
  app.post("/", async (c) => {
    const body = await readJsonObject(c);
    if (!body) {
      return c.json({ error: "Expected a JSON object of settings" }, 400);
    }

    const incoming: EnvRecord = {};
    for (const [key, value] of Object.entries(body)) {
      if (!ENV_KEY_PATTERN.test(key) || typeof value !== "string" || /[\r\n]/.test(value)) {
        return c.json({ error: `Invalid setting "${key}"` }, 400);
      }
      incoming[key] = value.trim();
    }

    const merged = mergeEnv(await readEnv(envPath), incoming);
    await writeEnvFile(merged, envPath);
    console.log(`[dashboard] updated ${Object.keys(incoming).length} setting(s) in ${envPath}`);
    return c.json({ success: true, restartRequired: true });
  });

  return app;
}

/**
 * Diagnostics route: pipeline state, mode, profile, recent events and
 * speech provider readiness.
 *
 * - GET / -- current snapshot
 */

import { Hono } from "hono";

import type { AssistantDiagnostics } from "../../assistant/orchestrator.js";
import type { ProviderStatus } from "../../assistant/providers.js";

/**
 * @param diagnostics - Snapshot of the running pipeline
 * @param sttStatus - Readiness of the speech-to-text provider
 */
export function diagnosticsRoutes(diagnostics: () => AssistantDiagnostics, sttStatus: () => ProviderStatus): Hono {
  const app = new Hono();

  app.get("/", (c) => {
    return c.json({ ...diagnostics(), stt: sttStatus() });
  });

  return app;
}

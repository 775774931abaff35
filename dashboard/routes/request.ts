/**
 * Request body helpers shared by the route groups.
 */

import type { Context } from "hono";

/**
 * Parse the request body as a JSON object.
 *
 * @returns The object, or null when the body is missing, malformed or not an object
 */
export async function readJsonObject(c: Context): Promise<Record<string, unknown> | null> {
  const body: unknown = await c.req.json<unknown>().catch(() => null);
  return isRecord(body) ? body : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

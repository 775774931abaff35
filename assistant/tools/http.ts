/**
 * JSON over HTTP for the web-facing tools.
 */

import { ToolError } from "../errors.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface HttpJsonResult {
  status: number;
  body: unknown;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * GET a URL and parse the JSON body.
 *
 * Non-2xx responses are returned with their status so callers can map them;
 * a body that is not JSON reads as null.
 *
 * @throws ToolError network_unavailable when the request cannot be made
 * @throws The abort reason when the signal fires
 */
export async function getJson(url: string, signal: AbortSignal, fetchImpl: typeof fetch = fetch): Promise<HttpJsonResult> {
  let response: Response;
  try {
    response = await fetchImpl(url, { signal, headers: { Accept: "application/json" } });
  } catch (err) {
    if (signal.aborted) throw signal.reason;
    throw new ToolError("network_unavailable", `request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const text = await response.text();
  let body: unknown = null;
  try {
    body = text === "" ? null : JSON.parse(text);
  } catch {
    body = null;
  }
  return { status: response.status, body };
}

/**
 * Read a nested field without trusting the payload's shape.
 *
 * @returns The value at the path, or undefined
 */
export function pick(value: unknown, ...path: Array<string | number>): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

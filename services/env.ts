/**
 * Environment file (.env) read/write service.
 *
 * Shared by the startup config loader and the dashboard settings route:
 * - Parse raw .env content into key-value records
 * - Read and write .env on disk, keeping KEY=VALUE lines
 * - Mask secrets for display and merge edits without clobbering masked values
 */

import { readFile, writeFile } from "fs/promises";
import { join } from "path";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// CONSTANTS
// ============================================================================

/** Shown in place of a secret; the last characters follow it */
export const MASK_PREFIX = "****";

const SECRET_KEY_PATTERN = /(_API_KEY|_SECRET|_TOKEN|_PASSWORD)$/;

const VISIBLE_SECRET_CHARS = 4;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse a .env file from disk.
 * Returns an empty record if the file does not exist.
 *
 * @param envPath - Path to the .env file. Defaults to process.cwd()/.env
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? defaultEnvPath();
  const content = await readFile(filePath, "utf-8").catch((err: NodeJS.ErrnoException) => {
    if (err.code === "ENOENT") return "";
    throw err;
  });
  return parseEnvFile(content);
}

/**
 * Write a full key-value record to a .env file, one KEY=VALUE line per entry.
 *
 * @param settings - Key-value pairs to write
 * @param envPath - Path to the .env file. Defaults to process.cwd()/.env
 */
export async function writeEnvFile(settings: EnvRecord, envPath?: string): Promise<void> {
  const filePath = envPath ?? defaultEnvPath();
  const lines = Object.entries(settings).map(([k, v]) => `${k}=${v}`);
  await writeFile(filePath, lines.join("\n") + "\n", "utf-8");
}

/**
 * Replace secret values with a mask that keeps their last four characters.
 *
 * @returns A new record; the input is untouched
 */
export function maskSecrets(settings: EnvRecord): EnvRecord {
  const masked: EnvRecord = {};
  for (const [key, value] of Object.entries(settings)) {
    if (isSecretKey(key) && value !== "") {
      masked[key] = value.length > VISIBLE_SECRET_CHARS ? MASK_PREFIX + value.slice(-VISIBLE_SECRET_CHARS) : MASK_PREFIX;
    } else {
      masked[key] = value;
    }
  }
  return masked;
}

/**
 * Apply edits to a record. A secret sent back still masked keeps its stored
 * value; an empty string removes the key.
 *
 * @returns A new record
 */
export function mergeEnv(current: EnvRecord, incoming: EnvRecord): EnvRecord {
  const merged: EnvRecord = { ...current };
  for (const [key, value] of Object.entries(incoming)) {
    if (isSecretKey(key) && value.startsWith(MASK_PREFIX)) continue;
    if (value === "") {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function isSecretKey(key: string): boolean {
  return SECRET_KEY_PATTERN.test(key);
}

/**
 * Parse a .env file string into a key-value record.
 * Handles lines in the format KEY=VALUE, ignores empty lines and comments.
 * Keeps empty values (KEY= produces { KEY: "" }). Does NOT strip quotes.
 *
 * @param content - Raw .env file content
 */
export function parseEnvFile(content: string): EnvRecord {
  const result: EnvRecord = {};
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex === -1) continue;
    const key = trimmed.slice(0, eqIndex).trim();
    const value = trimmed.slice(eqIndex + 1).trim();
    result[key] = value;
  }
  return result;
}

function defaultEnvPath(): string {
  return join(process.cwd(), ".env");
}

/**
 * File-backed profile store.
 *
 * Layout under the data directory:
 *   app.json                          active profile
 *   profiles/<name>.json              profile settings
 *   sessions/<name>/<session>.json    one file per run, user/assistant exchanges
 *   memories/<name>.json              remembered facts about the user
 *
 * Responsibilities:
 * - List, create, load and save profiles
 * - Start sessions and append completed exchanges with atomic writes
 * - Load the most recent messages across sessions, newest files first
 * - Keep a deduplicated, capped list of facts per profile
 */

import { randomUUID } from "crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";

import { Mutex } from "../assistant/mutex.js";
import type { InteractionMode, TranscriptMessage } from "../assistant/types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_PROFILE = "default";

/** Facts kept per profile; the oldest are dropped first */
export const MEMORY_CAP = 50;

/** Facts shorter than this only match exactly when deduplicating */
const SUBSTRING_MATCH_MIN_LENGTH = 6;

const PROFILE_NAME_PATTERN = /^[A-Za-z0-9_-]{1,40}$/;
const SESSION_ID_PATTERN = /^[0-9A-Za-z_-]{1,64}$/;

// ============================================================================
// INTERFACES
// ============================================================================

export type ResponseLength = "concise" | "detailed";

export interface ProfileSettings {
  /** Name the assistant answers to */
  assistantName: string;
  /** What the assistant calls the user; empty means not personalised */
  userName: string;
  responseLength: ResponseLength;
  /** Appended verbatim to the system prompt */
  customInstructions: string;
  /** Extract and inject facts about the user */
  memoryEnabled: boolean;
  interactionMode: InteractionMode;
  /** Speak replies in chat mode too */
  speakInChat: boolean;
}

export interface SessionMessage {
  role: "user" | "assistant";
  content: string;
  timestamp: string;
}

export interface SessionRecord {
  id: string;
  profile: string;
  startedAt: string;
  messages: SessionMessage[];
}

export interface SessionSummary {
  id: string;
  startedAt: string;
  messageCount: number;
  /** First user message, for listings */
  preview: string;
}

export interface ProfileStore {
  readonly dataDir: string;
  getActiveProfile(): Promise<string>;
  setActiveProfile(name: string): Promise<void>;
  listProfiles(): Promise<string[]>;
  /** Copies settings from `from` when given */
  createProfile(name: string, from?: string): Promise<ProfileSettings>;
  /** Missing profiles load as defaults */
  loadProfile(name: string): Promise<ProfileSettings>;
  saveProfile(name: string, settings: ProfileSettings): Promise<void>;
  /** Returns a session id; the file is written on the first exchange */
  startSession(profile: string): Promise<string>;
  appendExchange(profile: string, sessionId: string, user: string, assistant: string): Promise<void>;
  loadRecentMessages(profile: string, maxCount: number): Promise<TranscriptMessage[]>;
  listSessions(profile: string): Promise<SessionSummary[]>;
  loadSession(profile: string, sessionId: string): Promise<SessionRecord | null>;
  loadFacts(profile: string): Promise<string[]>;
  /** Returns the facts that were actually stored */
  addFacts(profile: string, facts: readonly string[]): Promise<string[]>;
  removeFact(profile: string, fact: string): Promise<boolean>;
  clearFacts(profile: string): Promise<void>;
}

export const DEFAULT_PROFILE_SETTINGS: Readonly<ProfileSettings> = Object.freeze({
  assistantName: "Nova",
  userName: "",
  responseLength: "concise",
  customInstructions: "",
  memoryEnabled: true,
  interactionMode: "voice",
  speakInChat: false,
});

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create a profile store rooted at dataDir. Directories are created on demand.
 *
 * @param dataDir - Root data directory
 * @param now - Clock, injectable for tests
 */
export function createFileProfileStore(dataDir: string, now: () => Date = () => new Date()): ProfileStore {
  const profilesDir = join(dataDir, "profiles");
  const sessionsRoot = join(dataDir, "sessions");
  const memoriesDir = join(dataDir, "memories");
  const appStatePath = join(dataDir, "app.json");

  const profilePath = (name: string) => join(profilesDir, `${checkProfileName(name)}.json`);
  const sessionsDir = (name: string) => join(sessionsRoot, checkProfileName(name));
  const memoryPath = (name: string) => join(memoriesDir, `${checkProfileName(name)}.json`);

  // Read-modify-write of one file runs under that file's lock; the dashboard
  // and the assistant both write here
  const fileLocks = new Map<string, Mutex>();
  function exclusive<T>(path: string, fn: () => Promise<T>): Promise<T> {
    let lock = fileLocks.get(path);
    if (!lock) {
      lock = new Mutex();
      fileLocks.set(path, lock);
    }
    return lock.runExclusive(fn);
  }

  async function getActiveProfile(): Promise<string> {
    const state = await readJson(appStatePath);
    const name = isRecord(state) ? state.activeProfile : undefined;
    return typeof name === "string" && isValidProfileName(name) ? name : DEFAULT_PROFILE;
  }

  async function setActiveProfile(name: string): Promise<void> {
    checkProfileName(name);
    await exclusive(appStatePath, () => atomicWrite(appStatePath, { activeProfile: name }));
  }

  async function listProfiles(): Promise<string[]> {
    const names = (await listJsonFiles(profilesDir)).map((file) => file.slice(0, -".json".length));
    if (!names.includes(DEFAULT_PROFILE)) names.push(DEFAULT_PROFILE);
    return names.filter(isValidProfileName).sort();
  }

  async function loadProfile(name: string): Promise<ProfileSettings> {
    return parseProfileSettings(await readJson(profilePath(name)));
  }

  async function saveProfile(name: string, settings: ProfileSettings): Promise<void> {
    const path = profilePath(name);
    await exclusive(path, () => atomicWrite(path, settings));
  }

  async function createProfile(name: string, from?: string): Promise<ProfileSettings> {
    const existing = await listProfiles();
    if (existing.includes(name)) {
      throw new Error(`Profile "${name}" already exists`);
    }
    const settings = from !== undefined ? await loadProfile(from) : { ...DEFAULT_PROFILE_SETTINGS };
    await saveProfile(name, settings);
    return settings;
  }

  async function startSession(profile: string): Promise<string> {
    await mkdir(sessionsDir(profile), { recursive: true });
    return sessionIdFor(now());
  }

  async function appendExchange(profile: string, sessionId: string, user: string, assistant: string): Promise<void> {
    const path = join(sessionsDir(profile), `${checkSessionId(sessionId)}.json`);
    await exclusive(path, async () => {
      const existing = parseSessionRecord(await readJson(path), sessionId, profile);
      const session: SessionRecord = existing ?? { id: sessionId, profile, startedAt: now().toISOString(), messages: [] };
      const timestamp = now().toISOString();
      session.messages.push({ role: "user", content: user, timestamp }, { role: "assistant", content: assistant, timestamp });
      await atomicWrite(path, session);
    });
  }

  async function loadRecentMessages(profile: string, maxCount: number): Promise<TranscriptMessage[]> {
    const dir = sessionsDir(profile);
    const files = (await listJsonFiles(dir)).sort().reverse();

    let collected: SessionMessage[] = [];
    for (const file of files) {
      const id = file.slice(0, -".json".length);
      const session = parseSessionRecord(await readJson(join(dir, file)), id, profile);
      if (!session) continue;
      // Older files go in front so newer messages stay at the end
      collected = [...session.messages, ...collected];
      if (maxCount > 0 && collected.length >= maxCount) break;
    }

    if (maxCount > 0 && collected.length > maxCount) {
      collected = collected.slice(-maxCount);
    }

    return collected.map((m) => ({ role: m.role, content: m.content, timestamp: Date.parse(m.timestamp) || 0 }));
  }

  async function listSessions(profile: string): Promise<SessionSummary[]> {
    const dir = sessionsDir(profile);
    const files = (await listJsonFiles(dir)).sort().reverse();
    const summaries: SessionSummary[] = [];
    for (const file of files) {
      const id = file.slice(0, -".json".length);
      const session = parseSessionRecord(await readJson(join(dir, file)), id, profile);
      if (!session) continue;
      const firstUser = session.messages.find((m) => m.role === "user");
      summaries.push({
        id,
        startedAt: session.startedAt,
        messageCount: session.messages.length,
        preview: firstUser ? firstUser.content.slice(0, 80) : "",
      });
    }
    return summaries;
  }

  async function loadSession(profile: string, sessionId: string): Promise<SessionRecord | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) return null;
    const path = join(sessionsDir(profile), `${sessionId}.json`);
    return parseSessionRecord(await readJson(path), sessionId, profile);
  }

  async function loadFacts(profile: string): Promise<string[]> {
    const data = await readJson(memoryPath(profile));
    if (!isRecord(data) || !Array.isArray(data.facts)) return [];
    return data.facts.filter((f): f is string => typeof f === "string");
  }

  async function writeFacts(profile: string, facts: string[]): Promise<void> {
    await atomicWrite(memoryPath(profile), { profile, facts, updated: now().toISOString() });
  }

  async function addFacts(profile: string, facts: readonly string[]): Promise<string[]> {
    return exclusive(memoryPath(profile), async () => {
      const existing = await loadFacts(profile);
      const { combined, added } = mergeFacts(existing, facts, MEMORY_CAP);
      if (added.length > 0) await writeFacts(profile, combined);
      return added;
    });
  }

  async function removeFact(profile: string, fact: string): Promise<boolean> {
    return exclusive(memoryPath(profile), async () => {
      const existing = await loadFacts(profile);
      const updated = existing.filter((f) => f !== fact);
      if (updated.length === existing.length) return false;
      await writeFacts(profile, updated);
      return true;
    });
  }

  async function clearFacts(profile: string): Promise<void> {
    const path = memoryPath(profile);
    await exclusive(path, () => rm(path, { force: true }));
  }

  return {
    dataDir,
    getActiveProfile,
    setActiveProfile,
    listProfiles,
    createProfile,
    loadProfile,
    saveProfile,
    startSession,
    appendExchange,
    loadRecentMessages,
    listSessions,
    loadSession,
    loadFacts,
    addFacts,
    removeFact,
    clearFacts,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME_PATTERN.test(name);
}

/**
 * Merge candidate facts into an existing list.
 *
 * A candidate is skipped when it matches an existing or already-accepted fact
 * case-insensitively, or when either contains the other and both are longer
 * than five characters. The result keeps only the most recent `cap` facts.
 *
 * @param existing - Stored facts, oldest first
 * @param candidates - Newly extracted facts
 * @param cap - Maximum facts kept
 * @returns The combined list and the candidates that were accepted
 */
export function mergeFacts(
  existing: readonly string[],
  candidates: readonly string[],
  cap: number,
): { combined: string[]; added: string[] } {
  const known = existing.map((f) => f.trim().toLowerCase());
  const added: string[] = [];

  for (const candidate of candidates) {
    const fact = candidate.trim();
    if (fact === "") continue;
    const lower = fact.toLowerCase();
    const duplicate = known.some(
      (k) =>
        k === lower ||
        (lower.length >= SUBSTRING_MATCH_MIN_LENGTH && k.length >= SUBSTRING_MATCH_MIN_LENGTH && (k.includes(lower) || lower.includes(k))),
    );
    if (duplicate) continue;
    known.push(lower);
    added.push(fact);
  }

  const combined = [...existing, ...added];
  return { combined: combined.length > cap ? combined.slice(-cap) : combined, added };
}

/**
 * Session id from a start time: "2026-10-19_143005".
 */
export function sessionIdFor(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Fill missing or malformed profile fields with defaults.
 */
export function parseProfileSettings(data: unknown): ProfileSettings {
  const settings: ProfileSettings = { ...DEFAULT_PROFILE_SETTINGS };
  if (!isRecord(data)) return settings;

  if (typeof data.assistantName === "string" && data.assistantName.trim() !== "") settings.assistantName = data.assistantName.trim();
  if (typeof data.userName === "string") settings.userName = data.userName.trim();
  if (data.responseLength === "concise" || data.responseLength === "detailed") settings.responseLength = data.responseLength;
  if (typeof data.customInstructions === "string") settings.customInstructions = data.customInstructions;
  if (typeof data.memoryEnabled === "boolean") settings.memoryEnabled = data.memoryEnabled;
  if (data.interactionMode === "voice" || data.interactionMode === "chat") settings.interactionMode = data.interactionMode;
  if (typeof data.speakInChat === "boolean") settings.speakInChat = data.speakInChat;
  return settings;
}

function parseSessionRecord(data: unknown, id: string, profile: string): SessionRecord | null {
  if (!isRecord(data)) return null;
  const messages: SessionMessage[] = [];
  if (Array.isArray(data.messages)) {
    for (const m of data.messages) {
      if (!isRecord(m)) continue;
      if ((m.role === "user" || m.role === "assistant") && typeof m.content === "string") {
        messages.push({ role: m.role, content: m.content, timestamp: typeof m.timestamp === "string" ? m.timestamp : "" });
      }
    }
  }
  return {
    id,
    profile,
    startedAt: typeof data.startedAt === "string" ? data.startedAt : "",
    messages,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkProfileName(name: string): string {
  if (!isValidProfileName(name)) {
    throw new Error(`Invalid profile name "${name}". Use letters, digits, "-" or "_" (max 40).`);
  }
  return name;
}

function checkSessionId(id: string): string {
  if (!SESSION_ID_PATTERN.test(id)) {
    throw new Error(`Invalid session id "${id}"`);
  }
  return id;
}

/**
 * Read and parse a JSON file. Missing or unreadable files read as null.
 */
async function readJson(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    console.warn(`[profiles] ignoring malformed ${path}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
}

async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir);
    return entries.filter((name) => name.endsWith(".json"));
  } catch (err) {
    if (isMissingFile(err)) return [];
    throw err;
  }
}

/**
 * Write JSON to a temp file beside the target, then rename over it.
 */
async function atomicWrite(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${randomUUID()}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2) + "\n", "utf-8");
  await rename(tmp, path);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

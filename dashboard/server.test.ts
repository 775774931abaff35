/**
 * Dashboard API tests: requests go straight to the Hono app, with a fake
 * pipeline and a profile store in a temp dir.
 *
 * Run: npx tsx --test dashboard/server.test.ts
 */

import { after, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import type { Hono } from "hono";

import type { AssistantDiagnostics } from "../assistant/orchestrator.js";
import type { Signal } from "../assistant/types.js";
import { createFileProfileStore, type ProfileStore } from "../services/profile-store.js";
import { isRecord } from "./routes/request.js";
import { createDashboardApp } from "./server.js";

// ============================================================================
// HELPERS
// ============================================================================

interface Setup {
  app: Hono;
  sent: Signal[];
  store: ProfileStore;
  envPath: string;
}

const dirs: string[] = [];

after(async () => {
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
});

const DIAGNOSTICS: AssistantDiagnostics = {
  state: "idle",
  mode: "voice",
  pendingMode: null,
  profile: "default",
  sessionId: "2026-10-19_143005",
  historyLength: 0,
  tools: ["web_search"],
  events: [],
};

async function setup(): Promise<Setup> {
  const dir = await mkdtemp(join(tmpdir(), "dashboard-"));
  dirs.push(dir);

  const sent: Signal[] = [];
  const store = createFileProfileStore(join(dir, "data"));
  const envPath = join(dir, ".env");
  const app = createDashboardApp({
    orchestrator: {
      send: (signal) => {
        sent.push(signal);
      },
      diagnostics: () => DIAGNOSTICS,
      profile: "default",
    },
    profiles: store,
    envPath,
    sttStatus: () => ({ ready: false, detail: "model files missing" }),
  });
  return { app, sent, store, envPath };
}

function post(body: unknown, method = "POST"): RequestInit {
  return { method, headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

// ============================================================================
// TESTS
// ============================================================================

test("diagnostics include the speech provider status", async () => {
  const { app } = await setup();
  const res = await app.request("/api/diagnostics");
  assert.equal(res.status, 200);
  assert.deepEqual(await res.json(), { ...DIAGNOSTICS, stt: { ready: false, detail: "model files missing" } });
});

test("unknown paths answer 404 as JSON", async () => {
  const { app } = await setup();
  const res = await app.request("/api/nothing-here");
  assert.equal(res.status, 404);
  assert.deepEqual(await res.json(), { error: "Not found" });
});

test("signal routes queue signals for the pipeline", async () => {
  const { app, sent } = await setup();

  assert.equal((await app.request("/api/signals/push-to-talk", { method: "POST" })).status, 202);
  assert.equal((await app.request("/api/signals/interrupt", { method: "POST" })).status, 202);
  assert.equal((await app.request("/api/signals/mode", post({ mode: "chat" }))).status, 202);
  assert.equal((await app.request("/api/signals/chat", post({ text: "  hello there " }))).status, 202);

  assert.deepEqual(sent, [
    { kind: "push_to_talk" },
    { kind: "interrupt" },
    { kind: "set_mode", mode: "chat" },
    { kind: "chat_input", text: "hello there" },
  ]);
});

test("signal routes reject bad input", async () => {
  const { app, sent } = await setup();

  const unknown = await app.request("/api/signals/dance", { method: "POST" });
  assert.equal(unknown.status, 404);
  assert.deepEqual(await unknown.json(), { error: "Unknown signal: dance" });

  assert.equal((await app.request("/api/signals/mode", post({ mode: "telepathy" }))).status, 400);
  assert.equal((await app.request("/api/signals/chat", post({ text: "   " }))).status, 400);
  assert.equal((await app.request("/api/signals/chat", { method: "POST", body: "not json" })).status, 400);
  assert.deepEqual(sent, []);
});

test("settings are read masked and merged on write", async () => {
  const { app, envPath } = await setup();
  await writeFile(envPath, "ANTHROPIC_API_KEY=test-secret\nDASHBOARD_PORT=7861\n");

  const read = await app.request("/api/settings");
  assert.deepEqual(await read.json(), { ANTHROPIC_API_KEY: "****cret", DASHBOARD_PORT: "7861" });

  const write = await app.request("/api/settings", post({ ANTHROPIC_API_KEY: "****cret", DASHBOARD_PORT: "8000", TTS_PROVIDER: "none" }));
  assert.equal(write.status, 200);
  assert.deepEqual(await write.json(), { success: true, restartRequired: true });
  assert.equal(await readFile(envPath, "utf-8"), "ANTHROPIC_API_KEY=test-secret\nDASHBOARD_PORT=8000\nTTS_PROVIDER=none\n");
});

test("settings with bad keys or multi-line values are refused", async () => {
  const { app } = await setup();

  const badKey = await app.request("/api/settings", post({ "bad key": "x" }));
  assert.equal(badKey.status, 400);
  assert.deepEqual(await badKey.json(), { error: 'Invalid setting "bad key"' });

  const badValue = await app.request("/api/settings", post({ LLM_MODEL: "a\nINJECTED=1" }));
  assert.equal(badValue.status, 400);
});

test("memories are listed and forgotten, and the pipeline reloads them", async () => {
  const { app, sent, store } = await setup();
  await store.addFacts("default", ["Likes tea", "Has a dog named Rex"]);

  const list = await app.request("/api/memories");
  assert.deepEqual(await list.json(), { profile: "default", facts: ["Likes tea", "Has a dog named Rex"] });

  const one = await app.request(`/api/memories?fact=${encodeURIComponent("Likes tea")}`, { method: "DELETE" });
  assert.deepEqual(await one.json(), { success: true, facts: ["Has a dog named Rex"] });

  const missing = await app.request("/api/memories?fact=unknown", { method: "DELETE" });
  assert.equal(missing.status, 404);

  const all = await app.request("/api/memories", { method: "DELETE" });
  assert.deepEqual(await all.json(), { success: true, facts: [] });
  assert.deepEqual(sent, [{ kind: "reload_profile" }, { kind: "reload_profile" }]);
});

test("conversations list and open saved sessions", async () => {
  const { app, store } = await setup();
  await store.appendExchange("default", "2026-10-19_143005", "hi", "hello");

  const list: unknown = await (await app.request("/api/conversations")).json();
  assert.ok(isRecord(list) && Array.isArray(list.sessions));
  assert.equal(list.profile, "default");
  assert.equal(list.sessions.length, 1);
  const [summary] = list.sessions;
  assert.ok(isRecord(summary));
  assert.equal(summary.id, "2026-10-19_143005");
  assert.equal(summary.messageCount, 2);
  assert.equal(summary.preview, "hi");

  const session = await app.request("/api/conversations/2026-10-19_143005");
  assert.equal(session.status, 200);

  const missing = await app.request("/api/conversations/2020-01-01_000000");
  assert.equal(missing.status, 404);
  assert.deepEqual(await missing.json(), { error: "Session not found" });
});

test("profiles are created, edited and switched", async () => {
  const { app, sent } = await setup();

  assert.deepEqual(await (await app.request("/api/profiles")).json(), { active: "default", profiles: ["default"] });

  const created = await app.request("/api/profiles", post({ name: "work" }));
  assert.equal(created.status, 201);
  assert.equal((await app.request("/api/profiles", post({ name: "work" }))).status, 409);
  assert.equal((await app.request("/api/profiles", post({ name: "no spaces" }))).status, 400);

  const edited = await app.request("/api/profiles/work", post({ assistantName: "Iris" }, "PUT"));
  const settings: unknown = await edited.json();
  assert.ok(isRecord(settings));
  assert.equal(settings.assistantName, "Iris");
  assert.deepEqual(sent, []);

  await app.request("/api/profiles/default", post({ responseLength: "detailed" }, "PUT"));
  assert.deepEqual(sent, [{ kind: "reload_profile" }]);

  assert.equal((await app.request("/api/profiles/active", post({ name: "work" }))).status, 202);
  assert.deepEqual(sent[1], { kind: "switch_profile", profile: "work" });
});

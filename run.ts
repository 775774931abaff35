#!/usr/bin/env node
/**
 * Entry point: wires the assistant together and runs it in the terminal.
 *
 * Responsibilities:
 * - Load .env and build the typed config (fails fast on missing keys)
 * - Initialize model, VAD, microphone, STT and TTS
 * - Start the dashboard API and live feed
 * - Drive the orchestrator from the keyboard until shutdown
 */

import "dotenv/config";

import { join } from "path";

import { loadAssistantConfig } from "./assistant/config.js";
import { createAssistantContext } from "./assistant/context.js";
import { createDisplayFanout } from "./assistant/display.js";
import { createMicrophoneSource } from "./assistant/capture.js";
import { createAnthropicModel } from "./assistant/llm.js";
import { createOrchestrator } from "./assistant/orchestrator.js";
import { createSynthesizerForProvider, createTranscriberForProvider, getSttProviderStatus } from "./assistant/providers.js";
import { createTerminal } from "./assistant/terminal.js";
import { createDefaultTools } from "./assistant/tools/index.js";
import { createVadGate } from "./assistant/vad.js";
import { createLiveFeed } from "./dashboard/live-feed.js";
import { createDashboardApp, startDashboard } from "./dashboard/server.js";
import { createFileProfileStore } from "./services/profile-store.js";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const config = loadAssistantConfig(process.env);

  const profiles = createFileProfileStore(config.dataDir);
  const profileName = config.profile ?? (await profiles.getActiveProfile());
  const settings = await profiles.loadProfile(profileName);

  console.log("Initializing language model...");
  const model = createAnthropicModel(config.llm);
  console.log("Initializing VAD...");
  const vad = await createVadGate(config.capture.vadThreshold);
  console.log("Initializing microphone...");
  const capture = await createMicrophoneSource(config.capture, vad);
  console.log(`Initializing STT (${config.stt.provider})...`);
  const transcriber = await createTranscriberForProvider(config.stt);
  console.log(`Initializing TTS (${config.tts.provider})...`);
  const synthesizer = createSynthesizerForProvider(config.tts);

  const terminal = createTerminal({ assistantName: settings.assistantName });
  const feed = createLiveFeed();

  const context = createAssistantContext({
    config: config.pipeline,
    tools: createDefaultTools({
      model,
      openWeatherMapApiKey: config.openWeatherMapApiKey,
      fileRoot: config.fileRoot,
    }),
    initialMode: settings.interactionMode,
    capture,
    transcriber,
    model,
    synthesizer,
    display: createDisplayFanout([terminal.display, feed.sink]),
    profiles,
  });
  const orchestrator = await createOrchestrator(context, profileName);

  const app = createDashboardApp({
    orchestrator,
    profiles,
    envPath: join(process.cwd(), ".env"),
    sttStatus: () => getSttProviderStatus(config.stt),
  });
  const dashboard = await startDashboard(app, feed, config.dashboardPort);

  const detach = terminal.attach((signal) => orchestrator.send(signal));
  const signalHandler = () => {
    orchestrator.send({ kind: "shutdown" });
  };
  process.on("SIGINT", signalHandler);
  process.on("SIGTERM", signalHandler);

  console.log(`Assistant ready (profile: ${orchestrator.profile}, tools: ${context.registry.size})`);
  await orchestrator.run();

  detach();
  await dashboard.close();
  await vad.destroy();
  console.log("Assistant stopped");
}

main().then(
  () => process.exit(0),
  (err) => {
    console.error(`Assistant failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);

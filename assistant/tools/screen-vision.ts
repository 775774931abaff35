/**
 * look_at_screen: describes what is on the user's screen.
 *
 * Responsibilities:
 * - Hide the assistant's own window, capture, and always restore the window
 * - Reject blank captures (macOS returns a tiny image without screen-recording permission)
 * - Downscale before upload, falling back to the original when scaling fails
 * - Ask the vision model for a description; the reply model only sees that text,
 *   placed ahead of the user's question
 */

import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { InterruptedError, ModelTimeoutError, ModelUnavailableError, ToolError, errorMessage } from "../errors.js";
import type { LanguageModel, ToolDescriptor } from "../types.js";
import { runCommand, type CommandRunner } from "./process.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Captures smaller than this are blank frames from a denied permission */
export const MIN_CAPTURE_BYTES = 10 * 1024;

const MAX_EDGE_PX = 1280;

const VISION_PROMPT =
  "Describe what is visible on this screenshot of the user's screen: the applications, " +
  "the main content and any text that matters. Be factual and concise.";

// ============================================================================
// INTERFACES
// ============================================================================

/** The assistant's on-screen window, if it has one */
export interface WindowControl {
  hide(): Promise<void>;
  restore(): Promise<void>;
}

/** Grabs the screen, then shrinks an image. Both work on PNG bytes. */
export interface ScreenGrabber {
  capture(signal: AbortSignal): Promise<Buffer>;
  downscale(image: Buffer, signal: AbortSignal): Promise<Buffer>;
}

export interface ScreenVisionConfig {
  model: LanguageModel;
  window?: WindowControl;
  grabber?: ScreenGrabber;
}

/** A terminal front end has no window to move out of the way */
export const NO_WINDOW: WindowControl = {
  hide: async () => {},
  restore: async () => {},
};

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createScreenVisionTool(config: ScreenVisionConfig): ToolDescriptor {
  const window = config.window ?? NO_WINDOW;
  const grabber = config.grabber ?? createCommandGrabber();

  return {
    name: "look_at_screen",
    description: "Look at the user's screen. Use when they ask about something currently displayed on their screen.",
    parameters: {
      focus: { type: "string", description: "What the user wants to know about the screen", required: false },
    },
    extraction: {
      kind: "single_value",
      parameter: "focus",
      prompt: "What specifically does this message want to know about the screen? If nothing specific, reply NONE.",
    },
    resultPlacement: "before_question",
    handler: async (args, signal) => {
      await window.hide();
      let image: Buffer;
      try {
        image = await grabber.capture(signal);
      } finally {
        await window.restore();
      }

      if (image.length < MIN_CAPTURE_BYTES) {
        throw new ToolError("permission_denied", "the screen capture came back blank; screen recording permission is probably missing");
      }

      const scaled = await grabber.downscale(image, signal).catch((err: unknown) => {
        if (signal.aborted) throw err;
        console.warn(`[tool] screenshot downscale failed, sending original: ${errorMessage(err)}`);
        return image;
      });

      const focus = typeof args.focus === "string" ? args.focus : "";
      const prompt = focus ? `${VISION_PROMPT} Pay particular attention to: ${focus}` : VISION_PROMPT;

      let description: string;
      try {
        description = await config.model.describeImage(scaled, "image/png", prompt, { signal });
      } catch (err) {
        if (err instanceof InterruptedError) throw err;
        if (err instanceof ModelTimeoutError) throw new ToolError("timeout", "the vision model timed out", { cause: err });
        if (err instanceof ModelUnavailableError) throw new ToolError("network_unavailable", "the vision model is unreachable", { cause: err });
        throw err;
      }

      return `[Screen description] ${description.trim()}`;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Screen grabber over system commands: screencapture and sips on macOS,
 * ImageMagick's import and convert elsewhere.
 */
export function createCommandGrabber(platform: NodeJS.Platform = process.platform, run: CommandRunner = runCommand): ScreenGrabber {
  const mac = platform === "darwin";

  async function withTempDir<T>(work: (dir: string) => Promise<T>): Promise<T> {
    const dir = await mkdtemp(join(tmpdir(), "assistant-screen-"));
    try {
      return await work(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  async function checked(command: string, args: string[], signal: AbortSignal): Promise<void> {
    const result = await run(command, args, { signal });
    if (result.code !== 0) {
      throw new ToolError("failed", `${command} exited with ${result.code}: ${result.stderr.trim()}`);
    }
  }

  return {
    capture: (signal) =>
      withTempDir(async (dir) => {
        const file = join(dir, "screen.png");
        if (mac) {
          await checked("screencapture", ["-x", "-t", "png", file], signal);
        } else {
          await checked("import", ["-window", "root", file], signal);
        }
        return readFile(file);
      }),

    downscale: (image, signal) =>
      withTempDir(async (dir) => {
        const input = join(dir, "in.png");
        const output = join(dir, "out.png");
        await writeFile(input, image);
        if (mac) {
          await checked("sips", ["-Z", String(MAX_EDGE_PX), input, "--out", output], signal);
        } else {
          await checked("convert", [input, "-resize", `${MAX_EDGE_PX}x${MAX_EDGE_PX}>`, output], signal);
        }
        return readFile(output);
      }),
  };
}

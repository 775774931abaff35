/**
 * read_clipboard / write_clipboard through the platform's clipboard commands
 * (pbpaste/pbcopy on macOS, xclip elsewhere).
 *
 * write_clipboard replaces what the user copied, so it reads its action back
 * for confirmation before running.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { runCommand, type CommandRunner } from "./process.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Longest clipboard text quoted back in a confirmation */
const PREVIEW_CHARS = 80;

interface ClipboardCommands {
  read: [string, string[]];
  write: [string, string[]];
}

const MAC_COMMANDS: ClipboardCommands = {
  read: ["pbpaste", []],
  write: ["pbcopy", []],
};

const XCLIP_COMMANDS: ClipboardCommands = {
  read: ["xclip", ["-selection", "clipboard", "-o"]],
  write: ["xclip", ["-selection", "clipboard"]],
};

// ============================================================================
// INTERFACES
// ============================================================================

export interface ClipboardToolConfig {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createClipboardTools(config: ClipboardToolConfig = {}): ToolDescriptor[] {
  const commands = (config.platform ?? process.platform) === "darwin" ? MAC_COMMANDS : XCLIP_COMMANDS;
  const run = config.run ?? runCommand;

  const readTool: ToolDescriptor = {
    name: "read_clipboard",
    description: "Read the text currently on the user's clipboard.",
    parameters: {},
    handler: async (_args, signal) => {
      const [command, args] = commands.read;
      const result = await run(command, args, { signal });
      if (result.code !== 0) {
        throw new ToolError("failed", `${command} exited with ${result.code}: ${result.stderr.trim()}`);
      }
      return result.stdout.trim() === "" ? "The clipboard is empty." : `Clipboard contents:\n${result.stdout}`;
    },
  };

  const writeTool: ToolDescriptor = {
    name: "write_clipboard",
    description: "Put text on the user's clipboard, replacing what is there.",
    parameters: {
      text: { type: "string", description: "Exact text to copy", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "text",
      prompt: "What exact text does this message ask to copy to the clipboard?",
    },
    describeAction: (args) => `copy "${preview(String(args.text))}" to the clipboard`,
    handler: async (args, signal) => {
      const [command, commandArgs] = commands.write;
      const text = String(args.text);
      const result = await run(command, commandArgs, { signal, input: text });
      if (result.code !== 0) {
        throw new ToolError("failed", `${command} exited with ${result.code}: ${result.stderr.trim()}`);
      }
      return `Copied ${text.length} characters to the clipboard.`;
    },
  };

  return [readTool, writeTool];
}

function preview(text: string): string {
  return text.length > PREVIEW_CHARS ? `${text.slice(0, PREVIEW_CHARS)}...` : text;
}

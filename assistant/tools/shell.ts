/**
 * execute_shell: runs one shell command after the user confirms it.
 */

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";
import { runCommand, type CommandRunner } from "./process.js";

const DEFAULT_TIMEOUT_MS = 15_000;
const MAX_OUTPUT_CHARS = 2000;

export interface ShellToolConfig {
  /** Working directory for commands */
  cwd?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

export function createShellTool(config: ShellToolConfig = {}): ToolDescriptor {
  const run = config.run ?? runCommand;

  return {
    name: "execute_shell",
    description: "Run a shell command on the user's computer when they explicitly ask to run one.",
    parameters: {
      command: { type: "string", description: "The exact shell command line", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "command",
      prompt: "Write the single shell command this message asks to run.",
    },
    describeAction: (args) => String(args.command),
    timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    handler: async (args, signal) => {
      const command = String(args.command);
      const result = await run("/bin/sh", ["-c", command], { signal, cwd: config.cwd });

      const output = clip([result.stdout.trim(), result.stderr.trim()].filter(Boolean).join("\n"));
      if (result.code !== 0) {
        throw new ToolError("failed", `command exited with ${result.code ?? "a signal"}${output ? `:\n${output}` : ""}`);
      }
      return output === "" ? "The command finished with no output." : output;
    },
  };
}

/**
 * Keep the head of long output, marking the cut.
 */
export function clip(output: string, limit = MAX_OUTPUT_CHARS): string {
  return output.length > limit ? `${output.slice(0, limit)}\n[output truncated]` : output;
}

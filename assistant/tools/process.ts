/**
 * Child process runner shared by the clipboard, shell and screen tools.
 */

import { spawn } from "child_process";

import { ToolError } from "../errors.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface CommandResult {
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal */
  code: number | null;
}

export interface CommandOptions {
  signal: AbortSignal;
  /** Written to stdin, which is then closed */
  input?: string;
  cwd?: string;
}

/** Runs a command to completion. Injectable so tools can be tested without a shell. */
export type CommandRunner = (command: string, args: readonly string[], options: CommandOptions) => Promise<CommandResult>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Spawn a command and collect its output. Killed when the signal aborts.
 *
 * @throws ToolError not_found when the command does not exist
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(command, [...args], { signal: options.signal, cwd: options.cwd });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout?.on("data", (data: Buffer) => stdout.push(data));
    proc.stderr?.on("data", (data: Buffer) => stderr.push(data));

    proc.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "ENOENT") {
        reject(new ToolError("not_found", `command not found: ${command}`, { cause: err }));
      } else {
        reject(err);
      }
    });

    proc.on("close", (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        code,
      });
    });

    if (options.input !== undefined) {
      proc.stdin?.end(options.input);
    } else {
      proc.stdin?.end();
    }
  });
};

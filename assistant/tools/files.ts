/**
 * read_file: reads a text file below a configured root directory.
 *
 * Responsibilities:
 * - Resolve the requested path against the root, following symlinks, and
 *   refuse anything that lands outside it
 * - Refuse directories, oversized files and binary content
 * - Map filesystem errors onto tool failure kinds
 */

import { readFile, realpath, stat } from "fs/promises";
import { isAbsolute, relative, resolve, sep } from "path";

import { ToolError } from "../errors.js";
import type { ToolDescriptor } from "../types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_MAX_BYTES = 64 * 1024;

// ============================================================================
// INTERFACES
// ============================================================================

export interface FileToolConfig {
  /** Only files below this directory can be read */
  root: string;
  maxBytes?: number;
}

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

export function createReadFileTool(config: FileToolConfig): ToolDescriptor {
  const maxBytes = config.maxBytes ?? DEFAULT_MAX_BYTES;

  return {
    name: "read_file",
    description: "Read a text file from the user's files when they ask what a file says.",
    parameters: {
      path: { type: "string", description: "File path, relative to the allowed folder or absolute inside it", required: true },
    },
    extraction: {
      kind: "single_value",
      parameter: "path",
      prompt: "Which file path does this message ask to read?",
    },
    handler: async (args) => {
      const target = await resolveInsideRoot(config.root, String(args.path));

      const info = await stat(target).catch((err: unknown) => {
        throw fsFailure(err, String(args.path));
      });
      if (info.isDirectory()) throw new ToolError("invalid_arguments", `${args.path} is a directory`);
      if (info.size > maxBytes) {
        throw new ToolError("out_of_range", `${args.path} is ${info.size} bytes; the limit is ${maxBytes}`);
      }

      const data = await readFile(target).catch((err: unknown) => {
        throw fsFailure(err, String(args.path));
      });
      if (data.includes(0)) throw new ToolError("failed", `${args.path} is not a text file`);

      const text = data.toString("utf-8");
      return text.trim() === "" ? `${args.path} is empty.` : `Contents of ${args.path}:\n${text}`;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Resolve a user-supplied path and confirm its real location is inside root.
 *
 * @returns The resolved real path
 * @throws ToolError permission_denied outside the root, not_found when missing
 */
export async function resolveInsideRoot(root: string, requested: string): Promise<string> {
  const realRoot = await realpath(root).catch((err: unknown) => {
    throw new ToolError("permission_denied", "the allowed folder is not available", { cause: err });
  });

  const candidate = isAbsolute(requested) ? requested : resolve(realRoot, requested);
  const realTarget = await realpath(candidate).catch((err: unknown) => {
    throw fsFailure(err, requested);
  });

  const rel = relative(realRoot, realTarget);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ToolError("permission_denied", `${requested} is outside the allowed folder`);
  }
  return realTarget;
}

function fsFailure(err: unknown, path: string): ToolError {
  const code = err instanceof Error && "code" in err ? err.code : undefined;
  if (code === "ENOENT" || code === "ENOTDIR") return new ToolError("not_found", `${path} does not exist`, { cause: err });
  if (code === "EACCES" || code === "EPERM") return new ToolError("permission_denied", `cannot read ${path}`, { cause: err });
  return new ToolError("failed", `cannot read ${path}`, { cause: err });
}

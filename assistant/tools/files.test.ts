/**
 * Unit tests for read_file against a temporary directory tree.
 *
 * Run: npx tsx --test assistant/tools/files.test.ts
 */

import { after, before, test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdir, mkdtemp, rm, symlink, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { ToolError } from "../errors.js";
import { createReadFileTool } from "./files.js";

// ============================================================================
// FIXTURES
// ============================================================================

let base = "";
let root = "";
const signal = new AbortController().signal;

before(async () => {
  base = await mkdtemp(join(tmpdir(), "read-file-"));
  root = join(base, "root");
  await mkdir(join(root, "sub"), { recursive: true });
  await writeFile(join(root, "notes.txt"), "buy milk\n");
  await writeFile(join(root, "empty.txt"), "  \n");
  await writeFile(join(root, "blob.dat"), Buffer.from([0x41, 0x00, 0x42]));
  await writeFile(join(root, "big.txt"), "x".repeat(20));
  await writeFile(join(base, "outside.txt"), "secret plans");
  await symlink(join(base, "outside.txt"), join(root, "link.txt"));
});

after(async () => {
  await rm(base, { recursive: true, force: true });
});

function read(path: string, maxBytes?: number): Promise<string> {
  return createReadFileTool({ root, maxBytes }).handler({ path }, signal);
}

async function failsWith(path: string, kind: string, message: string, maxBytes?: number): Promise<void> {
  await assert.rejects(read(path, maxBytes), (err: unknown) => {
    return err instanceof ToolError && err.kind === kind && err.message === message;
  });
}

// ============================================================================
// TESTS
// ============================================================================

test("a text file inside the root is returned with a header", async () => {
  assert.equal(await read("notes.txt"), "Contents of notes.txt:\nbuy milk\n");
});

test("an absolute path inside the root is accepted", async () => {
  const absolute = join(root, "notes.txt");
  assert.equal(await read(absolute), `Contents of ${absolute}:\nbuy milk\n`);
});

test("a blank file reads as empty", async () => {
  assert.equal(await read("empty.txt"), "empty.txt is empty.");
});

test("directories, binaries and oversized files are refused", async () => {
  await failsWith("sub", "invalid_arguments", "sub is a directory");
  await failsWith("blob.dat", "failed", "blob.dat is not a text file");
  await failsWith("big.txt", "out_of_range", "big.txt is 20 bytes; the limit is 10", 10);
});

test("a missing file is not_found", async () => {
  await failsWith("missing.txt", "not_found", "missing.txt does not exist");
});

test("paths that escape the root are denied, including through symlinks", async () => {
  await failsWith("../outside.txt", "permission_denied", "../outside.txt is outside the allowed folder");
  await failsWith("link.txt", "permission_denied", "link.txt is outside the allowed folder");
});

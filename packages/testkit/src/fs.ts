/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "wildtrie-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "wildtrie-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write a dictionary file with one word per line
 * @param dir - Directory to write into
 * @param lines - Lines of the file
 * @param options - File name and line ending
 * @returns Absolute path to the written file
 */
export async function writeDictionary(
  dir: string,
  lines: string[],
  options: { name?: string; eol?: "\n" | "\r\n" } = {}
): Promise<string> {
  const { name = "words.txt", eol = "\n" } = options;
  const path = join(dir, name);
  await writeFile(path, lines.join(eol) + eol, "utf8");
  return path;
}

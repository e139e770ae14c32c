/**
 * I/O helpers for CLI
 */

import { createReadStream } from "node:fs";
import * as fs from "node:fs/promises";
import { createInterface } from "node:readline";
import { CliError, DictionaryNotFoundError } from "./errors.js";

/**
 * Ensure a path names a readable regular file
 * @throws DictionaryNotFoundError if the file does not exist
 */
export async function assertFile(filePath: string): Promise<void> {
  const stats = await fs.stat(filePath).catch((err: unknown) => {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new DictionaryNotFoundError(filePath, { cause: err });
    }
    throw new CliError(`Cannot read dictionary: ${filePath}`, { cause: err });
  });

  if (!stats.isFile()) {
    throw new CliError(`Dictionary is not a file: ${filePath}`);
  }
}

/**
 * Read a text file line by line
 * Line endings (\n or \r\n) are removed.
 */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  await assertFile(filePath);

  const input = createReadStream(filePath, { encoding: "utf8" });
  const rl = createInterface({ input, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      yield line.endsWith("\r") ? line.slice(0, -1) : line;
    }
  } finally {
    rl.close();
    input.destroy();
  }
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

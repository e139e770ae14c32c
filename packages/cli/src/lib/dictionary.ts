/**
 * Dictionary loader
 * Feeds a line-oriented word file into a WildcardTrie
 */

import { InvalidWordError, WildcardTrie, logger } from "@wildtrie/core";
import type { CliConfig } from "./config.js";
import { CliError } from "./errors.js";
import { readLines } from "./io.js";

export interface LoadSummary {
  /** Lines stored in the trie */
  inserted: number;
  /** Lines refused by the trie */
  skipped: number;
  /** Empty lines ignored */
  blank: number;
}

export interface LoadOptions {
  /** Fail on the first invalid line instead of skipping it */
  strict?: boolean;
}

/**
 * Insert every line of a dictionary file into a trie
 * @throws CliError in strict mode, on the first line the trie refuses
 */
export async function loadDictionary(
  trie: WildcardTrie,
  filePath: string,
  options: LoadOptions = {}
): Promise<LoadSummary> {
  const summary: LoadSummary = { inserted: 0, skipped: 0, blank: 0 };
  let lineNumber = 0;

  for await (const line of readLines(filePath)) {
    lineNumber++;

    if (line.length === 0) {
      summary.blank++;
      continue;
    }

    try {
      trie.insert(line);
      summary.inserted++;
    } catch (err) {
      if (!(err instanceof InvalidWordError)) throw err;
      if (options.strict) {
        throw new CliError(`${filePath}:${lineNumber}: ${err.message}`, { cause: err });
      }
      summary.skipped++;
    }
  }

  if (summary.skipped > 0) {
    logger.warn("dictionary.skip", {
      source: filePath,
      message: `skipped ${summary.skipped} invalid line(s)`,
    });
  }

  logger.debug("dictionary.load", { source: filePath, details: { ...summary } });
  return summary;
}

/**
 * Build a trie from the configured dictionary
 */
export async function openDictionaryTrie(
  config: CliConfig
): Promise<{ trie: WildcardTrie; summary: LoadSummary }> {
  const trie = new WildcardTrie({ wildcard: config.wildcard });
  const summary = await loadDictionary(trie, config.dictionary, { strict: config.strict });
  return { trie, summary };
}

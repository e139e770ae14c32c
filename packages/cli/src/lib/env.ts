/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { DEFAULT_WILDCARD } from "@wildtrie/core";

/**
 * Dictionary used when neither --dict nor WILDTRIE_DICT is given
 */
export const DEFAULT_DICTIONARY = "/usr/share/dict/words";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Pick the dictionary path
 * Priority: CLI option > WILDTRIE_DICT env var > /usr/share/dict/words
 */
export function selectDictionary(cliDict?: string): string {
  return cliDict ?? process.env.WILDTRIE_DICT ?? DEFAULT_DICTIONARY;
}

/**
 * Resolve a dictionary path to an absolute path
 */
export function resolveDictionaryPath(dict: string): string {
  return path.resolve(expandTilde(dict));
}

/**
 * Pick the wildcard character
 * Priority: CLI option > WILDTRIE_WILDCARD env var > "*"
 */
export function selectWildcard(cliWildcard?: string): string {
  return cliWildcard ?? process.env.WILDTRIE_WILDCARD ?? DEFAULT_WILDCARD;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.WILDTRIE_CLI_DEBUG === "1";
}

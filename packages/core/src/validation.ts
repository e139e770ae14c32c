/**
 * Validation utilities for trie operations
 */

import { InvalidWildcardError, InvalidWordError } from "./errors.js";

/**
 * Wildcard used when none is configured
 */
export const DEFAULT_WILDCARD = "*";

/**
 * Check whether a string holds exactly one Unicode code point
 */
export function isSingleCodePoint(value: string): boolean {
  let count = 0;
  for (const _ of value) {
    count++;
    if (count > 1) return false;
  }
  return count === 1;
}

/**
 * Resolve the wildcard option
 * @param wildcard - `undefined` selects the default, `null` disables wildcard matching
 * @returns The wildcard character, or null when disabled
 * @throws InvalidWildcardError if the value is not a single character
 */
export function validateWildcard(wildcard: string | null | undefined): string | null {
  if (wildcard === undefined) return DEFAULT_WILDCARD;
  if (wildcard === null) return null;

  if (!isSingleCodePoint(wildcard)) {
    throw new InvalidWildcardError(wildcard);
  }

  return wildcard;
}

/**
 * Validate a word before insertion
 * @param word - Candidate word
 * @param wildcard - Active wildcard, or null when disabled
 * @returns The word, narrowed to a string
 * @throws InvalidWordError if the word is absent, empty, or contains the wildcard
 */
export function validateWord(word: string | null | undefined, wildcard: string | null): string {
  if (word === null || word === undefined) {
    throw new InvalidWordError(word, "absent");
  }

  if (word.length === 0) {
    throw new InvalidWordError(word, "empty");
  }

  if (wildcard !== null && word.includes(wildcard)) {
    throw new InvalidWordError(word, "wildcard");
  }

  return word;
}

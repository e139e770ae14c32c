/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isSingleCodePoint } from "@wildtrie/core";

/**
 * Parse a single-character argument such as --wildcard
 */
export function parseCharacter(value: string, name: string): string {
  if (!isSingleCodePoint(value)) {
    throw new InvalidArgumentError(`${name} must be exactly one character`);
  }

  return value;
}

/**
 * Error types for wildcard trie operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Search operations never throw; only insertion and construction do
 */

/**
 * Base class for all wildcard trie errors
 */
export abstract class WildcardTrieError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Why a word was refused by `insert`
 */
export type InvalidWordReason = "absent" | "empty" | "wildcard";

/**
 * Thrown when a word cannot be stored in the trie
 */
export class InvalidWordError extends WildcardTrieError {
  readonly code = "E_INVALID_WORD";

  constructor(
    public readonly word: string | null | undefined,
    public readonly reason: InvalidWordReason,
    options?: ErrorOptions
  ) {
    super(`Invalid word (${describeWord(word)}): ${describeReason(reason)}`, options);
  }
}

/**
 * Thrown when the configured wildcard is not a single character
 */
export class InvalidWildcardError extends WildcardTrieError {
  readonly code = "E_INVALID_WILDCARD";

  constructor(
    public readonly wildcard: string,
    options?: ErrorOptions
  ) {
    super(`Wildcard must be exactly one character, got ${JSON.stringify(wildcard)}`, options);
  }
}

function describeWord(word: string | null | undefined): string {
  return typeof word === "string" ? JSON.stringify(word) : String(word);
}

function describeReason(reason: InvalidWordReason): string {
  switch (reason) {
    case "absent":
      return "no word supplied";
    case "empty":
      return "word is empty";
    case "wildcard":
      return "word contains the wildcard character";
  }
}

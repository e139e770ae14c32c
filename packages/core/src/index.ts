/**
 * Wildcard Trie core
 *
 * In-memory word index with exact, prefix and single-character wildcard lookup
 */

export { WildcardTrie } from "./trie.js";
export type { WildcardTrieOptions, TrieStats } from "./trie.js";

export { TrieNode, ROOT_SYMBOL } from "./node.js";
export type { NodeLabel, NodeView } from "./node.js";

export { DEFAULT_WILDCARD, isSingleCodePoint, validateWildcard, validateWord } from "./validation.js";

// Re-export errors
export { WildcardTrieError, InvalidWordError, InvalidWildcardError } from "./errors.js";
export type { InvalidWordReason } from "./errors.js";

// Re-export logging
export { logger, Logger, formatEntry } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

/**
 * WildcardTrie: a trie over stored words that answers exact, prefix and
 * single-character wildcard lookups.
 *
 * Invariants:
 * - The set of terminal nodes, read as root-to-node paths, is exactly the set
 *   of inserted words
 * - Words are never removed; the tree only grows
 * - A wildcard in a search term matches exactly one existing child at that
 *   position; it never stands for characters absent from the tree
 */

import { TrieNode, type NodeView } from "./node.js";
import { logger } from "./observability/logs.js";
import { validateWildcard, validateWord } from "./validation.js";

export interface WildcardTrieOptions {
  /**
   * Single-character wildcard for search terms (default "*").
   * Pass null to treat every search character literally.
   */
  wildcard?: string | null;
}

export interface TrieStats {
  /** Distinct stored words */
  words: number;
  /** Nodes in the tree, root included */
  nodes: number;
  /** Length of the longest stored word */
  maxDepth: number;
}

/**
 * A node reached by one resolution of a search term
 */
interface Resolution {
  node: TrieNode;
  /** The term with every wildcard replaced by the character actually followed */
  path: string;
}

interface Frame {
  node: TrieNode;
  offset: number;
  path: string;
}

export class WildcardTrie {
  readonly #wildcard: string | null;
  readonly #root = new TrieNode();
  #size = 0;

  constructor(options: WildcardTrieOptions = {}) {
    this.#wildcard = validateWildcard(options.wildcard);
  }

  get wildcard(): string | null {
    return this.#wildcard;
  }

  /**
   * Number of distinct stored words
   */
  get size(): number {
    return this.#size;
  }

  /**
   * Store a word; inserting a word twice has no further effect
   * @throws InvalidWordError if the word is absent, empty, or contains the wildcard
   */
  insert(word: string | null | undefined): void {
    const valid = validateWord(word, this.#wildcard);

    let current = this.#root;
    for (const char of valid) {
      current = current.getOrAddChild(char);
    }

    if (!current.isTerminal) {
      current.isTerminal = true;
      this.#size++;
    }
  }

  /**
   * Store every word in order, stopping at the first invalid one.
   * Words before the invalid one stay stored.
   * @returns Number of words inserted
   */
  insertAll(words: Iterable<string> | null | undefined): number {
    if (!words) return 0;

    let count = 0;
    for (const word of words) {
      this.insert(word);
      count++;
    }

    logger.debug("trie.insert_all", { details: { count, size: this.#size } });
    return count;
  }

  /**
   * True when some resolution of the term is a strict prefix of a stored word
   */
  isPrefix(term: string | null | undefined): boolean {
    for (const { node } of this.#resolve(term)) {
      if (node.hasChildren) return true;
    }
    return false;
  }

  /**
   * True when some resolution of the term is a stored word
   */
  isWord(term: string | null | undefined): boolean {
    for (const { node } of this.#resolve(term)) {
      if (node.isTerminal) return true;
    }
    return false;
  }

  /**
   * Every stored word produced by some resolution of the term
   */
  getMatchingWords(term: string | null | undefined): Set<string> {
    const words = new Set<string>();
    for (const { node, path } of this.#resolve(term)) {
      if (node.isTerminal) {
        words.add(path);
      }
    }
    return words;
  }

  /**
   * Walk the tree along the term, forking over every child at each wildcard.
   * Yields the node reached at the end of the term for each resolution.
   * Absent or empty terms resolve to nothing.
   */
  *#resolve(term: string | null | undefined): Generator<Resolution> {
    if (!term) return;

    const chars = Array.from(term);
    const stack: Frame[] = [{ node: this.#root, offset: 0, path: "" }];

    while (stack.length > 0) {
      const frame = stack.pop();
      if (!frame) break;
      const { node, offset, path } = frame;

      if (offset === chars.length) {
        yield { node, path };
        continue;
      }

      const char = chars[offset];
      if (char === this.#wildcard) {
        for (const [key, child] of node.children) {
          stack.push({ node: child, offset: offset + 1, path: path + key });
        }
        continue;
      }

      const child = node.child(char);
      if (child) {
        stack.push({ node: child, offset: offset + 1, path: path + char });
      }
    }
  }

  /**
   * Level-order traversal of every node, root first, as frozen views
   */
  *traverse(): Generator<NodeView> {
    for (const { node } of this.#levels()) {
      yield node.view();
    }
  }

  /**
   * Diagnostic rendering: each node as `[symbol -> children]` in level order
   */
  render(): string {
    let out = "";
    for (const { node } of this.#levels()) {
      out += node.toString();
    }
    return out;
  }

  stats(): TrieStats {
    let nodes = 0;
    let maxDepth = 0;
    for (const { node, depth } of this.#levels()) {
      nodes++;
      if (node.isTerminal && depth > maxDepth) {
        maxDepth = depth;
      }
    }
    return { words: this.#size, nodes, maxDepth };
  }

  toString(): string {
    return this.render();
  }

  *#levels(): Generator<{ node: TrieNode; depth: number }> {
    const queue: Array<{ node: TrieNode; depth: number }> = [{ node: this.#root, depth: 0 }];

    for (let head = 0; head < queue.length; head++) {
      const entry = queue[head];
      yield entry;
      for (const child of entry.node.children.values()) {
        queue.push({ node: child, depth: entry.depth + 1 });
      }
    }
  }
}

/**
 * Trie vertex
 *
 * Each node owns its children exclusively; the graph is a tree with no
 * shared nodes. The root carries no character.
 */

/**
 * What a node stands for along the path from the root
 */
export type NodeLabel = { readonly kind: "root" } | { readonly kind: "char"; readonly char: string };

const ROOT_LABEL: NodeLabel = { kind: "root" };

/**
 * Symbol printed for the root in diagnostic output
 */
export const ROOT_SYMBOL = "^";

/**
 * Frozen snapshot of a node, handed out by traversal
 */
export interface NodeView {
  readonly symbol: string | undefined;
  readonly isTerminal: boolean;
  readonly childSymbols: readonly string[];
}

export class TrieNode {
  readonly label: NodeLabel;
  readonly children = new Map<string, TrieNode>();
  /** True when the path from the root spells a stored word */
  isTerminal = false;

  constructor(label: NodeLabel = ROOT_LABEL) {
    this.label = label;
  }

  /**
   * Create a node for a single character
   */
  static forChar(char: string): TrieNode {
    return new TrieNode({ kind: "char", char });
  }

  get isRoot(): boolean {
    return this.label.kind === "root";
  }

  /**
   * The character this node represents, undefined for the root
   */
  get symbol(): string | undefined {
    return this.label.kind === "char" ? this.label.char : undefined;
  }

  get hasChildren(): boolean {
    return this.children.size > 0;
  }

  child(char: string): TrieNode | undefined {
    return this.children.get(char);
  }

  /**
   * Get the child for a character, creating it when missing
   */
  getOrAddChild(char: string): TrieNode {
    let next = this.children.get(char);
    if (!next) {
      next = TrieNode.forChar(char);
      this.children.set(char, next);
    }
    return next;
  }

  /**
   * Snapshot detached from the tree; changing it never touches the node
   */
  view(): NodeView {
    return Object.freeze({
      symbol: this.symbol,
      isTerminal: this.isTerminal,
      childSymbols: Object.freeze([...this.children.keys()]),
    });
  }

  toString(): string {
    const keys = [...this.children.keys()];
    const head = `[${this.symbol ?? ROOT_SYMBOL} ->`;
    return keys.length > 0 ? `${head} ${keys.join(" ")}]` : `${head}]`;
  }
}

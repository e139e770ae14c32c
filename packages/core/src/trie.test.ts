/**
 * Tests for WildcardTrie
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WildcardTrie } from "./trie.js";
import { InvalidWildcardError, InvalidWordError } from "./errors.js";
import { logger } from "./observability/logs.js";

const VOCABULARY = [
  "fun",
  "fund",
  "funds",
  "funding",
  "farm",
  "tunafish",
  "crowdfunding",
  "fun farm",
];

function loaded(words: string[] = VOCABULARY, wildcard?: string | null): WildcardTrie {
  const trie = new WildcardTrie(wildcard === undefined ? {} : { wildcard });
  trie.insertAll(words);
  return trie;
}

describe("WildcardTrie", () => {
  beforeEach(() => {
    logger.setEnabled(false);
  });

  afterEach(() => {
    logger.setEnabled(true);
  });

  describe("construction", () => {
    it("should default the wildcard to *", () => {
      expect(new WildcardTrie().wildcard).toBe("*");
      expect(new WildcardTrie({ wildcard: undefined }).wildcard).toBe("*");
    });

    it("should accept a custom wildcard", () => {
      const trie = loaded(["cat", "cut"], "?");
      expect(trie.wildcard).toBe("?");
      expect(trie.getMatchingWords("c?t")).toEqual(new Set(["cat", "cut"]));
      expect(trie.getMatchingWords("c*t")).toEqual(new Set());
    });

    it("should disable wildcard matching when wildcard is null", () => {
      const trie = loaded(["a*c", "abc"], null);
      expect(trie.wildcard).toBeNull();
      expect(trie.getMatchingWords("a*c")).toEqual(new Set(["a*c"]));
      expect(trie.isWord("abc")).toBe(true);
    });

    it("should reject multi-character wildcards", () => {
      expect(() => new WildcardTrie({ wildcard: "**" })).toThrow(InvalidWildcardError);
      expect(() => new WildcardTrie({ wildcard: "" })).toThrow(InvalidWildcardError);
    });

    it("should start empty", () => {
      const trie = new WildcardTrie();
      expect(trie.size).toBe(0);
      expect(trie.stats()).toEqual({ words: 0, nodes: 1, maxDepth: 0 });
    });
  });

  describe("insert", () => {
    it("should make inserted words findable", () => {
      const trie = new WildcardTrie();
      trie.insert("potato");
      expect(trie.isWord("potato")).toBe(true);
      expect(trie.size).toBe(1);
    });

    it("should be idempotent", () => {
      const trie = new WildcardTrie();
      trie.insert("potato");
      const before = trie.render();
      trie.insert("potato");
      expect(trie.render()).toBe(before);
      expect(trie.size).toBe(1);
      expect(trie.getMatchingWords("potato")).toEqual(new Set(["potato"]));
    });

    it("should reject absent words", () => {
      const trie = new WildcardTrie();
      expect(() => trie.insert(undefined)).toThrow(InvalidWordError);
      expect(() => trie.insert(null)).toThrow(InvalidWordError);
    });

    it("should reject empty words", () => {
      const trie = new WildcardTrie();
      expect(() => trie.insert("")).toThrow(InvalidWordError);
    });

    it("should reject words containing the wildcard", () => {
      const trie = new WildcardTrie();
      expect(() => trie.insert("pot*to")).toThrow(InvalidWordError);
      expect(() => trie.insert("pot*to")).toThrow(
        'Invalid word ("pot*to"): word contains the wildcard character'
      );
    });

    it("should leave the structure unchanged after a rejected word", () => {
      const trie = loaded(["fun"]);
      const before = trie.render();

      expect(() => trie.insert("fu*")).toThrow(InvalidWordError);
      expect(() => trie.insert("")).toThrow(InvalidWordError);

      expect(trie.render()).toBe(before);
      expect(trie.size).toBe(1);
      expect(trie.isPrefix("fu")).toBe(true);
      expect(trie.isPrefix("fun")).toBe(false);
    });

    it("should report the rejection reason", () => {
      const trie = new WildcardTrie();
      try {
        trie.insert("");
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidWordError);
        if (err instanceof InvalidWordError) {
          expect(err.reason).toBe("empty");
          expect(err.code).toBe("E_INVALID_WORD");
        }
      }
    });

    it("should treat astral characters as single characters", () => {
      const trie = loaded(["a😀b"]);
      expect(trie.getMatchingWords("a*b")).toEqual(new Set(["a😀b"]));
      expect(trie.stats().maxDepth).toBe(3);
    });
  });

  describe("insertAll", () => {
    it("should insert every word and return the count", () => {
      const trie = new WildcardTrie();
      expect(trie.insertAll(new Set(["a", "b", "c"]))).toBe(3);
      expect(trie.size).toBe(3);
    });

    it("should accept absent or empty collections", () => {
      const trie = new WildcardTrie();
      expect(trie.insertAll(undefined)).toBe(0);
      expect(trie.insertAll(null)).toBe(0);
      expect(trie.insertAll([])).toBe(0);
      expect(trie.size).toBe(0);
    });

    it("should stop at the first invalid word and keep earlier ones", () => {
      const trie = new WildcardTrie();
      expect(() => trie.insertAll(["fun", "f*n", "farm"])).toThrow(InvalidWordError);
      expect(trie.isWord("fun")).toBe(true);
      expect(trie.isWord("farm")).toBe(false);
      expect(trie.size).toBe(1);
    });
  });

  describe("isPrefix", () => {
    it("should be true when a longer word extends the term", () => {
      expect(loaded().isPrefix("fun")).toBe(true);
    });

    it("should be false for a word nothing extends", () => {
      expect(loaded().isPrefix("tunafish")).toBe(false);
    });

    it("should be true for a word that is also a prefix of another word", () => {
      const trie = loaded(["potato", "potatos"]);
      expect(trie.isPrefix("potato")).toBe(true);
      expect(trie.isWord("potato")).toBe(true);
    });

    it("should resolve wildcards", () => {
      const trie = loaded();
      expect(trie.isPrefix("f*n")).toBe(true);
      expect(trie.isPrefix("*unafis")).toBe(true);
      expect(trie.isPrefix("*unafish")).toBe(false);
    });

    it("should be false for unknown prefixes", () => {
      expect(loaded().isPrefix("xyz")).toBe(false);
      expect(loaded().isPrefix("*x")).toBe(false);
    });

    it("should be false for absent or empty terms", () => {
      const trie = loaded();
      expect(trie.isPrefix("")).toBe(false);
      expect(trie.isPrefix(undefined)).toBe(false);
      expect(trie.isPrefix(null)).toBe(false);
    });
  });

  describe("isWord", () => {
    it("should match stored words exactly", () => {
      const trie = loaded();
      for (const word of VOCABULARY) {
        expect(trie.isWord(word)).toBe(true);
      }
      expect(trie.isWord("fu")).toBe(false);
      expect(trie.isWord("fundin")).toBe(false);
      expect(trie.isWord("fundings")).toBe(false);
    });

    it("should resolve wildcards to any stored word", () => {
      const trie = loaded();
      expect(trie.isWord("****")).toBe(true);
      expect(trie.isWord("***")).toBe(true);
      expect(trie.isWord("**")).toBe(false);
      expect(trie.isWord("fun*farm")).toBe(true);
    });

    it("should be false for absent or empty terms", () => {
      const trie = loaded();
      expect(trie.isWord("")).toBe(false);
      expect(trie.isWord(undefined)).toBe(false);
      expect(trie.isWord(null)).toBe(false);
    });
  });

  describe("getMatchingWords", () => {
    it("should match all four-letter words with four wildcards", () => {
      expect(loaded().getMatchingWords("****")).toEqual(new Set(["fund", "farm"]));
    });

    it("should resolve a leading wildcard", () => {
      expect(loaded().getMatchingWords("*unafish")).toEqual(new Set(["tunafish"]));
    });

    it("should return exactly the literal word for a literal term", () => {
      const words = loaded().getMatchingWords("fun");
      expect(words).toEqual(new Set(["fun"]));
      expect(words.size).toBe(1);
    });

    it("should resolve wildcards in the middle and at the end", () => {
      const trie = loaded();
      expect(trie.getMatchingWords("f*nd")).toEqual(new Set(["fund"]));
      expect(trie.getMatchingWords("fund*")).toEqual(new Set(["funds"]));
      expect(trie.getMatchingWords("fun*")).toEqual(new Set(["fund"]));
      expect(trie.getMatchingWords("fun*farm")).toEqual(new Set(["fun farm"]));
    });

    it("should return the stored words, never the term", () => {
      const words = loaded().getMatchingWords("*****");
      expect(words).toEqual(new Set(["funds"]));
      expect(words.has("*****")).toBe(false);
    });

    it("should match only words of the term's length", () => {
      const trie = loaded();
      for (let n = 1; n <= 12; n++) {
        const expected = VOCABULARY.filter((word) => word.length === n);
        expect(trie.getMatchingWords("*".repeat(n))).toEqual(new Set(expected));
      }
    });

    it("should return a subset of the vocabulary that fits the term", () => {
      const trie = loaded();
      const term = "f**d";
      for (const word of trie.getMatchingWords(term)) {
        expect(VOCABULARY).toContain(word);
        expect(word).toHaveLength(term.length);
        expect(word[0]).toBe("f");
        expect(word[3]).toBe("d");
      }
    });

    it("should return nothing on an empty trie", () => {
      const trie = new WildcardTrie();
      expect(trie.getMatchingWords("*")).toEqual(new Set());
      expect(trie.getMatchingWords("fun")).toEqual(new Set());
    });

    it("should return nothing for absent or empty terms", () => {
      const trie = loaded();
      expect(trie.getMatchingWords("")).toEqual(new Set());
      expect(trie.getMatchingWords(undefined)).toEqual(new Set());
      expect(trie.getMatchingWords(null)).toEqual(new Set());
    });
  });

  describe("wildcard fan-out", () => {
    it("should follow only children that exist at the wildcard position", () => {
      const trie = loaded(["cat", "cut", "cub"]);
      expect(trie.getMatchingWords("c**")).toEqual(new Set(["cat", "cut", "cub"]));
      expect(trie.getMatchingWords("c*t")).toEqual(new Set(["cat", "cut"]));
      expect(trie.isPrefix("c*")).toBe(true);
    });

    it("should find nothing when a literal character is missing", () => {
      expect(loaded().getMatchingWords("fx*")).toEqual(new Set());
    });
  });

  describe("encapsulation", () => {
    it("should keep the search walk private", () => {
      expect("resolve" in loaded()).toBe(false);
    });

    it("should hand out frozen node views from traverse", () => {
      const trie = loaded(["fund"]);
      const views = [...trie.traverse()];

      for (const view of views) {
        expect(Object.isFrozen(view)).toBe(true);
        expect(Object.isFrozen(view.childSymbols)).toBe(true);
        expect(Reflect.set(view, "isTerminal", !view.isTerminal)).toBe(false);
        expect(Reflect.set(view.childSymbols, "length", 0)).toBe(false);
      }

      expect(trie.isWord("fund")).toBe(true);
      expect(trie.isPrefix("fun")).toBe(true);
      expect(trie.size).toBe(1);
      expect(trie.stats()).toEqual({ words: 1, nodes: 5, maxDepth: 4 });
    });
  });

  describe("render", () => {
    it("should render an empty trie as the root alone", () => {
      expect(new WildcardTrie().render()).toBe("[^ ->]");
    });

    it("should render nodes in level order", () => {
      const trie = loaded(["ab", "ac"]);
      expect(trie.render()).toBe("[^ -> a][a -> b c][b ->][c ->]");
      expect(String(trie)).toBe(trie.render());
    });

    it("should visit every node once", () => {
      const trie = loaded(["a", "ab", "b"]);
      const views = [...trie.traverse()];
      expect(views.map((view) => view.symbol)).toEqual([undefined, "a", "b", "b"]);
      expect(views.map((view) => view.isTerminal)).toEqual([false, true, true, true]);
      expect(views.map((view) => view.childSymbols)).toEqual([["a", "b"], ["b"], [], []]);
    });
  });

  describe("stats", () => {
    it("should count words, nodes and depth", () => {
      expect(loaded(["a", "ab", "b"]).stats()).toEqual({ words: 3, nodes: 4, maxDepth: 2 });
    });

    it("should count shared prefixes once", () => {
      const stats = loaded(["fun", "fund", "funds"]).stats();
      expect(stats).toEqual({ words: 3, nodes: 6, maxDepth: 5 });
    });
  });
});

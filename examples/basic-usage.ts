/**
 * Basic Usage Example
 *
 * Demonstrates loading words and running the three kinds of lookup.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { InvalidWordError, WildcardTrie } from "@wildtrie/core";

function main() {
  const trie = new WildcardTrie();

  console.log("Loading words...");
  trie.insertAll(["fun", "fund", "funds", "funding", "farm", "tunafish", "crowdfunding", "fun farm"]);
  console.log(`Stored ${trie.size} words`);

  console.log("\nPrefix lookups");
  console.log(`  isPrefix("fun")      = ${trie.isPrefix("fun")}`);
  console.log(`  isPrefix("tunafish") = ${trie.isPrefix("tunafish")}`);

  console.log("\nWord lookups");
  console.log(`  isWord("****") = ${trie.isWord("****")}`);
  console.log(`  isWord("fu")   = ${trie.isWord("fu")}`);

  console.log("\nWildcard matches");
  for (const term of ["****", "*unafish", "fun*farm"]) {
    const words = [...trie.getMatchingWords(term)].sort();
    console.log(`  ${term}: ${words.join(", ")}`);
  }

  console.log("\nRejected insert");
  try {
    trie.insert("f*n");
  } catch (err) {
    if (!(err instanceof InvalidWordError)) throw err;
    console.log(`  ${err.code}: ${err.message}`);
  }

  console.log("\nStats");
  console.log(`  ${JSON.stringify(trie.stats())}`);
}

main();

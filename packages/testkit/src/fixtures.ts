/**
 * Shared test vocabulary
 */

/**
 * Words with shared prefixes, a word that is a prefix of others, and a word
 * containing a space
 */
export const SAMPLE_VOCABULARY: readonly string[] = [
  "fun",
  "fund",
  "funds",
  "funding",
  "farm",
  "tunafish",
  "crowdfunding",
  "fun farm",
];

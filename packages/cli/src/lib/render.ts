/**
 * Output rendering helpers
 */

import type { TrieStats } from "@wildtrie/core";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Sort matches for display; the trie itself returns them unordered
 */
export function sortWords(words: Iterable<string>): string[] {
  return [...words].sort();
}

/**
 * Header line for a match listing
 */
export function matchHeader(term: string, count: number): string {
  return `${count} words match ${term} in provided dict:`;
}

/**
 * Human-readable trie statistics
 */
export function formatStats(stats: TrieStats): string[] {
  return [`Words: ${stats.words}`, `Nodes: ${stats.nodes}`, `Max depth: ${stats.maxDepth}`];
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

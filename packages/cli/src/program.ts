/**
 * Command definitions for the wildtrie CLI
 */

import { Command, type CommanderError, type OutputConfiguration } from "commander";
import { logger } from "@wildtrie/core";
import { parseCharacter } from "./lib/arg.js";
import { resolveConfig, type CliConfig, type GlobalOptions } from "./lib/config.js";
import { openDictionaryTrie, type LoadSummary } from "./lib/dictionary.js";
import { writeStderr } from "./lib/io.js";
import { colorize, formatStats, matchHeader, printJson, printLines, sortWords } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";

export interface ProgramOptions {
  /** Program version shown by --version */
  version?: string;
  /** Called before a commander error is thrown (usage errors, --help, --version) */
  onExit?: (err: CommanderError) => void;
  /** Override where commander writes help and usage errors */
  output?: OutputConfiguration;
}

/**
 * Build a fresh program; commander keeps parse state, so build one per run
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .configureOutput(
      options.output ?? {
        writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      }
    )
    .exitOverride((err) => {
      options.onExit?.(err);
      throw err;
    });

  program
    .name("wildtrie")
    .description("Wildcard Trie - exact, prefix and single-character wildcard word lookup")
    .version(options.version ?? "0.0.0")
    .option("--dict <path>", "Dictionary file, one word per line")
    .option("--wildcard <char>", "Single-character wildcard", (val) =>
      parseCharacter(val, "--wildcard")
    )
    .option("--strict", "Fail on the first invalid dictionary line")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress warnings and summaries");

  /**
   * Resolve configuration and load the dictionary for a command
   */
  async function load() {
    const config = resolveConfig(program.opts<GlobalOptions>());
    logger.setEnabled(!config.quiet);
    const loaded = await openDictionaryTrie(config);
    if (config.verbose) {
      reportLoad(config, loaded.summary);
    }
    return { config, ...loaded };
  }

  // Match command
  program
    .command("match")
    .description("List dictionary words matching a term")
    .argument("<term>", "Search term; the wildcard matches any one character")
    .option("--json", "Output as JSON")
    .action(async (term: string, cmdOptions: { json?: boolean }) => {
      await withTiming("cli.match", async () => {
        const { trie } = await load();
        const words = sortWords(trie.getMatchingWords(term));

        if (cmdOptions.json) {
          printJson({ term, count: words.length, words });
          return;
        }

        console.log(matchHeader(term, words.length));
        printLines(words);
      });
    });

  // Prefix command
  program
    .command("prefix")
    .description("Check whether a term is a strict prefix of some dictionary word")
    .argument("<term>", "Search term")
    .action(async (term: string) => {
      await withTiming("cli.prefix", async () => {
        const { trie } = await load();
        console.log(String(trie.isPrefix(term)));
      });
    });

  // Word command
  program
    .command("word")
    .description("Check whether a term matches a complete dictionary word")
    .argument("<term>", "Search term")
    .action(async (term: string) => {
      await withTiming("cli.word", async () => {
        const { trie } = await load();
        console.log(String(trie.isWord(term)));
      });
    });

  // Stats command
  program
    .command("stats")
    .description("Show statistics for the loaded dictionary")
    .option("--json", "Output as JSON for machine consumption")
    .action(async (cmdOptions: { json?: boolean }) => {
      await withTiming("cli.stats", async () => {
        const { trie, summary } = await load();
        const stats = trie.stats();

        if (cmdOptions.json) {
          printJson({ ...stats, skipped: summary.skipped }, { raw: true });
          return;
        }

        printLines(formatStats(stats));
      });
    });

  // Render command
  program
    .command("render")
    .description("Print every trie node in level order (diagnostic)")
    .action(async () => {
      await withTiming("cli.render", async () => {
        const { trie } = await load();
        console.log(trie.render());
      });
    });

  return program;
}

function reportLoad(config: CliConfig, summary: LoadSummary): void {
  writeStderr(
    `Loaded ${summary.inserted} words from ${config.dictionary}` +
      ` (${summary.skipped} skipped, ${summary.blank} blank)\n`
  );
}

#!/usr/bin/env node

/**
 * Wildcard Trie CLI entry point
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { CommanderError } from "commander";
import { createProgram } from "./program.js";
import type { GlobalOptions } from "./lib/config.js";
import { mapErrorToExitCode, formatCliError } from "./lib/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: { version?: string } = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

const HANDLED_BY_COMMANDER = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

const program = createProgram({
  version: packageJson.version,
  onExit: (err) => {
    if (!HANDLED_BY_COMMANDER.has(err.code)) {
      process.exit(err.exitCode);
    }
  },
});

// Top-level error handler
async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError && HANDLED_BY_COMMANDER.has(err.code)) {
      process.exit(err.exitCode);
    }

    const opts = program.opts<GlobalOptions>();
    const exitCode = mapErrorToExitCode(err);
    const message = formatCliError(err, opts.verbose);

    console.error(`Error: ${message}`);

    process.exit(exitCode);
  }
}

void main();

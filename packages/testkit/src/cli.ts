/**
 * CLI testing utilities
 */

import { CommanderError, type Command } from "commander";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code the process would have ended with */
  exitCode: number;
  /** Error that ended the run, if any */
  error?: unknown;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables set for the duration of the run */
  env?: Record<string, string | undefined>;
  /** Exit code for errors that are not commander errors (default: 1) */
  mapError?: (error: unknown) => number;
}

type Writer = (chunk: string | Uint8Array, ...rest: unknown[]) => boolean;

/**
 * Run a commander program in process, capturing console and stream output
 * @param createProgram - Factory for a fresh program (commander keeps parse state)
 * @param args - Command arguments, without node and script path
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  createProgram: () => Command,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { env = {}, mapError = () => 1 } = options;
  let stdout = "";
  let stderr = "";

  const toStdout = (...parts: unknown[]): void => {
    stdout += parts.map(String).join(" ") + "\n";
  };
  const toStderr = (...parts: unknown[]): void => {
    stderr += parts.map(String).join(" ") + "\n";
  };

  const saved = {
    log: console.log,
    info: console.info,
    debug: console.debug,
    warn: console.warn,
    error: console.error,
    stdoutWrite: process.stdout.write,
    stderrWrite: process.stderr.write,
  };
  const savedEnv: Record<string, string | undefined> = {};

  console.log = toStdout;
  console.info = toStdout;
  console.debug = toStderr;
  console.warn = toStderr;
  console.error = toStderr;
  const stdoutWrite: Writer = (chunk) => {
    stdout += String(chunk);
    return true;
  };
  const stderrWrite: Writer = (chunk) => {
    stderr += String(chunk);
    return true;
  };
  process.stdout.write = stdoutWrite;
  process.stderr.write = stderrWrite;

  for (const [key, value] of Object.entries(env)) {
    savedEnv[key] = process.env[key];
    setEnv(key, value);
  }

  try {
    await createProgram().parseAsync(args, { from: "user" });
    return { stdout, stderr, exitCode: 0 };
  } catch (error) {
    const exitCode = error instanceof CommanderError ? error.exitCode : mapError(error);
    return { stdout, stderr, exitCode, error };
  } finally {
    console.log = saved.log;
    console.info = saved.info;
    console.debug = saved.debug;
    console.warn = saved.warn;
    console.error = saved.error;
    process.stdout.write = saved.stdoutWrite;
    process.stderr.write = saved.stderrWrite;
    for (const [key, value] of Object.entries(savedEnv)) {
      setEnv(key, value);
    }
  }
}

function setEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key];
  } else {
    process.env[key] = value;
  }
}

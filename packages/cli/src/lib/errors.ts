/**
 * CLI error handling and exit code mapping
 */

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Thrown when the dictionary file does not exist
 */
export class DictionaryNotFoundError extends CliError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Dictionary not found: ${path}`, { exitCode: 2, cause: options?.cause });
    this.name = "DictionaryNotFoundError";
  }
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: dictionary not found
 */
export function mapErrorToExitCode(error: unknown): number {
  // CliError subclasses carry their own exit code
  if (error instanceof CliError) {
    return error.exitCode;
  }

  // Invalid words, wildcards, arguments and unknown errors
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${error.cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}

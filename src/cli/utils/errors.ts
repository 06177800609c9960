/**
 * CLI error handling and exit code mapping
 */

import { DocumentParseError, DocumentReadError } from "../../errors.js";

const MAX_MESSAGE_LENGTH = 2000;

/**
 * Error raised by the CLI layer itself, carrying its own exit code
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
 * Map errors to exit codes
 * - 0: success
 * - 1: usage/render/config/unknown error
 * - 2: document could not be read or parsed
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof DocumentReadError || error instanceof DocumentParseError) {
    return 2;
  }

  return 1;
}

/**
 * Format an error for stderr
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Keep huge document fragments out of the terminal
    if (message.length > MAX_MESSAGE_LENGTH) {
      message = message.substring(0, MAX_MESSAGE_LENGTH) + "... (truncated)";
    }

    if (verbose && error.cause !== undefined) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}

/**
 * True when TFQ_DEBUG asks for causes and stacks
 */
export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.TFQ_DEBUG === "1";
}

/**
 * Shared error handling utilities for CLI commands.
 *
 * Maps errors that escape a command to an exit code and a message, so
 * every command reports failures the same way.
 */

import { EXIT_USAGE_ERROR, EXIT_VALIDATION_FAILURE, UsageError, errorMessage } from '../../errors.js';
import type { CliCommandResult, CliIo } from '../types.js';

/**
 * Returns the exit code for an error: 2 for usage errors, 1 otherwise.
 */
export function exitCodeForError(error: unknown): number {
  return error instanceof UsageError ? EXIT_USAGE_ERROR : EXIT_VALIDATION_FAILURE;
}

/**
 * Prints an error and returns the matching command result.
 *
 * Usage errors also point at `--help`.
 */
export function reportError(error: unknown, io: CliIo): CliCommandResult {
  io.stderr(`Error: ${errorMessage(error)}\n`);
  if (error instanceof UsageError) {
    io.stderr('Run "jsonschema-validator --help" for usage information.\n');
  }
  return { exitCode: exitCodeForError(error) };
}

/**
 * Wraps a command handler with standard error handling.
 *
 * Executes the provided function (sync or async) and sets the process exit
 * code from its result, or from the error it throws.
 *
 * @param fn - The function to wrap (sync or async).
 * @param io - Where error messages go.
 */
export function withErrorHandling(fn: () => CliCommandResult | Promise<CliCommandResult>, io: CliIo): void {
  void (async () => {
    try {
      const result = await fn();
      process.exitCode = result.exitCode;
    } catch (error) {
      process.exitCode = reportError(error, io).exitCode;
    }
  })();
}

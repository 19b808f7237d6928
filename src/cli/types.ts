/**
 * CLI types and interfaces for the jsonschema-validator CLI.
 */

import type { EnvRecord } from '../config/env.js';
import type { FileTypeHint } from '../parsing/files.js';

/**
 * Output destinations. Each call writes the text as given.
 */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

/**
 * Report formats.
 */
export type OutputFormat = 'text' | 'json';

/**
 * Options of a validation run, as given on the command line.
 */
export interface RunCommandOptions {
  /** Explicit configuration file. */
  config?: string;
  /** Schema for the first entry. */
  schema?: string;
  schemaVersion?: string;
  errorTemplate?: string;
  /** `url=path` items, in order. */
  refOverrides: string[];
  /** Documents and glob patterns, flags and positionals in order. */
  documents: string[];
  envPrefix?: string;
  forceFileType: FileTypeHint;
  format: OutputFormat;
  /** Suppress success lines. */
  quiet: boolean;
  /** Enable debug logging. */
  verbose: boolean;
}

/**
 * What the command line asks for.
 */
export type ParsedCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; options: RunCommandOptions };

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command-line arguments, without the node binary and script path.
   */
  args: string[];

  /**
   * Environment variables.
   */
  env: EnvRecord;

  /**
   * Directory relative paths resolve against.
   */
  cwd: string;

  /**
   * Home directory for user-level configuration; empty to skip it.
   */
  homeDir: string;

  io: CliIo;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, 1 for validation failures, 2 for usage errors).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

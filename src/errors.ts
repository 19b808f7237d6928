/**
 * Error taxonomy for configuration resolution and validation.
 *
 * Each class carries the process exit code it maps to when it reaches the
 * CLI boundary. Only {@link UsageError} and its subclasses abort a run;
 * the others are recorded per schema entry or per document.
 *
 * @packageDocumentation
 */

/**
 * Process exit codes.
 */
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION_FAILURE = 1;
export const EXIT_USAGE_ERROR = 2;

/**
 * Exit code union.
 */
export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_VALIDATION_FAILURE | typeof EXIT_USAGE_ERROR;

/**
 * Bad flags, missing schema or documents, unreadable configuration, or an
 * unsupported schema version.
 */
export class UsageError extends Error {
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;
  /** Exit code for the process. */
  public readonly exitCode: ExitCode = EXIT_USAGE_ERROR;

  /**
   * Creates a new UsageError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'UsageError';
    this.cause = cause;
  }
}

/**
 * A configuration file exists but cannot be read or parsed, or one of its
 * fields has the wrong type.
 */
export class ConfigParseError extends UsageError {
  /** Path of the offending file, when the error came from a file. */
  public readonly filePath: string | undefined;

  constructor(message: string, options: { filePath?: string; cause?: Error } = {}) {
    super(message, options.cause);
    this.name = 'ConfigParseError';
    this.filePath = options.filePath;
  }
}

/**
 * A schema version string that does not name a supported draft.
 */
export class UnsupportedDraftError extends UsageError {
  /** The version string as configured. */
  public readonly version: string;

  constructor(version: string, supported: readonly string[]) {
    super(`unsupported schema version: "${version}" (supported: ${supported.join(', ')})`);
    this.name = 'UnsupportedDraftError';
    this.version = version;
  }
}

/**
 * A `$ref` override whose local file cannot be read, parsed or registered.
 */
export class RefOverrideError extends UsageError {
  /** Remote URL being redirected. */
  public readonly url: string;
  /** Local file the URL was redirected to. */
  public readonly localPath: string;

  constructor(url: string, localPath: string, reason: string, cause?: Error) {
    super(`ref-override: cannot use "${localPath}" for URL "${url}": ${reason}`, cause);
    this.name = 'RefOverrideError';
    this.url = url;
    this.localPath = localPath;
  }
}

/**
 * A schema that fails to compile: invalid syntax, an invalid keyword value,
 * or a `$ref` that cannot be resolved.
 */
export class CompileError extends Error {
  public readonly cause: Error | undefined;
  public readonly exitCode: ExitCode = EXIT_VALIDATION_FAILURE;
  /** Path of the schema that failed. */
  public readonly schemaPath: string;

  constructor(schemaPath: string, message: string, cause?: Error) {
    super(message);
    this.name = 'CompileError';
    this.schemaPath = schemaPath;
    this.cause = cause;
  }
}

/**
 * Stage at which reading a file failed.
 */
export type FileParseStage = 'read' | 'parse';

/**
 * A schema, document or override file that cannot be read or parsed.
 */
export class FileParseError extends Error {
  public readonly cause: Error | undefined;
  /** Path of the file. */
  public readonly filePath: string;
  /** Whether reading or parsing failed. */
  public readonly stage: FileParseStage;

  constructor(filePath: string, stage: FileParseStage, message: string, cause?: Error) {
    super(message);
    this.name = 'FileParseError';
    this.filePath = filePath;
    this.stage = stage;
    this.cause = cause;
  }
}

/**
 * A user-supplied error template that fails to parse or execute.
 *
 * Never escapes the renderer; it is converted into fallback text there.
 */
export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

/**
 * Returns the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Returns the thrown value as an Error, wrapping non-Error values.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

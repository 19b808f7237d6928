/**
 * Runs validation for every schema entry of a configuration.
 *
 * Entries run in order, each with its own compiler. A failing entry is
 * recorded and the next entry still runs.
 *
 * @packageDocumentation
 */

import { getEffectiveSettings } from '../config/model.js';
import type { ConfigModel, SchemaEntry } from '../config/types.js';
import { expandDocumentGlobs } from '../documents/expander.js';
import {
  CompileError,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  EXIT_VALIDATION_FAILURE,
  FileParseError,
  UsageError,
  toError,
  type ExitCode,
} from '../errors.js';
import { parseFile, type FileTypeHint, type ParsedFile } from '../parsing/files.js';
import { renderValidationError } from '../templates/renderer.js';
import type { Logger } from '../utils/logger.js';
import type { Draft } from './drafts.js';
import { buildErrorDetails, type ValidationErrorDetail } from './errors.js';
import { prepareSchema, type PreparedSchema } from './prepare.js';
import { resolveRefOverrides } from './refs.js';

/**
 * Outcome of one document.
 */
export type DocumentStatus = 'valid' | 'invalid' | 'parse-error';

/**
 * Result for one document.
 */
export interface DocumentResult {
  /** Document path after glob expansion. */
  readonly document: string;
  readonly status: DocumentStatus;
  /** Rendered failure message, or the parse error. */
  readonly message?: string;
  /** Sorted details, for invalid documents. */
  readonly errors?: readonly ValidationErrorDetail[];
}

/**
 * Class of an entry-level failure. `usage` failures make the run exit 2;
 * `internal` covers errors outside the taxonomy.
 */
export type EntryFailureKind = 'usage' | 'compile' | 'internal';

export interface EntryFailure {
  readonly kind: EntryFailureKind;
  readonly message: string;
  readonly error: Error;
}

/**
 * Result for one schema entry.
 */
export interface SchemaEntryResult {
  /** Position of the entry in the configuration. */
  readonly index: number;
  /** Schema path as configured. */
  readonly schema: string;
  readonly schemaUri?: string;
  readonly draft?: Draft;
  /** Set when the entry could not run. */
  readonly failure?: EntryFailure;
  readonly documents: readonly DocumentResult[];
}

/**
 * Result of a whole run.
 */
export interface RunReport {
  readonly valid: boolean;
  readonly exitCode: ExitCode;
  readonly entries: readonly SchemaEntryResult[];
}

/**
 * Identifies the entry a streamed result belongs to.
 */
export interface EntryRef {
  readonly index: number;
  readonly schema: string;
}

/**
 * Options for {@link runValidation}.
 */
export interface RunOptions {
  /** Directory relative schema, document and override paths resolve against. */
  readonly cwd: string;
  /** Parse every document as this type instead of detecting it. */
  readonly forceFileType?: FileTypeHint | undefined;
  readonly logger?: Logger | undefined;
  /** Called as soon as each document has been validated. */
  readonly onDocument?: ((result: DocumentResult, entry: EntryRef) => void) | undefined;
  /** Called when an entry fails before its documents are validated. */
  readonly onEntryFailure?: ((result: SchemaEntryResult) => void) | undefined;
}

/**
 * Maps an error that stopped an entry to its failure class.
 */
export function classifyFailure(error: unknown): EntryFailure {
  if (error instanceof CompileError) {
    return { kind: 'compile', message: error.message, error };
  }
  if (error instanceof UsageError) {
    return { kind: 'usage', message: error.message, error };
  }
  const cause = toError(error);
  return { kind: 'internal', message: cause.message, error: cause };
}

/**
 * Validates one document against a prepared schema.
 */
export function validateDocument(
  document: string,
  prepared: PreparedSchema,
  errorTemplate: string,
  options: RunOptions
): DocumentResult {
  let parsed: ParsedFile;
  try {
    parsed = parseFile(document, options.forceFileType ?? 'auto', options.cwd);
  } catch (error) {
    if (error instanceof FileParseError) {
      options.logger?.debug('document_validated', { document, status: 'parse-error' });
      return { document, status: 'parse-error', message: error.message };
    }
    throw error;
  }

  const ajvErrors = prepared.compiled.validate(parsed.value);
  if (ajvErrors.length === 0) {
    options.logger?.debug('document_validated', { document, status: 'valid' });
    return { document, status: 'valid' };
  }

  const errors = buildErrorDetails(ajvErrors, parsed.value, prepared.schemaUri);
  const message = renderValidationError({
    details: errors,
    schemaUri: prepared.schemaUri,
    schemaFile: prepared.schemaPath,
    document: parsed.content,
    template: errorTemplate,
    logger: options.logger,
  });

  options.logger?.debug('document_validated', { document, status: 'invalid', errorCount: errors.length });
  return { document, status: 'invalid', message, errors };
}

/**
 * Validates the documents of one schema entry.
 */
export function validateEntry(
  entry: SchemaEntry,
  index: number,
  config: ConfigModel,
  options: RunOptions
): SchemaEntryResult {
  const settings = getEffectiveSettings(entry, config);
  const documents = expandDocumentGlobs(entry.documents, { cwd: options.cwd, logger: options.logger });

  let prepared: PreparedSchema;
  try {
    prepared = prepareSchema({
      schemaPath: entry.path,
      schemaVersion: settings.schemaVersion,
      refOverrides: resolveRefOverrides(config.refOverrides, entry.refOverrides),
      cwd: options.cwd,
      logger: options.logger,
    });
  } catch (error) {
    const failure = classifyFailure(error);
    options.logger?.debug('schema_failed', { schema: entry.path, kind: failure.kind, message: failure.message });
    const result: SchemaEntryResult = { index, schema: entry.path, failure, documents: [] };
    options.onEntryFailure?.(result);
    return result;
  }

  const results: DocumentResult[] = [];
  for (const document of documents) {
    const result = validateDocument(document, prepared, settings.errorTemplate, options);
    results.push(result);
    options.onDocument?.(result, { index, schema: entry.path });
  }

  return {
    index,
    schema: entry.path,
    schemaUri: prepared.schemaUri,
    draft: prepared.draft,
    documents: results,
  };
}

/**
 * Chooses the exit code: 2 when any entry failed with a usage error,
 * otherwise 1 when anything failed, otherwise 0.
 */
export function decideExitCode(entries: readonly SchemaEntryResult[]): ExitCode {
  if (entries.some((entry) => entry.failure?.kind === 'usage')) {
    return EXIT_USAGE_ERROR;
  }
  const failed = entries.some(
    (entry) => entry.failure !== undefined || entry.documents.some((document) => document.status !== 'valid')
  );
  return failed ? EXIT_VALIDATION_FAILURE : EXIT_SUCCESS;
}

/**
 * Validates every schema entry in order.
 *
 * @example
 * ```typescript
 * const report = runValidation(config, {
 *   cwd: process.cwd(),
 *   onDocument: (result) => console.log(result.document, result.status),
 * });
 * process.exitCode = report.exitCode;
 * ```
 */
export function runValidation(config: ConfigModel, options: RunOptions): RunReport {
  const entries = config.schemas.map((entry, index) => validateEntry(entry, index, config, options));
  const exitCode = decideExitCode(entries);

  options.logger?.debug('validation_finished', {
    schemas: entries.length,
    documents: entries.reduce((count, entry) => count + entry.documents.length, 0),
    exitCode,
  });

  return { valid: exitCode === EXIT_SUCCESS, exitCode, entries };
}

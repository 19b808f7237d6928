/**
 * Validation of a document given as a string rather than a file.
 *
 * A valid document yields its canonical JSON (keys sorted) and a stable id
 * derived from the document, the schema and the configured version, so
 * callers can detect when any of the three changes.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import stringify from 'json-stable-stringify';
import type { RefOverrides } from '../config/types.js';
import { parseContent, type FileTypeHint } from '../parsing/files.js';
import { renderValidationError } from '../templates/renderer.js';
import type { Logger } from '../utils/logger.js';
import { buildErrorDetails, type ValidationErrorDetail } from './errors.js';
import { prepareSchema } from './prepare.js';

/**
 * Input for {@link validateInline}.
 */
export interface InlineValidationInput {
  /** Document content. */
  readonly document: string;
  /** Schema path; relative paths resolve against `cwd`. */
  readonly schemaPath: string;
  readonly schemaVersion?: string | undefined;
  /** Template text or built-in name. */
  readonly errorTemplate?: string | undefined;
  readonly refOverrides?: RefOverrides | undefined;
  /** Document format; detected from the content when `auto` or unset. */
  readonly forceFileType?: FileTypeHint | undefined;
  readonly cwd: string;
  readonly logger?: Logger | undefined;
}

/**
 * Outcome of {@link validateInline}.
 */
export type InlineValidationResult =
  | {
      readonly valid: true;
      /** Document as JSON with sorted keys. */
      readonly canonical: string;
      /** SHA-256 hex of `canonical:schemaCanonical:schemaVersion`. */
      readonly id: string;
    }
  | {
      readonly valid: false;
      /** Rendered failure message. */
      readonly message: string;
      readonly errors: readonly ValidationErrorDetail[];
    };

/**
 * Serializes a value as JSON with object keys sorted at every level.
 */
export function canonicalJson(value: unknown): string {
  return stringify(value) ?? 'null';
}

/**
 * Validates document content against a schema file.
 *
 * @throws {FileParseError} When the document cannot be parsed.
 * @throws {UsageError} When the schema version or schema file is unusable.
 * @throws {CompileError} When the schema does not compile.
 */
export function validateInline(input: InlineValidationInput): InlineValidationResult {
  const schemaVersion = input.schemaVersion ?? '';
  const document = parseContent(input.document, input.forceFileType ?? 'auto', '<document>');

  const prepared = prepareSchema({
    schemaPath: input.schemaPath,
    schemaVersion,
    refOverrides: input.refOverrides ?? {},
    cwd: input.cwd,
    logger: input.logger,
  });

  const ajvErrors = prepared.compiled.validate(document.value);
  if (ajvErrors.length > 0) {
    const errors = buildErrorDetails(ajvErrors, document.value, prepared.schemaUri);
    return {
      valid: false,
      message: renderValidationError({
        details: errors,
        schemaUri: prepared.schemaUri,
        schemaFile: input.schemaPath,
        document: input.document,
        template: input.errorTemplate,
        logger: input.logger,
      }),
      errors,
    };
  }

  const canonical = canonicalJson(document.value);
  const schemaCanonical = canonicalJson(prepared.schema);
  const id = createHash('sha256').update(`${canonical}:${schemaCanonical}:${schemaVersion}`).digest('hex');

  return { valid: true, canonical, id };
}

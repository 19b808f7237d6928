/**
 * Turns a schema path and its settings into a compiled schema.
 *
 * @packageDocumentation
 */

import { pathToFileURL } from 'node:url';
import type { RefOverrides } from '../config/types.js';
import { CompileError, FileParseError, UsageError, toError } from '../errors.js';
import { parseFile } from '../parsing/files.js';
import type { Logger } from '../utils/logger.js';
import { createSchemaCompiler, type CompiledSchema } from './compiler.js';
import { normalizeDraftVersion, selectDraft, type Draft, type DraftOrigin } from './drafts.js';
import { registerLocalRefs, registerRefOverrides } from './refs.js';

/**
 * What is needed to prepare one schema.
 */
export interface PrepareSchemaInput {
  /** Schema path; relative paths resolve against `cwd`. */
  readonly schemaPath: string;
  /** Configured draft identifier; empty when not configured. */
  readonly schemaVersion: string;
  /** Effective `$ref` overrides for this schema. */
  readonly refOverrides: RefOverrides;
  readonly cwd: string;
  readonly logger?: Logger | undefined;
}

/**
 * A schema compiled and ready to validate documents.
 */
export interface PreparedSchema {
  /** Schema path as configured. */
  readonly schemaPath: string;
  /** `file:` URI the schema was compiled under. */
  readonly schemaUri: string;
  readonly draft: Draft;
  readonly draftOrigin: DraftOrigin;
  /** Parsed schema value. */
  readonly schema: unknown;
  readonly compiled: CompiledSchema;
}

/**
 * Prepares a schema: checks the configured draft, parses the schema file,
 * picks the dialect, registers overrides and local references on a fresh
 * compiler, then compiles.
 *
 * @throws {UnsupportedDraftError} When the configured draft is not supported.
 * @throws {UsageError} When the schema file cannot be read.
 * @throws {RefOverrideError} When an override cannot be used.
 * @throws {CompileError} When the schema cannot be parsed or compiled.
 */
export function prepareSchema(input: PrepareSchemaInput): PreparedSchema {
  const configured = input.schemaVersion === '' ? undefined : normalizeDraftVersion(input.schemaVersion);

  let schemaFilePath: string;
  let schema: unknown;
  try {
    const parsed = parseFile(input.schemaPath, 'auto', input.cwd);
    schemaFilePath = parsed.path;
    schema = parsed.value;
  } catch (error) {
    if (error instanceof FileParseError && error.stage === 'parse') {
      throw new CompileError(input.schemaPath, `parsing schema "${input.schemaPath}": ${error.message}`, error);
    }
    const cause = toError(error);
    throw new UsageError(`reading schema "${input.schemaPath}": ${cause.message}`, cause);
  }

  const { draft, origin } = selectDraft(schema, configured);
  const compiler = createSchemaCompiler(draft);

  registerRefOverrides(compiler, input.refOverrides, { cwd: input.cwd, logger: input.logger });

  const schemaUri = pathToFileURL(schemaFilePath).href;
  registerLocalRefs(compiler, schema, schemaUri, input.logger);

  input.logger?.debug('schema_compiling', {
    schema: input.schemaPath,
    uri: schemaUri,
    draft,
    draftOrigin: origin,
    refOverrideCount: Object.keys(input.refOverrides).length,
  });

  let compiled: CompiledSchema;
  try {
    compiled = compiler.compile(schema, schemaUri);
  } catch (error) {
    const cause = toError(error);
    throw new CompileError(input.schemaPath, `compiling schema "${input.schemaPath}": ${cause.message}`, cause);
  }

  return { schemaPath: input.schemaPath, schemaUri, draft, draftOrigin: origin, schema, compiled };
}

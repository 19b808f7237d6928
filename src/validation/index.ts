/**
 * Validation module: draft selection, schema compilation, `$ref`
 * overrides, error translation and the validation run.
 *
 * @packageDocumentation
 */

export type { Draft, DraftOrigin } from './drafts.js';
export {
  DEFAULT_DRAFT,
  META_SCHEMA_URIS,
  SUPPORTED_DRAFTS,
  detectDraftFromSchema,
  lookupDraft,
  normalizeDraftVersion,
  selectDraft,
} from './drafts.js';
export type { CompiledSchema, SchemaCompiler } from './compiler.js';
export { createSchemaCompiler, isAnySchema, resourceKey } from './compiler.js';
export type { RegisterOptions } from './refs.js';
export { collectRefs, registerLocalRefs, registerRefOverrides, resolveRefOverrides } from './refs.js';
export type { ValidationErrorDetail } from './errors.js';
export {
  MAX_ROOT_VALUE_LENGTH,
  buildErrorDetails,
  compareDetails,
  extractValueAtPointer,
  formatFullMessage,
  parsePointer,
  truncate,
} from './errors.js';
export type { PreparedSchema, PrepareSchemaInput } from './prepare.js';
export { prepareSchema } from './prepare.js';
export type {
  DocumentResult,
  DocumentStatus,
  EntryFailure,
  EntryFailureKind,
  EntryRef,
  RunOptions,
  RunReport,
  SchemaEntryResult,
} from './orchestrator.js';
export { classifyFailure, decideExitCode, runValidation, validateDocument, validateEntry } from './orchestrator.js';
export type { InlineValidationInput, InlineValidationResult } from './inline.js';
export { canonicalJson, validateInline } from './inline.js';

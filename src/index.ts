/**
 * jsonschema-validator
 *
 * Validates JSON, JSON5, YAML and TOML documents against JSON Schema,
 * with layered configuration and templated error messages.
 *
 * @packageDocumentation
 */

import { getVersion } from './cli/commands/version.js';

/**
 * Package version string.
 */
export const VERSION = getVersion();

export * from './config/index.js';
export * from './validation/index.js';
export * from './templates/index.js';
export type { FileType, FileTypeHint, ParsedFile } from './parsing/files.js';
export {
  FILE_TYPES,
  detectFileType,
  detectFileTypeFromContent,
  isFileType,
  parseByType,
  parseContent,
  parseFile,
} from './parsing/files.js';
export type { ExpandOptions } from './documents/expander.js';
export { containsGlobChars, expandDocumentGlobs } from './documents/expander.js';
export type { ExitCode, FileParseStage } from './errors.js';
export {
  CompileError,
  ConfigParseError,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  EXIT_VALIDATION_FAILURE,
  FileParseError,
  RefOverrideError,
  TemplateError,
  UnsupportedDraftError,
  UsageError,
  errorMessage,
  toError,
} from './errors.js';
export type { LogEntry, LogLevel, LoggerOptions, LogSink } from './utils/logger.js';
export { Logger } from './utils/logger.js';

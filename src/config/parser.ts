/**
 * Parser shared by every configuration file source.
 *
 * A per-source naming adapter renames keys to the canonical field set,
 * then one parser checks types and builds a {@link ConfigLayer}.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { ConfigParseError, toError } from '../errors.js';
import { parseByType, type FileType } from '../parsing/files.js';
import type { Logger } from '../utils/logger.js';
import { safeReadFileSync } from '../utils/safe-fs.js';
import { EXPLICIT_CONFIG_EXTENSIONS } from './defaults.js';
import type { ConfigLayer, ConfigSourceName, RefOverrides, SchemaEntry } from './types.js';

/**
 * Key spelling used by a source.
 *
 * - `snake`: YAML and TOML (`schema_version`, `ref_overrides`)
 * - `camel`: JSON and package.json (`schemaVersion`, `refOverrides`)
 */
export type KeyNaming = 'snake' | 'camel';

type CanonicalKey = 'schemaVersion' | 'errorTemplate' | 'refOverrides' | 'schemas';
type CanonicalEntryKey = 'path' | 'documents' | 'schemaVersion' | 'errorTemplate' | 'refOverrides';

const TOP_LEVEL_KEYS: Record<KeyNaming, ReadonlyMap<string, CanonicalKey>> = {
  snake: new Map<string, CanonicalKey>([
    ['schema_version', 'schemaVersion'],
    ['error_template', 'errorTemplate'],
    ['ref_overrides', 'refOverrides'],
    ['schemas', 'schemas'],
  ]),
  camel: new Map<string, CanonicalKey>([
    ['schemaVersion', 'schemaVersion'],
    ['errorTemplate', 'errorTemplate'],
    ['refOverrides', 'refOverrides'],
    ['schemas', 'schemas'],
  ]),
};

const ENTRY_KEYS: Record<KeyNaming, ReadonlyMap<string, CanonicalEntryKey>> = {
  snake: new Map<string, CanonicalEntryKey>([
    ['path', 'path'],
    ['documents', 'documents'],
    ['schema_version', 'schemaVersion'],
    ['error_template', 'errorTemplate'],
    ['ref_overrides', 'refOverrides'],
  ]),
  camel: new Map<string, CanonicalEntryKey>([
    ['path', 'path'],
    ['documents', 'documents'],
    ['schemaVersion', 'schemaVersion'],
    ['errorTemplate', 'errorTemplate'],
    ['refOverrides', 'refOverrides'],
  ]),
};

/**
 * Options for {@link parseConfigObject}.
 */
export interface ParseConfigOptions {
  /** Source the object came from. */
  readonly source: ConfigSourceName;
  /** Key spelling used by the source. */
  readonly naming: KeyNaming;
  /** File the object was read from, for error messages. */
  readonly origin?: string;
  /** Receives a warning for every key that is not recognized. */
  readonly logger?: Logger;
}

/**
 * Returns true for plain objects (not arrays, not null).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function parseError(options: ParseConfigOptions, message: string): ConfigParseError {
  const where = options.origin === undefined ? options.source : options.origin;
  return new ConfigParseError(`${where}: ${message}`, options.origin === undefined ? {} : { filePath: options.origin });
}

function validateString(value: unknown, fieldPath: string, options: ParseConfigOptions): string {
  if (typeof value !== 'string') {
    throw parseError(
      options,
      `invalid type for '${fieldPath}': expected string, got ${describeType(value)}`
    );
  }
  return value;
}

/**
 * Documents may be one string or a list of strings.
 */
function validateDocuments(value: unknown, fieldPath: string, options: ParseConfigOptions): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (!Array.isArray(value)) {
    throw parseError(
      options,
      `invalid type for '${fieldPath}': expected string or list of strings, got ${describeType(value)}`
    );
  }
  return value.map((item, index) => validateString(item, `${fieldPath}[${String(index)}]`, options));
}

function validateRefOverrides(value: unknown, fieldPath: string, options: ParseConfigOptions): RefOverrides {
  if (!isRecord(value)) {
    throw parseError(
      options,
      `invalid type for '${fieldPath}': expected table of URL to path, got ${describeType(value)}`
    );
  }
  const result: Record<string, string> = {};
  for (const [url, localPath] of Object.entries(value)) {
    result[url] = validateString(localPath, `${fieldPath}.${url}`, options);
  }
  return result;
}

function warnUnknownKey(options: ParseConfigOptions, key: string): void {
  options.logger?.warn('config_key_ignored', {
    source: options.source,
    ...(options.origin === undefined ? {} : { path: options.origin }),
    key,
  });
}

function parseSchemaEntry(raw: unknown, index: number, options: ParseConfigOptions): SchemaEntry {
  const fieldPath = `schemas[${String(index)}]`;
  if (!isRecord(raw)) {
    throw parseError(options, `invalid type for '${fieldPath}': expected table, got ${describeType(raw)}`);
  }

  let entryPath = '';
  let documents: string[] = [];
  let schemaVersion: string | undefined;
  let errorTemplate: string | undefined;
  let refOverrides: RefOverrides = {};

  const keys = ENTRY_KEYS[options.naming];
  for (const [key, value] of Object.entries(raw)) {
    const canonical = keys.get(key);
    const keyPath = `${fieldPath}.${key}`;
    switch (canonical) {
      case 'path':
        entryPath = validateString(value, keyPath, options);
        break;
      case 'documents':
        documents = validateDocuments(value, keyPath, options);
        break;
      case 'schemaVersion':
        schemaVersion = validateString(value, keyPath, options);
        break;
      case 'errorTemplate':
        errorTemplate = validateString(value, keyPath, options);
        break;
      case 'refOverrides':
        refOverrides = validateRefOverrides(value, keyPath, options);
        break;
      case undefined:
        warnUnknownKey(options, keyPath);
        break;
    }
  }

  return { path: entryPath, documents, schemaVersion, errorTemplate, refOverrides };
}

/**
 * Builds a configuration layer from a parsed object.
 *
 * `null` and `undefined` (an empty YAML file) produce an empty layer.
 *
 * @throws {ConfigParseError} When the value is not a table or a field has the wrong type.
 */
export function parseConfigObject(raw: unknown, options: ParseConfigOptions): ConfigLayer {
  const base = { source: options.source, origin: options.origin };
  if (raw === null || raw === undefined) {
    return base;
  }
  if (!isRecord(raw)) {
    throw parseError(options, `expected a table at the top level, got ${describeType(raw)}`);
  }

  let schemaVersion: string | undefined;
  let errorTemplate: string | undefined;
  let refOverrides: RefOverrides | undefined;
  let schemas: SchemaEntry[] | undefined;

  const keys = TOP_LEVEL_KEYS[options.naming];
  for (const [key, value] of Object.entries(raw)) {
    switch (keys.get(key)) {
      case 'schemaVersion':
        schemaVersion = validateString(value, key, options);
        break;
      case 'errorTemplate':
        errorTemplate = validateString(value, key, options);
        break;
      case 'refOverrides':
        refOverrides = validateRefOverrides(value, key, options);
        break;
      case 'schemas':
        if (!Array.isArray(value)) {
          throw parseError(options, `invalid type for '${key}': expected list, got ${describeType(value)}`);
        }
        schemas = value.map((item, index) => parseSchemaEntry(item, index, options));
        break;
      case undefined:
        warnUnknownKey(options, key);
        break;
    }
  }

  return { ...base, schemaVersion, errorTemplate, refOverrides, schemas };
}

/**
 * Maps a configuration file extension to its format and key naming.
 */
function formatForExtension(extension: string): { fileType: FileType; naming: KeyNaming } | undefined {
  switch (extension) {
    case '.yaml':
    case '.yml':
      return { fileType: 'yaml', naming: 'snake' };
    case '.toml':
      return { fileType: 'toml', naming: 'snake' };
    case '.json':
      return { fileType: 'json', naming: 'camel' };
    case '.json5':
      return { fileType: 'json5', naming: 'camel' };
    default:
      return undefined;
  }
}

/**
 * Parses configuration file text in the format implied by its extension.
 *
 * @throws {ConfigParseError} On an unsupported extension, a syntax error or a type error.
 */
export function parseConfigText(
  content: string,
  filePath: string,
  source: ConfigSourceName,
  logger?: Logger
): ConfigLayer {
  const extension = path.extname(filePath).toLowerCase();
  const format = formatForExtension(extension);
  if (format === undefined) {
    throw new ConfigParseError(
      `${filePath}: unsupported configuration file extension "${extension}" (supported: ${EXPLICIT_CONFIG_EXTENSIONS.join(', ')})`,
      { filePath }
    );
  }

  let raw: unknown;
  try {
    raw = parseByType(content, format.fileType);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigParseError(`${filePath}: ${cause.message}`, { filePath, cause });
  }

  return parseConfigObject(raw, {
    source,
    naming: format.naming,
    origin: filePath,
    ...(logger === undefined ? {} : { logger }),
  });
}

/**
 * Reads and parses a configuration file.
 *
 * @param filePath - Path to the file; relative paths resolve against `cwd`.
 * @param cwd - Working directory.
 * @param source - Source name recorded on the layer.
 * @throws {ConfigParseError} When the file cannot be read or parsed.
 */
export function loadConfigFile(
  filePath: string,
  cwd: string,
  source: ConfigSourceName,
  logger?: Logger
): ConfigLayer {
  const resolved = path.resolve(cwd, filePath);
  let content: string;
  try {
    content = safeReadFileSync(resolved);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigParseError(`${filePath}: cannot read configuration file: ${cause.message}`, {
      filePath,
      cause,
    });
  }
  return parseConfigText(content, resolved, source, logger);
}

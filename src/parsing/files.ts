/**
 * Reads schemas, documents and override files in JSON, JSON5, YAML or TOML.
 *
 * The format is detected from the file extension unless a type is forced.
 * Unknown extensions fall back to JSON5, which accepts every JSON document.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { CORE_SCHEMA, load as loadYaml } from 'js-yaml';
import JSON5 from 'json5';
import { FileParseError, toError } from '../errors.js';
import { safeReadFileSync } from '../utils/safe-fs.js';

/**
 * Supported file formats.
 */
export type FileType = 'json' | 'json5' | 'yaml' | 'toml';

/**
 * A file type, or `auto` to detect it.
 */
export type FileTypeHint = FileType | 'auto';

/**
 * All concrete file types, in the order shown to users.
 */
export const FILE_TYPES: readonly FileType[] = ['json', 'json5', 'yaml', 'toml'];

/**
 * A file that has been read and parsed.
 */
export interface ParsedFile {
  /** Absolute path of the file. */
  readonly path: string;
  /** Raw text content. */
  readonly content: string;
  /** Format the content was parsed as. */
  readonly fileType: FileType;
  /** Parsed value. */
  readonly value: unknown;
}

/**
 * Type guard for {@link FileType}.
 */
export function isFileType(value: string): value is FileType {
  return FILE_TYPES.some((fileType) => fileType === value);
}

/**
 * Determines the file type from a path's extension.
 *
 * @returns The detected type; `json5` for unknown extensions.
 */
export function detectFileType(filePath: string): FileType {
  switch (path.extname(filePath).toLowerCase()) {
    case '.json':
      return 'json';
    case '.json5':
      return 'json5';
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.toml':
      return 'toml';
    default:
      return 'json5';
  }
}

/**
 * Parses text as the given file type.
 *
 * @throws Error from the underlying parser when the text is malformed.
 */
export function parseByType(content: string, fileType: FileType): unknown {
  switch (fileType) {
    case 'json': {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    }
    case 'json5': {
      const parsed: unknown = JSON5.parse(content);
      return parsed;
    }
    case 'yaml':
      return loadYaml(content, { schema: CORE_SCHEMA });
    case 'toml':
      return TOML.parse(content);
  }
}

/**
 * Detects the format of inline content by trying parsers from strictest to
 * most liberal: JSON, TOML, JSON5, then YAML.
 *
 * @returns The first type that parses, or undefined when none does.
 */
export function detectFileTypeFromContent(content: string): FileType | undefined {
  const trimmed = content.trim();
  if (trimmed === '') {
    return undefined;
  }

  for (const candidate of ['json', 'toml', 'json5', 'yaml'] as const) {
    try {
      parseByType(trimmed, candidate);
      return candidate;
    } catch {
      continue;
    }
  }

  return undefined;
}

/**
 * Parses inline content, detecting its format unless one is forced.
 *
 * @param content - The text to parse.
 * @param hint - Forced type, or `auto`.
 * @param label - Name used in error messages.
 * @throws {FileParseError} When the content cannot be detected or parsed.
 */
export function parseContent(content: string, hint: FileTypeHint = 'auto', label = '<inline>'): ParsedFile {
  const fileType = hint === 'auto' ? detectFileTypeFromContent(content) : hint;
  if (fileType === undefined) {
    throw new FileParseError(
      label,
      'parse',
      'unable to detect file type from content; set the file type explicitly'
    );
  }

  try {
    return { path: label, content, fileType, value: parseByType(content, fileType) };
  } catch (error) {
    const cause = toError(error);
    throw new FileParseError(label, 'parse', `parsing ${fileType.toUpperCase()}: ${cause.message}`, cause);
  }
}

/**
 * Reads and parses a file.
 *
 * @param filePath - Path of the file; relative paths resolve against `baseDir`.
 * @param hint - Forced type, or `auto` to detect from the extension.
 * @param baseDir - Directory relative paths are resolved against.
 * @throws {FileParseError} With stage `read` when the file cannot be read,
 * or `parse` when its content is malformed.
 */
export function parseFile(filePath: string, hint: FileTypeHint = 'auto', baseDir?: string): ParsedFile {
  const resolved = baseDir === undefined ? path.resolve(filePath) : path.resolve(baseDir, filePath);

  let content: string;
  try {
    content = safeReadFileSync(resolved);
  } catch (error) {
    const cause = toError(error);
    throw new FileParseError(filePath, 'read', `reading file: ${cause.message}`, cause);
  }

  const fileType = hint === 'auto' ? detectFileType(filePath) : hint;

  try {
    return { path: resolved, content, fileType, value: parseByType(content, fileType) };
  } catch (error) {
    const cause = toError(error);
    throw new FileParseError(filePath, 'parse', `parsing ${fileType.toUpperCase()}: ${cause.message}`, cause);
  }
}

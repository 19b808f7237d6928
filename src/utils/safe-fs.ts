/**
 * Synchronous file system helpers with path validation.
 *
 * Every configuration file, schema, override and document passes through
 * here. Paths are resolved against an explicit base directory rather than
 * the process working directory, so callers (and tests) control where
 * relative paths land.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates a path and resolves it against a base directory.
 *
 * @param filePath - The path to validate.
 * @param baseDir - Directory relative paths are resolved against (default: process cwd).
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string, baseDir?: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = baseDir === undefined ? path.resolve(filePath) : path.resolve(baseDir, filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read.
 */
export function safeReadFileSync(filePath: string, baseDir?: string): string {
  const validatedPath = validatePath(filePath, baseDir);
  // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
  return fs.readFileSync(validatedPath, 'utf-8');
}

/**
 * Checks whether a path exists. Invalid paths do not exist.
 */
export function safeExistsSync(filePath: string, baseDir?: string): boolean {
  try {
    const validatedPath = validatePath(filePath, baseDir);
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
    return fs.existsSync(validatedPath);
  } catch (error) {
    if (error instanceof PathValidationError) {
      return false;
    }
    throw error;
  }
}

/**
 * Result of checking that a path names a readable regular file.
 */
export type ReadableFileCheck =
  | { readonly ok: true; readonly resolvedPath: string }
  | { readonly ok: false; readonly resolvedPath: string; readonly reason: string };

/**
 * Checks that a path names an existing, readable regular file.
 *
 * @param filePath - Path to check.
 * @param baseDir - Directory relative paths are resolved against.
 */
export function checkReadableFile(filePath: string, baseDir?: string): ReadableFileCheck {
  let resolvedPath: string;
  try {
    resolvedPath = validatePath(filePath, baseDir);
  } catch (error) {
    if (error instanceof PathValidationError) {
      return { ok: false, resolvedPath: filePath, reason: error.message };
    }
    throw error;
  }

  let stats: fs.Stats;
  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
    stats = fs.statSync(resolvedPath);
  } catch {
    return { ok: false, resolvedPath, reason: 'file does not exist' };
  }

  if (!stats.isFile()) {
    return { ok: false, resolvedPath, reason: 'not a regular file' };
  }

  try {
    // eslint-disable-next-line security/detect-non-literal-fs-filename -- path is validated by validatePath
    fs.accessSync(resolvedPath, fs.constants.R_OK);
  } catch {
    return { ok: false, resolvedPath, reason: 'file is not readable' };
  }

  return { ok: true, resolvedPath };
}

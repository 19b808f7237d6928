/**
 * Semantic validation for a merged configuration.
 *
 * Checks what type checking cannot: that there is at least one schema
 * entry, that each schema file exists and is readable, and that each
 * entry lists documents.
 *
 * @packageDocumentation
 */

import { UsageError } from '../errors.js';
import { checkReadableFile } from '../utils/safe-fs.js';
import type { ConfigModel } from './types.js';

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation, e.g. `schemas[1].path`. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends UsageError {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Options for semantic validation.
 */
export interface ValidateConfigOptions {
  /** Directory relative schema paths resolve against. */
  cwd: string;
}

/**
 * Validates a merged configuration.
 *
 * @returns Validation result with every error found.
 */
export function validateConfig(config: ConfigModel, options: ValidateConfigOptions): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.schemas.length === 0) {
    errors.push({
      field: 'schemas',
      value: [],
      message: 'no schemas configured: pass --schema and documents, or add a configuration file',
    });
  }

  config.schemas.forEach((entry, index) => {
    const field = `schemas[${String(index)}]`;

    if (entry.path.trim() === '') {
      errors.push({ field: `${field}.path`, value: entry.path, message: 'schema path is required' });
    } else {
      const check = checkReadableFile(entry.path, options.cwd);
      if (!check.ok) {
        errors.push({
          field: `${field}.path`,
          value: entry.path,
          message: `schema file "${entry.path}": ${check.reason}`,
        });
      }
    }

    if (entry.documents.length === 0) {
      errors.push({
        field: `${field}.documents`,
        value: [],
        message: 'at least one document or glob pattern is required',
      });
    }
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws if invalid.
 *
 * @throws {ConfigValidationError} Listing every failure, one per line.
 */
export function assertConfigValid(config: ConfigModel, options: ValidateConfigOptions): void {
  const result = validateConfig(config, options);
  if (!result.valid) {
    const lines = result.errors.map((error) => `${error.field}: ${error.message}`);
    throw new ConfigValidationError(`invalid configuration:\n  ${lines.join('\n  ')}`, result.errors);
  }
}

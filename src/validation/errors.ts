/**
 * Translation of Ajv errors into validation error details.
 *
 * @packageDocumentation
 */

import type { ErrorObject } from 'ajv';

/**
 * One validation failure.
 */
export interface ValidationErrorDetail {
  /** Human-readable message. */
  readonly message: string;
  /** JSON Pointer (RFC 6901) into the document; `""` is the root. */
  readonly documentPath: string;
  /** Schema URI and the pointer fragment of the failing keyword. */
  readonly schemaPath: string;
  /** JSON text of the offending value; `""` when the location does not exist. */
  readonly value: string;
}

/**
 * Longest root value shown before truncation.
 */
export const MAX_ROOT_VALUE_LENGTH = 100;

/**
 * Truncates a string to `maxLength` code points, appending `...` when cut.
 */
export function truncate(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  return codePoints.length <= maxLength ? value : `${codePoints.slice(0, maxLength).join('')}...`;
}

/**
 * Splits a JSON Pointer into unescaped reference tokens.
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === '') {
    return [];
  }
  return pointer
    .slice(1)
    .split('/')
    .map((token) => token.replace(/~1/g, '/').replace(/~0/g, '~'));
}

function stringifyValue(value: unknown): string {
  return JSON.stringify(value) ?? '';
}

/**
 * Returns the JSON text of the value at a pointer.
 *
 * The root is truncated to {@link MAX_ROOT_VALUE_LENGTH} code points.
 * Missing locations give `""`.
 */
export function extractValueAtPointer(document: unknown, pointer: string): string {
  const tokens = parsePointer(pointer);
  if (tokens.length === 0) {
    return truncate(stringifyValue(document), MAX_ROOT_VALUE_LENGTH);
  }

  let current: unknown = document;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      if (!/^(0|[1-9]\d*)$/.test(token)) {
        return '';
      }
      const index = Number(token);
      if (index >= current.length) {
        return '';
      }
      const item: unknown = current[index];
      current = item;
    } else if (typeof current === 'object' && current !== null) {
      if (!Object.prototype.hasOwnProperty.call(current, token)) {
        return '';
      }
      current = Object.getOwnPropertyDescriptor(current, token)?.value;
    } else {
      return '';
    }
  }

  return stringifyValue(current);
}

/**
 * Builds the message for one Ajv error, naming the offending property
 * for property-level keywords.
 */
function formatMessage(error: ErrorObject): string {
  const message = error.message ?? `failed keyword "${error.keyword}"`;
  const params: Record<string, unknown> = error.params;

  switch (error.keyword) {
    case 'additionalProperties':
    case 'unevaluatedProperties': {
      const property = params.additionalProperty ?? params.unevaluatedProperty;
      return typeof property === 'string' ? `${message}: '${property}'` : message;
    }
    case 'propertyNames': {
      const name = params.propertyName;
      return typeof name === 'string' ? `${message}: '${name}'` : message;
    }
    default:
      return message;
  }
}

/**
 * Orders details by document path, then by message.
 */
export function compareDetails(a: ValidationErrorDetail, b: ValidationErrorDetail): number {
  if (a.documentPath !== b.documentPath) {
    return a.documentPath < b.documentPath ? -1 : 1;
  }
  if (a.message !== b.message) {
    return a.message < b.message ? -1 : 1;
  }
  return 0;
}

/**
 * Translates Ajv errors into sorted validation details.
 *
 * @param errors - Errors from a failed validation.
 * @param document - The parsed document, for extracting offending values.
 * @param schemaUri - URI the schema was compiled under.
 */
export function buildErrorDetails(
  errors: readonly ErrorObject[],
  document: unknown,
  schemaUri: string
): ValidationErrorDetail[] {
  const base = schemaUri.split('#')[0] ?? schemaUri;
  return errors
    .map((error) => ({
      message: formatMessage(error),
      documentPath: error.instancePath,
      schemaPath: error.schemaPath.startsWith('#') ? `${base}${error.schemaPath}` : error.schemaPath,
      value: extractValueAtPointer(document, error.instancePath),
    }))
    .sort(compareDetails);
}

/**
 * Formats the full failure message: a header naming the schema, then one
 * `- at '<path>': <message>` line per detail.
 *
 * @example
 * ```
 * jsonschema validation failed with 'file:///work/schema.json'
 * - at '/age': must be integer
 * ```
 */
export function formatFullMessage(schemaUri: string, details: readonly ValidationErrorDetail[]): string {
  const header = `jsonschema validation failed with '${schemaUri}'`;
  if (details.length === 0) {
    return header;
  }
  return [header, ...details.map((detail) => `- at '${detail.documentPath}': ${detail.message}`)].join('\n');
}

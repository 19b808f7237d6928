/**
 * Environment variable overrides for configuration.
 *
 * Variables use a prefix (default `JSONSCHEMA_VALIDATOR_`). They take
 * precedence over configuration files and are overridden by CLI flags.
 *
 * Override precedence: CLI > env > config file
 *
 * @packageDocumentation
 */

import { parseRefOverridesString } from './model.js';
import { DEFAULT_ENV_PREFIX } from './defaults.js';
import type { ConfigLayer, SchemaEntryOverlay } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Result of reading environment overrides.
 */
export interface EnvOverrideResult {
  /** The layer built from the environment. */
  readonly layer: ConfigLayer;
  /** Names of the variables that were applied. */
  readonly appliedVars: string[];
}

type EnvField = 'schemaVersion' | 'errorTemplate' | 'refOverrides' | 'schema' | 'documents';

/**
 * Variable suffixes and the field each one sets.
 */
const ENV_VAR_SUFFIXES: ReadonlyArray<{ suffix: string; field: EnvField; description: string }> = [
  { suffix: 'SCHEMA_VERSION', field: 'schemaVersion', description: 'Default JSON Schema draft' },
  { suffix: 'ERROR_TEMPLATE', field: 'errorTemplate', description: 'Default error message template' },
  {
    suffix: 'REF_OVERRIDES',
    field: 'refOverrides',
    description: 'Comma-separated url=path pairs redirecting remote $ref URLs to local files',
  },
  { suffix: 'SCHEMA', field: 'schema', description: 'Schema file for the first schema entry' },
  {
    suffix: 'DOCUMENTS',
    field: 'documents',
    description: 'Comma-separated documents or glob patterns for the first schema entry',
  },
];

/**
 * Normalizes a prefix so it ends with exactly one underscore.
 *
 * @example
 * ```typescript
 * normalizeEnvPrefix('MYAPP');  // 'MYAPP_'
 * normalizeEnvPrefix('MYAPP_'); // 'MYAPP_'
 * ```
 */
export function normalizeEnvPrefix(prefix: string | undefined): string {
  if (prefix === undefined || prefix === '') {
    return DEFAULT_ENV_PREFIX;
  }
  return prefix.endsWith('_') ? prefix : `${prefix}_`;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Reads configuration overrides from environment variables.
 *
 * Empty values are ignored.
 *
 * @param env - Environment record (typically process.env).
 * @param prefix - Variable prefix; an underscore is appended if missing.
 */
export function readEnvOverrides(env: EnvRecord, prefix?: string): EnvOverrideResult {
  const normalized = normalizeEnvPrefix(prefix);
  const appliedVars: string[] = [];

  let schemaVersion: string | undefined;
  let errorTemplate: string | undefined;
  let refOverrides: Record<string, string> | undefined;
  const overlay: { path?: string; documents?: string[] } = {};

  for (const { suffix, field } of ENV_VAR_SUFFIXES) {
    const name = normalized + suffix;
    const value = env[name];
    if (value === undefined || value.trim() === '') {
      continue;
    }
    appliedVars.push(name);

    switch (field) {
      case 'schemaVersion':
        schemaVersion = value;
        break;
      case 'errorTemplate':
        errorTemplate = value;
        break;
      case 'refOverrides':
        refOverrides = parseRefOverridesString(value);
        break;
      case 'schema':
        overlay.path = value.trim();
        break;
      case 'documents':
        overlay.documents = splitList(value);
        break;
    }
  }

  const hasOverlay = overlay.path !== undefined || overlay.documents !== undefined;
  const layerOverlay: SchemaEntryOverlay | undefined = hasOverlay ? overlay : undefined;

  return {
    layer: {
      source: 'env',
      schemaVersion,
      errorTemplate,
      refOverrides,
      overlay: layerOverlay,
    },
    appliedVars,
  };
}

/**
 * Gets documentation for the supported environment variables.
 *
 * @param prefix - Variable prefix; an underscore is appended if missing.
 * @returns Map of variable name to description.
 */
export function getEnvVarDocumentation(prefix?: string): Record<string, { description: string; type: string }> {
  const normalized = normalizeEnvPrefix(prefix);
  const docs: Record<string, { description: string; type: string }> = {};
  for (const { suffix, field, description } of ENV_VAR_SUFFIXES) {
    docs[normalized + suffix] = {
      description,
      type: field === 'refOverrides' || field === 'documents' ? 'list' : 'string',
    };
  }
  return docs;
}

/**
 * Constructors and lookups for the configuration model.
 *
 * @packageDocumentation
 */

import type {
  ConfigModel,
  EffectiveSettings,
  RefOverrides,
  SchemaEntry,
} from './types.js';

/**
 * Creates a schema entry with no overrides.
 *
 * @param path - Path to the schema file.
 * @param documents - Document paths or glob patterns.
 *
 * @example
 * ```typescript
 * const entry = createSchemaEntry('schema.json', 'a.json', 'b.json');
 * entry.documents;    // ['a.json', 'b.json']
 * entry.refOverrides; // {}
 * ```
 */
export function createSchemaEntry(path: string, ...documents: string[]): SchemaEntry {
  return {
    path,
    documents: [...documents],
    refOverrides: {},
  };
}

/**
 * Creates a configuration model. Missing fields take empty defaults.
 */
export function createConfigModel(init: Partial<ConfigModel> = {}): ConfigModel {
  return {
    schemaVersion: init.schemaVersion,
    errorTemplate: init.errorTemplate,
    refOverrides: init.refOverrides ?? {},
    schemas: init.schemas ?? [],
  };
}

/**
 * Merges `$ref` override maps from lowest to highest priority.
 *
 * Keys from later maps replace keys from earlier ones; undefined maps are
 * skipped. The result is a new object.
 *
 * @example
 * ```typescript
 * mergeRefOverrides({ k: 'x' }, { k: 'y' }); // { k: 'y' }
 * mergeRefOverrides({ k: 'x' }, {});         // { k: 'x' }
 * ```
 */
export function mergeRefOverrides(
  ...sources: ReadonlyArray<RefOverrides | undefined>
): Record<string, string> {
  const merged = new Map<string, string>();

  for (const source of sources) {
    if (source === undefined) {
      continue;
    }
    for (const [url, localPath] of Object.entries(source)) {
      merged.set(url, localPath);
    }
  }

  return Object.fromEntries(merged);
}

/**
 * Returns the first non-empty value, or an empty string.
 */
function firstNonEmpty(...values: ReadonlyArray<string | undefined>): string {
  for (const value of values) {
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return '';
}

/**
 * Resolves an entry's schema version and error template against the
 * global defaults: entry value if non-empty, else global, else `''`.
 */
export function getEffectiveSettings(entry: SchemaEntry, config: ConfigModel): EffectiveSettings {
  return {
    schemaVersion: firstNonEmpty(entry.schemaVersion, config.schemaVersion),
    errorTemplate: firstNonEmpty(entry.errorTemplate, config.errorTemplate),
  };
}

/**
 * Parses `url=path` items into an override map.
 *
 * Both sides are trimmed. Items without `=` or with an empty side are
 * skipped. Later items win for duplicate URLs.
 *
 * @example
 * ```typescript
 * parseRefOverridePairs(['https://example.com/a.json=./a.json']);
 * // { 'https://example.com/a.json': './a.json' }
 * ```
 */
export function parseRefOverridePairs(items: readonly string[]): Record<string, string> {
  const pairs = new Map<string, string>();

  for (const item of items) {
    const separator = item.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const url = item.slice(0, separator).trim();
    const localPath = item.slice(separator + 1).trim();
    if (url !== '' && localPath !== '') {
      pairs.set(url, localPath);
    }
  }

  return Object.fromEntries(pairs);
}

/**
 * Parses a comma-separated `url1=path1,url2=path2` string into an override map.
 */
export function parseRefOverridesString(value: string): Record<string, string> {
  if (value === '') {
    return {};
  }
  return parseRefOverridePairs(value.split(','));
}

/**
 * Returns a copy of the entry with its documents replaced.
 */
export function withDocuments(entry: SchemaEntry, documents: readonly string[]): SchemaEntry {
  return { ...entry, documents: [...documents] };
}

/**
 * JSON Schema draft identifiers and dialect selection.
 *
 * @packageDocumentation
 */

import { UnsupportedDraftError } from '../errors.js';
import { isRecord } from '../config/parser.js';

/**
 * Supported drafts, by canonical name.
 */
export type Draft = 'draft-04' | 'draft-06' | 'draft-07' | 'draft/2019-09' | 'draft/2020-12';

/**
 * Canonical names in the order shown to users.
 */
export const SUPPORTED_DRAFTS: readonly Draft[] = [
  'draft-04',
  'draft-06',
  'draft-07',
  'draft/2019-09',
  'draft/2020-12',
];

/**
 * Draft used when neither the schema nor the configuration names one.
 */
export const DEFAULT_DRAFT: Draft = 'draft/2020-12';

/**
 * Official meta-schema URI of each draft.
 */
export const META_SCHEMA_URIS: Readonly<Record<Draft, string>> = {
  'draft-04': 'http://json-schema.org/draft-04/schema#',
  'draft-06': 'http://json-schema.org/draft-06/schema#',
  'draft-07': 'http://json-schema.org/draft-07/schema#',
  'draft/2019-09': 'https://json-schema.org/draft/2019-09/schema',
  'draft/2020-12': 'https://json-schema.org/draft/2020-12/schema',
};

const VERSION_ALIASES: ReadonlyMap<string, Draft> = new Map<string, Draft>([
  ['draft/2020-12', 'draft/2020-12'],
  ['2020-12', 'draft/2020-12'],
  ['draft-2020-12', 'draft/2020-12'],
  ['draft/2019-09', 'draft/2019-09'],
  ['2019-09', 'draft/2019-09'],
  ['draft-2019-09', 'draft/2019-09'],
  ['draft-07', 'draft-07'],
  ['draft/07', 'draft-07'],
  ['draft-7', 'draft-07'],
  ['draft7', 'draft-07'],
  ['7', 'draft-07'],
  ['draft-06', 'draft-06'],
  ['draft/06', 'draft-06'],
  ['draft-6', 'draft-06'],
  ['draft6', 'draft-06'],
  ['6', 'draft-06'],
  ['draft-04', 'draft-04'],
  ['draft/04', 'draft-04'],
  ['draft-4', 'draft-04'],
  ['draft4', 'draft-04'],
  ['4', 'draft-04'],
]);

/**
 * Reduces a meta-schema URI to a comparable key: no scheme, no trailing `#`.
 */
function metaSchemaKey(uri: string): string {
  return uri
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/#$/, '');
}

const META_SCHEMA_KEYS: ReadonlyMap<string, Draft> = new Map(
  SUPPORTED_DRAFTS.map((draft) => [metaSchemaKey(META_SCHEMA_URIS[draft]), draft])
);

/**
 * Looks up a version string or meta-schema URI without throwing.
 */
export function lookupDraft(version: string): Draft | undefined {
  const normalized = version.trim().toLowerCase();
  return VERSION_ALIASES.get(normalized) ?? META_SCHEMA_KEYS.get(metaSchemaKey(normalized));
}

/**
 * Normalizes a configured schema version to a canonical draft.
 *
 * @example
 * ```typescript
 * normalizeDraftVersion('7');        // 'draft-07'
 * normalizeDraftVersion('2020-12');  // 'draft/2020-12'
 * ```
 *
 * @throws {UnsupportedDraftError} When the string names no supported draft.
 */
export function normalizeDraftVersion(version: string): Draft {
  const draft = lookupDraft(version);
  if (draft === undefined) {
    throw new UnsupportedDraftError(version, SUPPORTED_DRAFTS);
  }
  return draft;
}

/**
 * Returns the draft named by a schema's `$schema` keyword, when recognized.
 */
export function detectDraftFromSchema(schema: unknown): Draft | undefined {
  if (!isRecord(schema)) {
    return undefined;
  }
  const declared = schema.$schema;
  return typeof declared === 'string' ? META_SCHEMA_KEYS.get(metaSchemaKey(declared)) : undefined;
}

/**
 * Where the selected draft came from.
 */
export type DraftOrigin = 'schema' | 'config' | 'default';

/**
 * Chooses the dialect for a schema: a recognized `$schema` wins, then the
 * configured draft, then {@link DEFAULT_DRAFT}.
 */
export function selectDraft(
  schema: unknown,
  configured: Draft | undefined
): { draft: Draft; origin: DraftOrigin } {
  const declared = detectDraftFromSchema(schema);
  if (declared !== undefined) {
    return { draft: declared, origin: 'schema' };
  }
  if (configured !== undefined) {
    return { draft: configured, origin: 'config' };
  }
  return { draft: DEFAULT_DRAFT, origin: 'default' };
}

/**
 * Merges configuration layers into one {@link ConfigModel}.
 *
 * Priority, high to low: CLI, environment, one file source (an explicit
 * `--config` file, or else the first discovered source).
 *
 * @packageDocumentation
 */

import type { Logger } from '../utils/logger.js';
import { createConfigModel, mergeRefOverrides } from './model.js';
import type { ConfigLayer, ConfigModel, SchemaEntry, SchemaEntryOverlay } from './types.js';

/**
 * Layers to merge. Any may be absent.
 */
export interface MergeConfigInput {
  /** File named by `--config`; when present, discovery results are ignored. */
  readonly explicitConfig?: ConfigLayer | undefined;
  /** First layer found by discovery. */
  readonly discovered?: ConfigLayer | undefined;
  /** Layer built from environment variables. */
  readonly env?: ConfigLayer | undefined;
  /** Layer built from command-line flags. */
  readonly cli?: ConfigLayer | undefined;
  readonly logger?: Logger | undefined;
}

function highestNonEmpty(
  layers: ReadonlyArray<ConfigLayer | undefined>,
  pick: (layer: ConfigLayer) => string | undefined
): string | undefined {
  for (let i = layers.length - 1; i >= 0; i--) {
    const layer = layers[i];
    const value = layer === undefined ? undefined : pick(layer);
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Combines the environment and CLI overlays, CLI fields first.
 *
 * @returns The combined overlay, or undefined when neither names a schema
 * path or documents.
 */
function combineOverlays(
  env: SchemaEntryOverlay | undefined,
  cli: SchemaEntryOverlay | undefined
): SchemaEntryOverlay | undefined {
  const cliDocuments = cli?.documents !== undefined && cli.documents.length > 0 ? cli.documents : undefined;
  const envDocuments = env?.documents !== undefined && env.documents.length > 0 ? env.documents : undefined;

  const entryPath = nonEmpty(cli?.path) ?? nonEmpty(env?.path);
  const documents = cliDocuments ?? envDocuments;
  if (entryPath === undefined && documents === undefined) {
    return undefined;
  }

  return {
    path: entryPath,
    documents,
    schemaVersion: nonEmpty(cli?.schemaVersion) ?? nonEmpty(env?.schemaVersion),
    errorTemplate: nonEmpty(cli?.errorTemplate) ?? nonEmpty(env?.errorTemplate),
  };
}

/**
 * Settings an overlay entry falls back to when the overlay leaves them unset.
 */
export interface OverlayDefaults {
  readonly schemaVersion?: string | undefined;
  readonly errorTemplate?: string | undefined;
}

/**
 * Builds a new entry from the overlay alone and puts it at index 0.
 *
 * Nothing is inherited from the entry it replaces: unset fields stay empty,
 * except the schema version and template, which take `defaults`.
 */
export function applyOverlay(
  schemas: readonly SchemaEntry[],
  overlay: SchemaEntryOverlay,
  defaults: OverlayDefaults = {}
): SchemaEntry[] {
  const entry: SchemaEntry = {
    path: overlay.path ?? '',
    documents: [...(overlay.documents ?? [])],
    schemaVersion: nonEmpty(overlay.schemaVersion) ?? defaults.schemaVersion,
    errorTemplate: nonEmpty(overlay.errorTemplate) ?? defaults.errorTemplate,
    refOverrides: {},
  };
  return [entry, ...schemas.slice(1)];
}

/**
 * Merges configuration layers.
 *
 * Scalars take the highest non-empty layer. `$ref` overrides are a
 * right-biased union from lowest to highest priority. Schema entries come
 * from the file layer, with entry 0 replaced by the CLI/env overlay when
 * either names a schema path or documents.
 *
 * @example
 * ```typescript
 * const config = mergeConfig({
 *   discovered: { source: 'project', schemaVersion: 'draft-07' },
 *   cli: { source: 'cli', schemaVersion: 'draft/2020-12' },
 * });
 * config.schemaVersion; // 'draft/2020-12'
 * ```
 */
export function mergeConfig(input: MergeConfigInput): ConfigModel {
  const fileLayer = input.explicitConfig ?? input.discovered;
  const layers = [fileLayer, input.env, input.cli];

  const schemaVersion = highestNonEmpty(layers, (layer) => layer.schemaVersion);
  const errorTemplate = highestNonEmpty(layers, (layer) => layer.errorTemplate);

  const overlay = combineOverlays(input.env?.overlay, input.cli?.overlay);
  const fileSchemas = fileLayer?.schemas ?? [];
  const schemas =
    overlay === undefined ? [...fileSchemas] : applyOverlay(fileSchemas, overlay, { schemaVersion, errorTemplate });

  const config = createConfigModel({
    schemaVersion,
    errorTemplate,
    refOverrides: mergeRefOverrides(...layers.map((layer) => layer?.refOverrides)),
    schemas,
  });

  input.logger?.debug('config_merged', {
    fileSource: fileLayer?.source ?? null,
    fileOrigin: fileLayer?.origin ?? null,
    schemaVersion: config.schemaVersion ?? null,
    refOverrideCount: Object.keys(config.refOverrides).length,
    schemaCount: config.schemas.length,
    overlayApplied: overlay !== undefined,
  });

  return config;
}

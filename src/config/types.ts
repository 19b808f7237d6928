/**
 * Configuration types shared by every configuration source.
 *
 * Field names here are canonical. Source-specific spellings (snake_case in
 * YAML and TOML, camelCase in JSON, SCREAMING_CASE in the environment) are
 * renamed by per-source adapters before a layer is built.
 *
 * @packageDocumentation
 */

/**
 * Mapping from a remote `$ref` URL to a local file path.
 */
export type RefOverrides = Readonly<Record<string, string>>;

/**
 * One schema and the documents validated against it.
 */
export interface SchemaEntry {
  /** Path to the schema file. */
  readonly path: string;
  /** Literal document paths and glob patterns, in order. */
  readonly documents: readonly string[];
  /** Draft identifier overriding the global one. */
  readonly schemaVersion?: string | undefined;
  /** Error template overriding the global one. */
  readonly errorTemplate?: string | undefined;
  /** `$ref` redirections for this schema only. */
  readonly refOverrides: RefOverrides;
}

/**
 * The effective configuration for a run.
 */
export interface ConfigModel {
  /** Default draft identifier for entries that set none. */
  readonly schemaVersion?: string | undefined;
  /** Default error template for entries that set none. */
  readonly errorTemplate?: string | undefined;
  /** `$ref` redirections applied to every schema. */
  readonly refOverrides: RefOverrides;
  /** Schema entries in configuration order. */
  readonly schemas: readonly SchemaEntry[];
}

/**
 * Settings resolved for one entry against the global defaults.
 * An empty string means "not configured".
 */
export interface EffectiveSettings {
  readonly schemaVersion: string;
  readonly errorTemplate: string;
}

/**
 * Where a configuration layer came from.
 */
export type ConfigSourceName =
  | 'cli'
  | 'env'
  | 'explicit'
  | 'project'
  | 'pyproject'
  | 'package-json'
  | 'home';

/**
 * Fields that build or replace the first schema entry when given on the
 * command line or in the environment.
 */
export interface SchemaEntryOverlay {
  readonly path?: string | undefined;
  readonly documents?: readonly string[] | undefined;
  readonly schemaVersion?: string | undefined;
  readonly errorTemplate?: string | undefined;
}

/**
 * A partial configuration contributed by one source.
 */
export interface ConfigLayer {
  /** Which source produced the layer. */
  readonly source: ConfigSourceName;
  /** File the layer was read from, for file sources. */
  readonly origin?: string | undefined;
  readonly schemaVersion?: string | undefined;
  readonly errorTemplate?: string | undefined;
  readonly refOverrides?: RefOverrides | undefined;
  /** Schema entries; only file sources provide them. */
  readonly schemas?: readonly SchemaEntry[] | undefined;
  /** First-entry overlay; only the CLI and environment provide it. */
  readonly overlay?: SchemaEntryOverlay | undefined;
}

/**
 * Directories that configuration discovery looks in.
 */
export interface SourceContext {
  /** Working directory for project-level files. */
  readonly cwd: string;
  /** Home directory for the user-level file. */
  readonly homeDir: string;
}

/**
 * Outcome of asking one source for configuration.
 */
export type SourceReadResult =
  | { readonly found: false }
  | { readonly found: true; readonly layer: ConfigLayer };

/**
 * A configuration source tried during discovery.
 */
export interface SourceReader {
  /** Name of the source. */
  readonly name: ConfigSourceName;
  /**
   * Looks for configuration. Absent files or sections are `found: false`;
   * malformed ones throw a ConfigParseError.
   */
  read(context: SourceContext): SourceReadResult;
}

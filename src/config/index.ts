/**
 * Configuration module: model, sources, environment overrides, merging and
 * validation.
 *
 * Override precedence: CLI > env > config file
 *
 * @packageDocumentation
 */

export type {
  ConfigLayer,
  ConfigModel,
  ConfigSourceName,
  EffectiveSettings,
  RefOverrides,
  SchemaEntry,
  SchemaEntryOverlay,
  SourceContext,
  SourceReader,
  SourceReadResult,
} from './types.js';
export {
  createConfigModel,
  createSchemaEntry,
  getEffectiveSettings,
  mergeRefOverrides,
  parseRefOverridePairs,
  parseRefOverridesString,
  withDocuments,
} from './model.js';
export {
  DEFAULT_ENV_PREFIX,
  EXPLICIT_CONFIG_EXTENSIONS,
  HOME_CONFIG_FILES,
  PACKAGE_JSON_KEY,
  PROJECT_CONFIG_FILES,
  PYPROJECT_TOOL_KEY,
} from './defaults.js';
export { loadConfigFile, parseConfigObject, parseConfigText } from './parser.js';
export type { KeyNaming, ParseConfigOptions } from './parser.js';
export {
  createDefaultReaders,
  createHomeFileReader,
  createPackageJsonReader,
  createProjectFileReader,
  createPyprojectReader,
  discoverConfig,
} from './sources.js';
export { getEnvVarDocumentation, normalizeEnvPrefix, readEnvOverrides } from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { applyOverlay, mergeConfig } from './merger.js';
export type { MergeConfigInput, OverlayDefaults } from './merger.js';
export { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
export type { ValidateConfigOptions, ValidationError, ValidationResult } from './validator.js';

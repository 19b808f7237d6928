/**
 * Default names and locations for configuration sources.
 *
 * @packageDocumentation
 */

/**
 * Default prefix for environment variables.
 */
export const DEFAULT_ENV_PREFIX = 'JSONSCHEMA_VALIDATOR_';

/**
 * Project configuration files looked for in the working directory, in order.
 * The first four are current; the rest are legacy names still honored.
 */
export const PROJECT_CONFIG_FILES: readonly string[] = [
  '.jsonschema-validator.yaml',
  '.jsonschema-validator.yml',
  '.jsonschema-validator.toml',
  '.jsonschema-validator.json',
  '.jsonschema.yaml',
  '.jsonschema.yml',
  'jsonschema-validator.yaml',
  'jsonschema-validator.yml',
];

/**
 * User configuration files looked for in the home directory, in order.
 */
export const HOME_CONFIG_FILES: readonly string[] = [
  '.jsonschema-validator.yaml',
  '.jsonschema-validator.yml',
];

/**
 * Table under `[tool]` in pyproject.toml.
 */
export const PYPROJECT_TOOL_KEY = 'jsonschema-validator';

/**
 * Top-level field in package.json.
 */
export const PACKAGE_JSON_KEY = 'jsonschema-validator';

/**
 * Extensions accepted for an explicit `--config` file.
 */
export const EXPLICIT_CONFIG_EXTENSIONS: readonly string[] = [
  '.yaml',
  '.yml',
  '.toml',
  '.json',
  '.json5',
];

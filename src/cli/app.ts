/**
 * Application wrapper for the jsonschema-validator CLI: builds the command
 * context and dispatches the parsed command.
 */

import { homedir } from 'node:os';
import { DEFAULT_ENV_PREFIX } from '../config/defaults.js';
import { getEnvVarDocumentation } from '../config/env.js';
import { parseArgs } from './args.js';
import { handleRunCommand } from './commands/run.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandResult, CliContext, CliIo } from './types.js';
import { reportError } from './utils/errorHandling.js';

/**
 * Writes to the process streams.
 */
export const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

function renderEnvironmentHelp(): string {
  return Object.entries(getEnvVarDocumentation(DEFAULT_ENV_PREFIX))
    .map(([name, { description }]) => `  ${name.padEnd(40)} ${description}`)
    .join('\n');
}

/**
 * Usage information.
 */
export const HELP_TEXT = `
jsonschema-validator - validate JSON, JSON5, YAML and TOML documents against JSON Schema

USAGE:
  jsonschema-validator [options] [documents...]

OPTIONS:
  -c, --config <file>          Configuration file (.yaml, .yml, .toml, .json, .json5)
  -s, --schema <file>          Schema file for the first schema entry
      --schema-version <ver>   Default draft: draft-04, draft-06, draft-07, draft/2019-09, draft/2020-12
  -e, --error-template <tpl>   Error template, or a built-in: basic, detailed, simple, with_path, with_schema, verbose
  -r, --ref-override <u=p>     Resolve $ref URL u from local file p (repeatable)
  -d, --document <path>        Document or glob pattern (repeatable)
      --env-prefix <prefix>    Environment variable prefix (default: ${DEFAULT_ENV_PREFIX})
      --force-filetype <type>  Parse documents as json, json5, yaml or toml
      --format <format>        Output format: text or json (default: text)
  -q, --quiet                  Do not print valid documents
      --verbose                Print debug logs to stderr
  -v, --version                Show version information
  -h, --help                   Show this help message

ENVIRONMENT:
${renderEnvironmentHelp()}

CONFIGURATION FILES (first found wins, unless --config is given):
  .jsonschema-validator.{yaml,yml,toml,json} in the working directory
  [tool.jsonschema-validator] in pyproject.toml
  "jsonschema-validator" in package.json
  ~/.jsonschema-validator.{yaml,yml}

EXIT CODES:
  0  every document is valid
  1  a document is invalid or a schema failed to compile
  2  usage or configuration error

EXAMPLES:
  jsonschema-validator -s schema.json data.json
  jsonschema-validator -s schema.yaml 'data/*.yaml' --format json
  jsonschema-validator -s schema.json -r https://example.com/common.json=./common.json data.json
`;

/**
 * Creates the CLI context from the running process.
 *
 * @param overrides - Fields replacing the process-derived values.
 */
export function createCliContext(overrides: Partial<CliContext> = {}): CliContext {
  return {
    args: process.argv.slice(2),
    env: process.env,
    cwd: process.cwd(),
    homeDir: homedir(),
    io: processIo,
    ...overrides,
  };
}

/**
 * Parses the arguments and runs the requested command.
 *
 * Errors are reported on stderr and turned into the exit code of the result.
 */
export function runCli(context: CliContext): CliCommandResult {
  try {
    const command = parseArgs(context.args);
    switch (command.kind) {
      case 'help':
        context.io.stdout(HELP_TEXT.trimStart());
        return { exitCode: 0 };
      case 'version':
        return handleVersionCommand(context.io);
      case 'run':
        return handleRunCommand(command.options, context);
    }
  } catch (error) {
    return reportError(error, context.io);
  }
}

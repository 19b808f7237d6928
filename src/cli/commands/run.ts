/**
 * Validation command: resolves configuration from every source and
 * validates the configured documents.
 */

import { createDefaultReaders, discoverConfig } from '../../config/sources.js';
import { readEnvOverrides } from '../../config/env.js';
import { mergeConfig } from '../../config/merger.js';
import { parseRefOverridePairs } from '../../config/model.js';
import { loadConfigFile } from '../../config/parser.js';
import type { ConfigLayer, ConfigModel } from '../../config/types.js';
import { assertConfigValid } from '../../config/validator.js';
import { Logger } from '../../utils/logger.js';
import { runValidation } from '../../validation/orchestrator.js';
import { createJsonReporter, createTextReporter } from '../output.js';
import type { CliCommandResult, CliContext, RunCommandOptions } from '../types.js';

/**
 * Builds the configuration layer contributed by command-line flags.
 */
export function buildCliLayer(options: RunCommandOptions): ConfigLayer {
  return {
    source: 'cli',
    schemaVersion: options.schemaVersion,
    errorTemplate: options.errorTemplate,
    refOverrides: parseRefOverridePairs(options.refOverrides),
    overlay: {
      path: options.schema,
      documents: options.documents,
      schemaVersion: options.schemaVersion,
      errorTemplate: options.errorTemplate,
    },
  };
}

/**
 * Loads, merges and checks the configuration for a run.
 *
 * @throws {UsageError} When a source is malformed or the merged
 * configuration is incomplete.
 */
export function resolveConfig(options: RunCommandOptions, context: CliContext, logger: Logger): ConfigModel {
  const env = readEnvOverrides(context.env, options.envPrefix);
  if (env.appliedVars.length > 0) {
    logger.debug('env_overrides_applied', { variables: env.appliedVars });
  }

  const explicitConfig =
    options.config === undefined ? undefined : loadConfigFile(options.config, context.cwd, 'explicit', logger);
  const discovered =
    explicitConfig === undefined
      ? discoverConfig({ cwd: context.cwd, homeDir: context.homeDir }, createDefaultReaders(logger), logger)
      : undefined;

  const config = mergeConfig({
    explicitConfig,
    discovered,
    env: env.layer,
    cli: buildCliLayer(options),
    logger,
  });

  assertConfigValid(config, { cwd: context.cwd });
  return config;
}

/**
 * Handles a validation run.
 *
 * @returns Exit code 0 when every document is valid, 1 when any document
 * or schema failed, 2 when an entry hit a usage error.
 */
export function handleRunCommand(options: RunCommandOptions, context: CliContext): CliCommandResult {
  const logger = new Logger({ component: 'cli', debugMode: options.verbose, sink: context.io.stderr });
  const config = resolveConfig(options, context, logger.child('config'));

  const reporter =
    options.format === 'json' ? createJsonReporter(context.io) : createTextReporter(context.io, { quiet: options.quiet });

  const report = runValidation(config, {
    cwd: context.cwd,
    forceFileType: options.forceFileType,
    logger: logger.child('validation'),
    onDocument: reporter.onDocument,
    onEntryFailure: reporter.onEntryFailure,
  });
  reporter.finish(report);

  return { exitCode: report.exitCode };
}

/**
 * Configuration file sources and discovery.
 *
 * Discovery tries, in order: a project file in the working directory,
 * `pyproject.toml`, `package.json`, then a file in the home directory.
 * The first source that finds configuration is the only file source used.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import * as TOML from '@iarna/toml';
import { ConfigParseError, toError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import { safeExistsSync, safeReadFileSync } from '../utils/safe-fs.js';
import {
  HOME_CONFIG_FILES,
  PACKAGE_JSON_KEY,
  PROJECT_CONFIG_FILES,
  PYPROJECT_TOOL_KEY,
} from './defaults.js';
import { isRecord, parseConfigObject, parseConfigText } from './parser.js';
import type { ConfigLayer, SourceContext, SourceReader, SourceReadResult } from './types.js';

const NOT_FOUND: SourceReadResult = { found: false };

function readText(filePath: string): string {
  try {
    return safeReadFileSync(filePath);
  } catch (error) {
    const cause = toError(error);
    throw new ConfigParseError(`${filePath}: cannot read configuration file: ${cause.message}`, {
      filePath,
      cause,
    });
  }
}

/**
 * Returns the first existing file among `names` in `dir`.
 */
function findFirst(dir: string, names: readonly string[]): string | undefined {
  for (const name of names) {
    const candidate = path.join(dir, name);
    if (safeExistsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Creates the project file reader.
 */
export function createProjectFileReader(logger?: Logger): SourceReader {
  return {
    name: 'project',
    read(context: SourceContext): SourceReadResult {
      const filePath = findFirst(context.cwd, PROJECT_CONFIG_FILES);
      if (filePath === undefined) {
        return NOT_FOUND;
      }
      return { found: true, layer: parseConfigText(readText(filePath), filePath, 'project', logger) };
    },
  };
}

/**
 * Creates the reader for `[tool.jsonschema-validator]` in pyproject.toml.
 */
export function createPyprojectReader(logger?: Logger): SourceReader {
  return {
    name: 'pyproject',
    read(context: SourceContext): SourceReadResult {
      const filePath = path.join(context.cwd, 'pyproject.toml');
      if (!safeExistsSync(filePath)) {
        return NOT_FOUND;
      }

      let document: unknown;
      try {
        document = TOML.parse(readText(filePath));
      } catch (error) {
        if (error instanceof ConfigParseError) {
          throw error;
        }
        const cause = toError(error);
        throw new ConfigParseError(`${filePath}: ${cause.message}`, { filePath, cause });
      }

      const tool = isRecord(document) ? document.tool : undefined;
      const section = isRecord(tool) ? tool[PYPROJECT_TOOL_KEY] : undefined;
      if (section === undefined) {
        return NOT_FOUND;
      }

      return {
        found: true,
        layer: parseConfigObject(section, {
          source: 'pyproject',
          naming: 'snake',
          origin: filePath,
          ...(logger === undefined ? {} : { logger }),
        }),
      };
    },
  };
}

/**
 * Creates the reader for the `"jsonschema-validator"` field in package.json.
 */
export function createPackageJsonReader(logger?: Logger): SourceReader {
  return {
    name: 'package-json',
    read(context: SourceContext): SourceReadResult {
      const filePath = path.join(context.cwd, 'package.json');
      if (!safeExistsSync(filePath)) {
        return NOT_FOUND;
      }

      let document: unknown;
      try {
        document = JSON.parse(readText(filePath));
      } catch (error) {
        if (error instanceof ConfigParseError) {
          throw error;
        }
        const cause = toError(error);
        throw new ConfigParseError(`${filePath}: ${cause.message}`, { filePath, cause });
      }

      const section = isRecord(document) ? document[PACKAGE_JSON_KEY] : undefined;
      if (section === undefined) {
        return NOT_FOUND;
      }

      return {
        found: true,
        layer: parseConfigObject(section, {
          source: 'package-json',
          naming: 'camel',
          origin: filePath,
          ...(logger === undefined ? {} : { logger }),
        }),
      };
    },
  };
}

/**
 * Creates the reader for the user file in the home directory.
 */
export function createHomeFileReader(logger?: Logger): SourceReader {
  return {
    name: 'home',
    read(context: SourceContext): SourceReadResult {
      if (context.homeDir === '') {
        return NOT_FOUND;
      }
      const filePath = findFirst(context.homeDir, HOME_CONFIG_FILES);
      if (filePath === undefined) {
        return NOT_FOUND;
      }
      return { found: true, layer: parseConfigText(readText(filePath), filePath, 'home', logger) };
    },
  };
}

/**
 * Returns the discovery readers in priority order.
 */
export function createDefaultReaders(logger?: Logger): SourceReader[] {
  return [
    createProjectFileReader(logger),
    createPyprojectReader(logger),
    createPackageJsonReader(logger),
    createHomeFileReader(logger),
  ];
}

/**
 * Runs the readers in order and returns the first layer found.
 *
 * @returns The discovered layer, or undefined when no source has configuration.
 * @throws {ConfigParseError} When a source exists but is malformed.
 */
export function discoverConfig(
  context: SourceContext,
  readers: readonly SourceReader[] = createDefaultReaders(),
  logger?: Logger
): ConfigLayer | undefined {
  for (const reader of readers) {
    const result = reader.read(context);
    if (result.found) {
      logger?.debug('config_source_found', {
        source: reader.name,
        ...(result.layer.origin === undefined ? {} : { path: result.layer.origin }),
      });
      return result.layer;
    }
  }
  logger?.debug('config_source_not_found', { cwd: context.cwd });
  return undefined;
}

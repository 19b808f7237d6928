/**
 * Version command handler for the jsonschema-validator CLI.
 *
 * Displays the CLI version by reading it from the package's package.json.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isRecord } from '../../config/parser.js';
import type { CliCommandResult, CliIo } from '../types.js';

const PACKAGE_NAME = 'jsonschema-validator';

/**
 * Finds the package's package.json by walking up from this module, so the
 * lookup works from the sources and from the build output alike.
 *
 * @returns The version string, or '(unknown)' if not found.
 */
export function getVersion(startDir: string = dirname(fileURLToPath(import.meta.url))): string {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(readFileSync(candidate, 'utf-8'));
      } catch {
        return '(unknown)';
      }
      if (isRecord(parsed) && parsed.name === PACKAGE_NAME) {
        return typeof parsed.version === 'string' ? parsed.version : '(unknown)';
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return '(unknown)';
    }
    dir = parent;
  }
}

/**
 * Handles the version command.
 */
export function handleVersionCommand(io: CliIo): CliCommandResult {
  io.stdout(`${PACKAGE_NAME} ${getVersion()}\n`);
  return { exitCode: 0 };
}

/**
 * Command-line argument parsing.
 */

import { parseRefOverridePairs } from '../config/model.js';
import { UsageError } from '../errors.js';
import { FILE_TYPES, isFileType } from '../parsing/files.js';
import type { OutputFormat, ParsedCommand, RunCommandOptions } from './types.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

type ValueFlag =
  | 'config'
  | 'schema'
  | 'schemaVersion'
  | 'errorTemplate'
  | 'refOverride'
  | 'document'
  | 'envPrefix'
  | 'forceFileType'
  | 'format';

type SwitchFlag = 'quiet' | 'verbose' | 'version' | 'help';

const VALUE_FLAGS: ReadonlyMap<string, ValueFlag> = new Map<string, ValueFlag>([
  ['--config', 'config'],
  ['-c', 'config'],
  ['--schema', 'schema'],
  ['-s', 'schema'],
  ['--schema-version', 'schemaVersion'],
  ['--error-template', 'errorTemplate'],
  ['-e', 'errorTemplate'],
  ['--ref-override', 'refOverride'],
  ['-r', 'refOverride'],
  ['--document', 'document'],
  ['-d', 'document'],
  ['--env-prefix', 'envPrefix'],
  ['--force-filetype', 'forceFileType'],
  ['--format', 'format'],
]);

const SWITCH_FLAGS: ReadonlyMap<string, SwitchFlag> = new Map<string, SwitchFlag>([
  ['--quiet', 'quiet'],
  ['-q', 'quiet'],
  ['--verbose', 'verbose'],
  ['--version', 'version'],
  ['-v', 'version'],
  ['--help', 'help'],
  ['-h', 'help'],
]);

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Splits `--flag=value` into its flag and value.
 */
function splitInlineValue(arg: string): { flag: string; value: string | undefined } {
  if (!arg.startsWith('--')) {
    return { flag: arg, value: undefined };
  }
  const separator = arg.indexOf('=');
  return separator === -1
    ? { flag: arg, value: undefined }
    : { flag: arg.slice(0, separator), value: arg.slice(separator + 1) };
}

function applyValue(options: RunCommandOptions, field: ValueFlag, flag: string, value: string): void {
  switch (field) {
    case 'config':
      options.config = value;
      break;
    case 'schema':
      options.schema = value;
      break;
    case 'schemaVersion':
      options.schemaVersion = value;
      break;
    case 'errorTemplate':
      options.errorTemplate = value;
      break;
    case 'refOverride':
      if (Object.keys(parseRefOverridePairs([value])).length === 0) {
        throw new UsageError(`invalid value for ${flag}: "${value}" (expected url=path)`);
      }
      options.refOverrides.push(value);
      break;
    case 'document':
      options.documents.push(value);
      break;
    case 'envPrefix':
      options.envPrefix = value;
      break;
    case 'forceFileType':
      if (value === 'auto' || isFileType(value)) {
        options.forceFileType = value;
        break;
      }
      throw new UsageError(`invalid value for ${flag}: "${value}" (expected one of: auto, ${FILE_TYPES.join(', ')})`);
    case 'format':
      if (!isOutputFormat(value)) {
        throw new UsageError(`invalid value for ${flag}: "${value}" (expected one of: ${OUTPUT_FORMATS.join(', ')})`);
      }
      options.format = value;
      break;
  }
}

/**
 * Creates run options with every default applied.
 */
export function createRunOptions(): RunCommandOptions {
  return {
    refOverrides: [],
    documents: [],
    forceFileType: 'auto',
    format: 'text',
    quiet: false,
    verbose: false,
  };
}

/**
 * Parses command-line arguments.
 *
 * `--help` wins over everything, then `--version`. Arguments after `--`
 * are documents even when they start with a dash.
 *
 * @example
 * ```typescript
 * parseArgs(['-s', 'schema.json', 'a.json', '--format=json']);
 * // { kind: 'run', options: { schema: 'schema.json', documents: ['a.json'], format: 'json', ... } }
 * ```
 *
 * @throws {UsageError} On an unknown flag, a missing value or an invalid value.
 */
export function parseArgs(args: readonly string[]): ParsedCommand {
  const options = createRunOptions();
  let help = false;
  let version = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      options.documents.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('-') || arg === '-') {
      options.documents.push(arg);
      continue;
    }

    const { flag, value: inlineValue } = splitInlineValue(arg);

    const switchFlag = SWITCH_FLAGS.get(flag);
    if (switchFlag !== undefined) {
      if (inlineValue !== undefined) {
        throw new UsageError(`flag ${flag} does not take a value`);
      }
      switch (switchFlag) {
        case 'quiet':
          options.quiet = true;
          break;
        case 'verbose':
          options.verbose = true;
          break;
        case 'version':
          version = true;
          break;
        case 'help':
          help = true;
          break;
      }
      continue;
    }

    const valueFlag = VALUE_FLAGS.get(flag);
    if (valueFlag === undefined) {
      throw new UsageError(`unknown flag: ${flag}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      const next = args[i + 1];
      if (next === undefined) {
        throw new UsageError(`flag ${flag} requires a value`);
      }
      value = next;
      i++;
    }
    applyValue(options, valueFlag, flag, value);
  }

  if (help) {
    return { kind: 'help' };
  }
  if (version) {
    return { kind: 'version' };
  }
  return { kind: 'run', options };
}

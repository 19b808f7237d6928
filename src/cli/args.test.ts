import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { UsageError } from '../errors.js';
import { createRunOptions, parseArgs } from './args.js';

function runOptions(args: string[]) {
  const command = parseArgs(args);
  if (command.kind !== 'run') {
    throw new Error(`expected a run command, got ${command.kind}`);
  }
  return command.options;
}

describe('parseArgs', () => {
  it('returns defaults for no arguments', () => {
    expect(parseArgs([])).toEqual({ kind: 'run', options: createRunOptions() });
  });

  it('reads every value flag in short and long form', () => {
    const options = runOptions([
      '-c',
      'config.yaml',
      '--schema',
      'schema.json',
      '--schema-version',
      'draft-07',
      '-e',
      'detailed',
      '-r',
      'https://example.com/a.json=a.json',
      '--ref-override',
      'https://example.com/b.json=b.json',
      '-d',
      'one.json',
      '--env-prefix',
      'MYAPP',
      '--force-filetype',
      'yaml',
      '--format',
      'json',
    ]);

    expect(options).toEqual({
      config: 'config.yaml',
      schema: 'schema.json',
      schemaVersion: 'draft-07',
      errorTemplate: 'detailed',
      refOverrides: ['https://example.com/a.json=a.json', 'https://example.com/b.json=b.json'],
      documents: ['one.json'],
      envPrefix: 'MYAPP',
      forceFileType: 'yaml',
      format: 'json',
      quiet: false,
      verbose: false,
    });
  });

  it('accepts --flag=value', () => {
    const options = runOptions(['--schema=schema.json', '--error-template={{.Path}}', '--format=json']);
    expect(options.schema).toBe('schema.json');
    expect(options.errorTemplate).toBe('{{.Path}}');
    expect(options.format).toBe('json');
  });

  it('keeps documents from flags and positionals in order', () => {
    expect(runOptions(['a.json', '-d', 'b.json', 'c/*.yaml']).documents).toEqual(['a.json', 'b.json', 'c/*.yaml']);
  });

  it('treats everything after -- as documents', () => {
    expect(runOptions(['-s', 'schema.json', '--', '-odd.json', '--quiet']).documents).toEqual(['-odd.json', '--quiet']);
  });

  it('sets switches', () => {
    expect(runOptions(['-q', '--verbose'])).toMatchObject({ quiet: true, verbose: true });
  });

  it('uses -v for version, not verbose', () => {
    expect(parseArgs(['-v'])).toEqual({ kind: 'version' });
    expect(parseArgs(['--version', '-s', 'schema.json'])).toEqual({ kind: 'version' });
  });

  it('lets help win over version', () => {
    expect(parseArgs(['-v', '--help'])).toEqual({ kind: 'help' });
    expect(parseArgs(['-h'])).toEqual({ kind: 'help' });
  });

  describe('usage errors', () => {
    it.each([
      [['--bogus'], 'unknown flag: --bogus'],
      [['-x'], 'unknown flag: -x'],
      [['--schema'], 'flag --schema requires a value'],
      [['--quiet=yes'], 'flag --quiet does not take a value'],
      [['--format', 'xml'], 'invalid value for --format: "xml" (expected one of: text, json)'],
      [
        ['--force-filetype', 'ini'],
        'invalid value for --force-filetype: "ini" (expected one of: auto, json, json5, yaml, toml)',
      ],
      [['-r', 'no-separator'], 'invalid value for -r: "no-separator" (expected url=path)'],
      [['--ref-override=https://example.com/a.json='], 'invalid value for --ref-override: "https://example.com/a.json=" (expected url=path)'],
    ])('rejects %j', (args, message) => {
      expect(() => parseArgs(args)).toThrow(UsageError);
      expect(() => parseArgs(args)).toThrow(message);
    });
  });

  it('treats any argument without a leading dash as a document', () => {
    fc.assert(
      fc.property(fc.array(fc.string({ minLength: 1 }).filter((arg) => !arg.startsWith('-'))), (args) => {
        expect(runOptions(args).documents).toEqual(args);
      })
    );
  });
});

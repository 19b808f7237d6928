import { describe, expect, it } from 'vitest';
import { CompileError, ConfigParseError, UsageError } from '../../errors.js';
import { exitCodeForError, reportError } from './errorHandling.js';

describe('errorHandling', () => {
  it('maps usage errors to 2 and everything else to 1', () => {
    expect(exitCodeForError(new UsageError('bad flag'))).toBe(2);
    expect(exitCodeForError(new ConfigParseError('bad file'))).toBe(2);
    expect(exitCodeForError(new CompileError('s.json', 'bad schema'))).toBe(1);
    expect(exitCodeForError(new Error('unexpected'))).toBe(1);
    expect(exitCodeForError('thrown string')).toBe(1);
  });

  it('prints the message, with a help hint for usage errors', () => {
    const stderr: string[] = [];
    const io = {
      stdout: () => undefined,
      stderr: (text: string) => {
        stderr.push(text);
      },
    };

    expect(reportError(new Error('unexpected'), io)).toEqual({ exitCode: 1 });
    expect(reportError(new UsageError('bad flag'), io)).toEqual({ exitCode: 2 });
    expect(stderr).toEqual([
      'Error: unexpected\n',
      'Error: bad flag\n',
      'Run "jsonschema-validator --help" for usage information.\n',
    ]);
  });
});

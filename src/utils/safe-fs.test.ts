import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fc from 'fast-check';
import {
  validatePath,
  safeReadFileSync,
  safeExistsSync,
  checkReadableFile,
  PathValidationError,
} from './safe-fs.js';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'safe-fs-test-'));
    await writeFile(join(tempDir, 'schema.json'), '{"type":"object"}');
    await mkdir(join(tempDir, 'folder'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('should keep absolute paths', () => {
      expect(validatePath('/tmp/test.txt')).toBe('/tmp/test.txt');
    });

    it('should resolve relative paths against the base directory', () => {
      expect(validatePath('docs/a.json', '/work')).toBe('/work/docs/a.json');
      expect(validatePath('../a.json', '/work/sub')).toBe('/work/a.json');
    });

    it('should resolve relative paths to absolute without a base directory', () => {
      expect(path.isAbsolute(validatePath('./test.txt'))).toBe(true);
    });

    it('should reject empty paths', () => {
      expect(() => validatePath('')).toThrow(PathValidationError);
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('should reject paths with null bytes', () => {
      expect(() => validatePath('/tmp/test\0file.txt')).toThrow('Path cannot contain null bytes');
    });

    it('should always return absolute paths for non-empty input', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }).filter((value) => !value.includes('\0')),
          (value) => {
            expect(path.isAbsolute(validatePath(value, '/base'))).toBe(true);
          }
        )
      );
    });
  });

  describe('safeReadFileSync', () => {
    it('should read files relative to the base directory', () => {
      expect(safeReadFileSync('schema.json', tempDir)).toBe('{"type":"object"}');
    });

    it('should throw for missing files', () => {
      expect(() => safeReadFileSync('missing.json', tempDir)).toThrow(/ENOENT/);
    });
  });

  describe('safeExistsSync', () => {
    it('should report existence', () => {
      expect(safeExistsSync('schema.json', tempDir)).toBe(true);
      expect(safeExistsSync('missing.json', tempDir)).toBe(false);
    });

    it('should treat invalid paths as missing', () => {
      expect(safeExistsSync('')).toBe(false);
      expect(safeExistsSync('bad\0path')).toBe(false);
    });
  });

  describe('checkReadableFile', () => {
    it('should accept readable regular files', () => {
      expect(checkReadableFile('schema.json', tempDir)).toEqual({
        ok: true,
        resolvedPath: join(tempDir, 'schema.json'),
      });
    });

    it('should explain why a path is not usable', () => {
      expect(checkReadableFile('missing.json', tempDir)).toEqual({
        ok: false,
        resolvedPath: join(tempDir, 'missing.json'),
        reason: 'file does not exist',
      });
      expect(checkReadableFile('folder', tempDir)).toEqual({
        ok: false,
        resolvedPath: join(tempDir, 'folder'),
        reason: 'not a regular file',
      });
      expect(checkReadableFile('', tempDir)).toEqual({
        ok: false,
        resolvedPath: '',
        reason: 'Path cannot be empty',
      });
    });
  });
});

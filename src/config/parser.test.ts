import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigParseError, UsageError } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { loadConfigFile, parseConfigObject, parseConfigText } from './parser.js';

describe('Config Parser', () => {
  describe('parseConfigText', () => {
    it('reads snake_case keys from YAML', () => {
      const yaml = `
schema_version: draft-07
error_template: detailed
ref_overrides:
  https://example.com/common.json: ./common.json
schemas:
  - path: schemas/user.json
    documents:
      - data/*.json
      - extra.yaml
    schema_version: 2019-09
    error_template: basic
    ref_overrides:
      https://example.com/user.json: ./user-local.json
`;
      const layer = parseConfigText(yaml, 'config.yaml', 'explicit');

      expect(layer.source).toBe('explicit');
      expect(layer.origin).toBe('config.yaml');
      expect(layer.schemaVersion).toBe('draft-07');
      expect(layer.errorTemplate).toBe('detailed');
      expect(layer.refOverrides).toEqual({ 'https://example.com/common.json': './common.json' });
      expect(layer.schemas).toEqual([
        {
          path: 'schemas/user.json',
          documents: ['data/*.json', 'extra.yaml'],
          schemaVersion: '2019-09',
          errorTemplate: 'basic',
          refOverrides: { 'https://example.com/user.json': './user-local.json' },
        },
      ]);
    });

    it('reads snake_case keys from TOML', () => {
      const toml = `
schema_version = "draft-07"

[[schemas]]
path = "schema.json"
documents = ["a.json", "b.json"]

[schemas.ref_overrides]
"https://example.com/x.json" = "x.json"
`;
      const layer = parseConfigText(toml, 'config.toml', 'project');

      expect(layer.schemaVersion).toBe('draft-07');
      expect(layer.schemas).toHaveLength(1);
      expect(layer.schemas?.[0]?.documents).toEqual(['a.json', 'b.json']);
      expect(layer.schemas?.[0]?.refOverrides).toEqual({ 'https://example.com/x.json': 'x.json' });
    });

    it('reads camelCase keys from JSON', () => {
      const json = JSON.stringify({
        schemaVersion: '2020-12',
        errorTemplate: 'simple',
        refOverrides: { 'https://example.com/a.json': 'a.json' },
        schemas: [{ path: 's.json', documents: 'doc.json', schemaVersion: '7' }],
      });
      const layer = parseConfigText(json, 'config.json', 'explicit');

      expect(layer.schemaVersion).toBe('2020-12');
      expect(layer.errorTemplate).toBe('simple');
      expect(layer.refOverrides).toEqual({ 'https://example.com/a.json': 'a.json' });
      expect(layer.schemas?.[0]).toEqual({
        path: 's.json',
        documents: ['doc.json'],
        schemaVersion: '7',
        errorTemplate: undefined,
        refOverrides: {},
      });
    });

    it('accepts a single document string', () => {
      const layer = parseConfigText('schemas:\n  - path: s.json\n    documents: one.json\n', 'c.yml', 'project');
      expect(layer.schemas?.[0]?.documents).toEqual(['one.json']);
    });

    it('returns an empty layer for an empty YAML file', () => {
      expect(parseConfigText('', 'empty.yaml', 'project')).toEqual({ source: 'project', origin: 'empty.yaml' });
    });

    it('rejects wrong field types with the field path', () => {
      const yaml = 'schemas:\n  - path: s.json\n    documents: 42\n';
      expect(() => parseConfigText(yaml, 'bad.yaml', 'explicit')).toThrow(
        "bad.yaml: invalid type for 'schemas[0].documents': expected string or list of strings, got number"
      );
    });

    it('rejects a non-table top level', () => {
      expect(() => parseConfigText('- a\n- b\n', 'list.yaml', 'explicit')).toThrow(
        'list.yaml: expected a table at the top level, got array'
      );
    });

    it('rejects syntax errors as ConfigParseError', () => {
      let caught: unknown;
      try {
        parseConfigText('{ "schemas": [', 'broken.json', 'explicit');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ConfigParseError);
      expect(caught).toBeInstanceOf(UsageError);
      expect(caught).toHaveProperty('exitCode', 2);
      expect(caught).toHaveProperty('filePath', 'broken.json');
    });

    it('rejects unsupported extensions', () => {
      expect(() => parseConfigText('x', 'config.ini', 'explicit')).toThrow(
        'config.ini: unsupported configuration file extension ".ini" (supported: .yaml, .yml, .toml, .json, .json5)'
      );
    });

    it('does not accept snake_case keys in JSON sources', () => {
      const lines: string[] = [];
      const logger = new Logger({ component: 'test', sink: (line) => lines.push(line) });
      const layer = parseConfigText('{"schema_version": "draft-07"}', 'c.json', 'explicit', logger);

      expect(layer.schemaVersion).toBeUndefined();
      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? '');
      expect(entry).toMatchObject({
        level: 'warn',
        event: 'config_key_ignored',
        data: { source: 'explicit', path: 'c.json', key: 'schema_version' },
      });
    });
  });

  describe('parseConfigObject', () => {
    it('treats undefined as an empty layer', () => {
      expect(parseConfigObject(undefined, { source: 'pyproject', naming: 'snake' })).toEqual({
        source: 'pyproject',
      });
    });

    it('names the source when there is no origin file', () => {
      expect(() =>
        parseConfigObject({ schema_version: 7 }, { source: 'pyproject', naming: 'snake' })
      ).toThrow("pyproject: invalid type for 'schema_version': expected string, got number");
    });
  });

  describe('loadConfigFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'config-parser-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('resolves relative paths against the working directory', async () => {
      await writeFile(join(dir, 'cfg.yaml'), 'schema_version: draft-04\n');
      const layer = loadConfigFile('cfg.yaml', dir, 'explicit');
      expect(layer.schemaVersion).toBe('draft-04');
      expect(layer.origin).toBe(join(dir, 'cfg.yaml'));
    });

    it('reports missing files as ConfigParseError', () => {
      expect(() => loadConfigFile('missing.yaml', dir, 'explicit')).toThrow(ConfigParseError);
    });
  });
});

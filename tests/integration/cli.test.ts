/**
 * Integration tests for the CLI.
 *
 * Each test runs the CLI against files in a temporary directory, with an
 * empty environment and no home directory, and captures what it prints.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { pathToFileURL } from 'node:url';
import { runCli } from '../../src/cli/app.js';
import type { CliCommandResult } from '../../src/cli/types.js';
import type { EnvRecord } from '../../src/config/env.js';

const PERSON_SCHEMA = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    age: { type: 'integer' },
  },
  required: ['name', 'age'],
};

const ADDRESS_URL = 'https://example.com/schemas/address.json';

describe('CLI Integration Tests', () => {
  let testDir: string;
  let schemaUri: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'jsonschema-validator-cli-'));
    schemaUri = pathToFileURL(join(testDir, 'person.json')).href;
    stdout = [];
    stderr = [];

    await writeFile(join(testDir, 'person.json'), JSON.stringify(PERSON_SCHEMA));
    await writeFile(join(testDir, 'valid.json'), JSON.stringify({ name: 'Ada', age: 36 }));
    await writeFile(join(testDir, 'invalid.json'), JSON.stringify({ name: 5, age: 'x' }));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function run(args: string[], env: EnvRecord = {}): CliCommandResult {
    return runCli({
      args,
      env,
      cwd: testDir,
      homeDir: '',
      io: {
        stdout: (text) => {
          stdout.push(text);
        },
        stderr: (text) => {
          stderr.push(text);
        },
      },
    });
  }

  describe('validation results', () => {
    it('reports every error of an invalid document and exits 1', () => {
      expect(run(['-s', 'person.json', 'invalid.json'])).toEqual({ exitCode: 1 });

      expect(stdout).toEqual([]);
      expect(stderr).toEqual([
        `document "invalid.json": jsonschema validation failed with '${schemaUri}'\n- at '/age': must be integer\n- at '/name': must be string\n`,
      ]);
    });

    it('prints a success line for a valid document and exits 0', () => {
      expect(run(['-s', 'person.json', 'valid.json'])).toEqual({ exitCode: 0 });

      expect(stdout).toEqual(['✓ valid.json: valid\n']);
      expect(stderr).toEqual([]);
    });

    it('prints nothing for valid documents when quiet', () => {
      expect(run(['-q', '-s', 'person.json', 'valid.json'])).toEqual({ exitCode: 0 });
      expect(stdout).toEqual([]);
    });

    it('renders failures with a built-in template', () => {
      run(['-s', 'person.json', '-e', 'detailed', 'invalid.json']);

      expect(stderr).toEqual([
        'document "invalid.json": 2 validation error(s) found:\n1. must be integer at /age\n2. must be string at /name\n\n',
      ]);
    });

    it('keeps the original message when the template is malformed', () => {
      run(['-s', 'person.json', '-e', '{{range .Errors}}', 'invalid.json']);

      expect(stderr).toHaveLength(2);
      expect(stderr[0]).toContain('"event":"template_render_failed"');
      expect(stderr[1]).toBe(
        `document "invalid.json": validation failed (template error: template: line 1: unexpected EOF: {{range}} has no matching {{end}}): jsonschema validation failed with '${schemaUri}'\n- at '/age': must be integer\n- at '/name': must be string\n`
      );
    });

    it('reports documents that cannot be parsed and validates the rest', async () => {
      await writeFile(join(testDir, 'broken.json'), '{ "name": ');

      expect(run(['-s', 'person.json', 'broken.json', 'valid.json'])).toEqual({ exitCode: 1 });

      expect(stdout).toEqual(['✓ valid.json: valid\n']);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/^document "broken\.json": parsing JSON: /);
    });

    it('prints one JSON report with --format json', () => {
      expect(run(['-s', 'person.json', '--format', 'json', 'valid.json', 'invalid.json'])).toEqual({ exitCode: 1 });

      expect(stdout).toHaveLength(1);
      const report: unknown = JSON.parse(stdout[0] ?? '');
      expect(report).toEqual({
        valid: false,
        exitCode: 1,
        schemas: [
          {
            schema: 'person.json',
            documents: [
              { document: 'valid.json', status: 'valid' },
              {
                document: 'invalid.json',
                status: 'invalid',
                errorCount: 2,
                message: `jsonschema validation failed with '${schemaUri}'\n- at '/age': must be integer\n- at '/name': must be string`,
                errors: [
                  {
                    message: 'must be integer',
                    documentPath: '/age',
                    schemaPath: `${schemaUri}#/properties/age/type`,
                    value: '"x"',
                  },
                  {
                    message: 'must be string',
                    documentPath: '/name',
                    schemaPath: `${schemaUri}#/properties/name/type`,
                    value: '5',
                  },
                ],
              },
            ],
          },
        ],
      });
      expect(stderr).toEqual([]);
    });

    it('writes debug logs to stderr with --verbose', () => {
      expect(run(['--verbose', '-s', 'person.json', 'valid.json'])).toEqual({ exitCode: 0 });

      const events = stderr.map((line): unknown => {
        const entry: unknown = JSON.parse(line);
        return typeof entry === 'object' && entry !== null && 'event' in entry ? entry.event : undefined;
      });
      expect(events).toContain('config_merged');
      expect(events).toContain('schema_compiling');
      expect(events).toContain('document_validated');
    });
  });

  describe('ref overrides', () => {
    beforeEach(async () => {
      await writeFile(
        join(testDir, 'customer.json'),
        JSON.stringify({ type: 'object', properties: { address: { $ref: ADDRESS_URL } } })
      );
      await writeFile(
        join(testDir, 'address.json'),
        JSON.stringify({ type: 'object', properties: { zip: { type: 'string' } }, required: ['zip'] })
      );
      await writeFile(join(testDir, 'customer-doc.json'), JSON.stringify({ address: { zip: '12345' } }));
    });

    it('resolves a remote reference from a local file', () => {
      expect(run(['-s', 'customer.json', '-r', `${ADDRESS_URL}=address.json`, 'customer-doc.json'])).toEqual({
        exitCode: 0,
      });
      expect(stdout).toEqual(['✓ customer-doc.json: valid\n']);
    });

    it('fails to compile without the override', () => {
      expect(run(['-s', 'customer.json', 'customer-doc.json'])).toEqual({ exitCode: 1 });

      expect(stdout).toEqual([]);
      expect(stderr).toHaveLength(1);
      expect(stderr[0]).toMatch(/^schema "customer\.json": compiling schema "customer\.json": /);
      expect(stderr[0]).toContain(ADDRESS_URL);
    });

    it('takes overrides from the environment', () => {
      expect(
        run(['-s', 'customer.json', 'customer-doc.json'], {
          JSONSCHEMA_VALIDATOR_REF_OVERRIDES: `${ADDRESS_URL}=address.json`,
        })
      ).toEqual({ exitCode: 0 });
    });
  });

  describe('configuration sources', () => {
    beforeEach(async () => {
      await mkdir(join(testDir, 'data'));
      await writeFile(join(testDir, 'data', 'valid.json'), JSON.stringify({ name: 'Grace', age: 45 }));
      await writeFile(join(testDir, 'data', 'invalid.json'), JSON.stringify({ name: 5, age: 'x' }));
    });

    it('discovers a project configuration file', async () => {
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        ['error_template: with_path', 'schemas:', '  - path: person.json', '    documents:', '      - "data/*.json"', ''].join(
          '\n'
        )
      );

      expect(run([])).toEqual({ exitCode: 1 });

      expect(stdout).toEqual(['✓ data/valid.json: valid\n']);
      expect(stderr).toEqual(['document "data/invalid.json": /age: must be integer\n/name: must be string\n\n']);
    });

    it('replaces the first entry with the schema and documents given on the command line', async () => {
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        ['schemas:', '  - path: person.json', '    documents: ["data/invalid.json"]', ''].join('\n')
      );

      expect(run(['-s', 'person.json', 'data/valid.json'])).toEqual({ exitCode: 0 });
      expect(stdout).toEqual(['✓ data/valid.json: valid\n']);
    });

    it('does not take the schema path of the replaced entry', async () => {
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        ['schemas:', '  - path: person.json', '    documents: ["data/invalid.json"]', ''].join('\n')
      );

      expect(run(['data/valid.json'])).toEqual({ exitCode: 2 });
      expect(stderr[0]).toBe('Error: invalid configuration:\n  schemas[0].path: schema path is required\n');
    });

    it('does not give the overlay entry the overrides of the replaced entry', async () => {
      await writeFile(
        join(testDir, 'customer.json'),
        JSON.stringify({ type: 'object', properties: { address: { $ref: ADDRESS_URL } } })
      );
      await writeFile(join(testDir, 'address.json'), JSON.stringify({ type: 'object' }));
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        [
          'schemas:',
          '  - path: person.json',
          '    documents: ["data/valid.json"]',
          '    ref_overrides:',
          `      "${ADDRESS_URL}": address.json`,
          '',
        ].join('\n')
      );
      await writeFile(join(testDir, 'customer-doc.json'), JSON.stringify({ address: {} }));

      expect(run(['-s', 'customer.json', 'customer-doc.json'])).toEqual({ exitCode: 1 });
      expect(stderr[0]).toMatch(/^schema "customer\.json": compiling schema "customer\.json": /);
    });

    it('applies the environment schema version to the overlay entry over the file', async () => {
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        ['schemas:', '  - path: person.json', '    schema_version: draft-04', '    documents: ["data/valid.json"]', ''].join(
          '\n'
        )
      );

      expect(
        run(['--verbose'], {
          JSONSCHEMA_VALIDATOR_SCHEMA: 'person.json',
          JSONSCHEMA_VALIDATOR_DOCUMENTS: 'valid.json',
          JSONSCHEMA_VALIDATOR_SCHEMA_VERSION: 'draft-07',
        })
      ).toEqual({ exitCode: 0 });
      const compiling = stderr.find((line) => line.includes('"event":"schema_compiling"'));
      expect(compiling).toContain('"draft":"draft-07"');
    });

    it('reads an explicit configuration file instead of discovering one', async () => {
      await writeFile(
        join(testDir, '.jsonschema-validator.yaml'),
        ['schemas:', '  - path: person.json', '    documents: ["data/invalid.json"]', ''].join('\n')
      );
      await writeFile(
        join(testDir, 'custom.toml'),
        ['[[schemas]]', 'path = "person.json"', 'documents = ["data/valid.json"]', ''].join('\n')
      );

      expect(run(['-c', 'custom.toml'])).toEqual({ exitCode: 0 });
      expect(stdout).toEqual(['✓ data/valid.json: valid\n']);
    });

    it('reads the schema and documents from the environment', () => {
      expect(
        run([], { JSONSCHEMA_VALIDATOR_SCHEMA: 'person.json', JSONSCHEMA_VALIDATOR_DOCUMENTS: 'valid.json, data/valid.json' })
      ).toEqual({ exitCode: 0 });
      expect(stdout).toEqual(['✓ valid.json: valid\n', '✓ data/valid.json: valid\n']);
    });

    it('honors a custom environment prefix', () => {
      expect(run(['--env-prefix', 'MYAPP'], { MYAPP_SCHEMA: 'person.json', MYAPP_DOCUMENTS: 'valid.json' })).toEqual({
        exitCode: 0,
      });
    });

    it('lets command-line documents win over environment documents', () => {
      expect(
        run(['invalid.json'], { JSONSCHEMA_VALIDATOR_SCHEMA: 'person.json', JSONSCHEMA_VALIDATOR_DOCUMENTS: 'valid.json' })
      ).toEqual({ exitCode: 1 });
      expect(stdout).toEqual([]);
    });

    it('validates every configured schema entry', async () => {
      await writeFile(join(testDir, 'name.json'), JSON.stringify({ type: 'object', required: ['name'] }));
      await writeFile(
        join(testDir, '.jsonschema-validator.json'),
        JSON.stringify({
          schemas: [
            { path: 'person.json', documents: ['valid.json'] },
            { path: 'name.json', documents: ['data/valid.json', 'data/invalid.json'] },
          ],
        })
      );

      expect(run([])).toEqual({ exitCode: 0 });
      expect(stdout).toEqual(['✓ valid.json: valid\n', '✓ data/valid.json: valid\n', '✓ data/invalid.json: valid\n']);
    });

    it('rejects a malformed configuration file', async () => {
      await writeFile(join(testDir, '.jsonschema-validator.yaml'), 'schemas: [\n');

      expect(run([])).toEqual({ exitCode: 2 });
      expect(stderr[0]).toMatch(/^Error: /);
    });
  });

  describe('usage errors', () => {
    it('rejects a missing schema file before validating', () => {
      expect(run(['-s', 'missing.json', 'valid.json'])).toEqual({ exitCode: 2 });
      expect(stderr[0]).toBe(
        'Error: invalid configuration:\n  schemas[0].path: schema file "missing.json": file does not exist\n'
      );
    });

    it('rejects an unsupported schema version', () => {
      expect(run(['-s', 'person.json', '--schema-version', 'draft-99', 'valid.json'])).toEqual({ exitCode: 2 });
      expect(stderr).toEqual([
        'schema "person.json": unsupported schema version: "draft-99" (supported: draft-04, draft-06, draft-07, draft/2019-09, draft/2020-12)\n',
      ]);
    });

    it('rejects documents without a schema', () => {
      expect(run(['valid.json'])).toEqual({ exitCode: 2 });
      expect(stderr[0]).toBe('Error: invalid configuration:\n  schemas[0].path: schema path is required\n');
    });
  });
});

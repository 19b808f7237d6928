import { describe, expect, it } from 'vitest';
import { createSchemaCompiler, isAnySchema, resourceKey } from './compiler.js';

describe('Schema Compiler', () => {
  it('strips fragments from resource keys', () => {
    expect(resourceKey('file:///work/a.json#/$defs/x')).toBe('file:///work/a.json');
    expect(resourceKey('https://example.com/a.json')).toBe('https://example.com/a.json');
  });

  it('accepts objects and booleans as schemas', () => {
    expect(isAnySchema({})).toBe(true);
    expect(isAnySchema(false)).toBe(true);
    expect(isAnySchema([])).toBe(false);
    expect(isAnySchema(null)).toBe(false);
    expect(isAnySchema('string')).toBe(false);
  });

  it('compiles a draft/2020-12 schema and reports every error', () => {
    const compiler = createSchemaCompiler('draft/2020-12');
    const compiled = compiler.compile(
      {
        type: 'object',
        properties: { name: { type: 'string' }, age: { type: 'integer' } },
        required: ['name', 'age'],
      },
      'file:///work/person.json'
    );

    expect(compiled.schemaUri).toBe('file:///work/person.json');
    expect(compiled.validate({ name: 'Ada', age: 36 })).toEqual([]);

    const errors = compiled.validate({ name: 5, age: 'x' });
    expect(errors.map((error) => [error.instancePath, error.message])).toEqual([
      ['/name', 'must be string'],
      ['/age', 'must be integer'],
    ]);
  });

  it('uses boolean exclusive bounds under draft-04', () => {
    const compiled = createSchemaCompiler('draft-04').compile(
      { type: 'number', maximum: 10, exclusiveMaximum: true },
      'file:///work/bounded.json'
    );
    expect(compiled.validate(9)).toEqual([]);
    expect(compiled.validate(10)).toHaveLength(1);
  });

  it('supports draft-06 schemas', () => {
    const compiled = createSchemaCompiler('draft-06').compile(
      { $schema: 'http://json-schema.org/draft-06/schema#', type: 'integer', exclusiveMinimum: 0 },
      'file:///work/positive.json'
    );
    expect(compiled.validate(1)).toEqual([]);
    expect(compiled.validate(0)).toHaveLength(1);
  });

  it('checks formats', () => {
    const compiled = createSchemaCompiler('draft-07').compile(
      { type: 'string', format: 'email' },
      'file:///work/email.json'
    );
    expect(compiled.validate('user@example.com')).toEqual([]);
    expect(compiled.validate('not an address')).toHaveLength(1);
  });

  it('resolves references to registered resources', () => {
    const compiler = createSchemaCompiler('draft/2020-12');
    compiler.addResource('https://example.com/name.json', { type: 'string', minLength: 1 });

    expect(compiler.hasResource('https://example.com/name.json#/minLength')).toBe(true);
    expect(compiler.hasResource('https://example.com/other.json')).toBe(false);

    const compiled = compiler.compile(
      { properties: { name: { $ref: 'https://example.com/name.json' } } },
      'file:///work/ref.json'
    );
    expect(compiled.validate({ name: 'x' })).toEqual([]);
    expect(compiled.validate({ name: '' })).toHaveLength(1);
  });

  it('throws on unresolvable references', () => {
    const compiler = createSchemaCompiler('draft/2020-12');
    expect(() =>
      compiler.compile({ $ref: 'https://example.com/missing.json' }, 'file:///work/ref.json')
    ).toThrow(/https:\/\/example\.com\/missing\.json/);
  });

  it('throws on schemas that violate the meta-schema', () => {
    const compiler = createSchemaCompiler('draft-07');
    expect(() => compiler.compile({ type: 'notatype' }, 'file:///work/bad.json')).toThrow(/^schema is invalid/);
  });

  it('rejects values that are not schemas', () => {
    const compiler = createSchemaCompiler('draft-07');
    expect(() => compiler.addResource('https://example.com/a.json', 5)).toThrow(
      'not a JSON Schema: expected an object or a boolean'
    );
    expect(() => compiler.compile([], 'file:///work/list.json')).toThrow(
      'not a JSON Schema: expected an object or a boolean'
    );
  });

  it('rejects asynchronous schemas', () => {
    const compiler = createSchemaCompiler('draft-07');
    expect(() => compiler.compile({ $async: true, type: 'object' }, 'file:///work/async.json')).toThrow(
      'asynchronous schemas ($async) are not supported'
    );
  });
});

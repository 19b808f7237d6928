/**
 * Ajv-backed schema compiler.
 *
 * One compiler holds one Ajv instance for one draft. A fresh compiler is
 * created for every schema entry so that resources registered for one
 * entry never leak into another.
 *
 * @packageDocumentation
 */

import { createRequire } from 'node:module';
import AjvModule from 'ajv';
import Ajv2019Module from 'ajv/dist/2019.js';
import Ajv2020Module from 'ajv/dist/2020.js';
import AjvDraft04Module from 'ajv-draft-04';
import addFormatsModule from 'ajv-formats';
import type { AnySchema, AnySchemaObject, ErrorObject, Options } from 'ajv';
import type { AnyValidateFunction } from 'ajv/dist/core.js';
import type { Draft } from './drafts.js';

const Ajv = AjvModule.default;
const Ajv2019 = Ajv2019Module.default;
const Ajv2020 = Ajv2020Module.default;
const AjvDraft04 = AjvDraft04Module.default;
const addFormats = addFormatsModule.default;

const require = createRequire(import.meta.url);

/**
 * The part of Ajv this module relies on, shared by every draft's class.
 */
interface AjvInstance {
  addSchema(schema: AnySchema, key?: string): unknown;
  addMetaSchema(schema: AnySchemaObject, key?: string): unknown;
  getSchema(keyRef: string): AnyValidateFunction | undefined;
}

/**
 * A compiled schema ready to validate documents.
 */
export interface CompiledSchema {
  /** URI the schema was compiled under. */
  readonly schemaUri: string;
  /**
   * Validates a document.
   *
   * @returns The errors found; empty when the document is valid.
   */
  validate(document: unknown): ErrorObject[];
}

/**
 * Compiles schemas for one draft.
 */
export interface SchemaCompiler {
  readonly draft: Draft;
  /**
   * Registers a schema under a URI so `$ref`s to it resolve locally.
   *
   * @throws Error when the value is not a schema, is invalid against the
   * meta-schema, or the URI is already taken.
   */
  addResource(uri: string, schema: unknown): void;
  /** Whether a resource is registered under the URI (fragment ignored). */
  hasResource(uri: string): boolean;
  /**
   * Compiles a schema under the given URI.
   *
   * @throws Error when the schema is invalid or a `$ref` cannot be resolved.
   */
  compile(schema: unknown, schemaUri: string): CompiledSchema;
}

/**
 * Type guard for values Ajv accepts as schemas: booleans and objects.
 */
export function isAnySchema(value: unknown): value is AnySchema {
  return typeof value === 'boolean' || isSchemaObject(value);
}

function isSchemaObject(value: unknown): value is AnySchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strips the fragment from a URI.
 */
export function resourceKey(uri: string): string {
  const hash = uri.indexOf('#');
  return hash === -1 ? uri : uri.slice(0, hash);
}

const AJV_OPTIONS: Options = {
  allErrors: true,
  strict: false,
};

function createAjv(draft: Draft): AjvInstance {
  switch (draft) {
    case 'draft-04': {
      const ajv = new AjvDraft04(AJV_OPTIONS);
      addFormats(ajv);
      return ajv;
    }
    case 'draft-06': {
      const ajv = new Ajv(AJV_OPTIONS);
      addFormats(ajv);
      const draft06MetaSchema: unknown = require('ajv/dist/refs/json-schema-draft-06.json');
      if (isSchemaObject(draft06MetaSchema)) {
        ajv.addMetaSchema(draft06MetaSchema);
      }
      return ajv;
    }
    case 'draft-07': {
      const ajv = new Ajv(AJV_OPTIONS);
      addFormats(ajv);
      return ajv;
    }
    case 'draft/2019-09': {
      const ajv = new Ajv2019(AJV_OPTIONS);
      addFormats(ajv);
      return ajv;
    }
    case 'draft/2020-12': {
      const ajv = new Ajv2020(AJV_OPTIONS);
      addFormats(ajv);
      return ajv;
    }
  }
}

/**
 * Creates a compiler backed by a new Ajv instance for the draft.
 */
export function createSchemaCompiler(draft: Draft): SchemaCompiler {
  const ajv = createAjv(draft);
  const registered = new Set<string>();

  return {
    draft,

    addResource(uri: string, schema: unknown): void {
      if (!isAnySchema(schema)) {
        throw new Error('not a JSON Schema: expected an object or a boolean');
      }
      const key = resourceKey(uri);
      ajv.addSchema(schema, key);
      registered.add(key);
    },

    hasResource(uri: string): boolean {
      return registered.has(resourceKey(uri));
    },

    compile(schema: unknown, schemaUri: string): CompiledSchema {
      if (!isAnySchema(schema)) {
        throw new Error('not a JSON Schema: expected an object or a boolean');
      }
      const key = resourceKey(schemaUri);
      ajv.addSchema(schema, key);
      registered.add(key);

      const validateFn = ajv.getSchema(key);
      if (validateFn === undefined) {
        throw new Error(`schema "${key}" could not be compiled`);
      }
      if ('$async' in validateFn) {
        throw new Error('asynchronous schemas ($async) are not supported');
      }

      return {
        schemaUri,
        validate(document: unknown): ErrorObject[] {
          if (validateFn(document)) {
            return [];
          }
          return validateFn.errors ?? [];
        },
      };
    },
  };
}

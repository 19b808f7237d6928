/**
 * Redirects `$ref` URLs to local files before a schema is compiled.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { mergeRefOverrides } from '../config/model.js';
import type { RefOverrides } from '../config/types.js';
import { RefOverrideError, errorMessage, toError } from '../errors.js';
import { parseFile } from '../parsing/files.js';
import type { Logger } from '../utils/logger.js';
import { safeExistsSync } from '../utils/safe-fs.js';
import { resourceKey, type SchemaCompiler } from './compiler.js';

/**
 * Options for registering local resources.
 */
export interface RegisterOptions {
  /** Directory relative override paths resolve against. */
  readonly cwd: string;
  readonly logger?: Logger | undefined;
}

/**
 * Combines global and entry overrides; entry values win.
 */
export function resolveRefOverrides(global: RefOverrides, entry: RefOverrides): Record<string, string> {
  return mergeRefOverrides(global, entry);
}

/**
 * Parses each override file and registers it under its remote URL.
 *
 * @returns The URLs registered.
 * @throws {RefOverrideError} Naming the URL and path of the first override
 * that cannot be read, parsed or registered.
 */
export function registerRefOverrides(
  compiler: SchemaCompiler,
  overrides: RefOverrides,
  options: RegisterOptions
): string[] {
  const registered: string[] = [];

  for (const [url, localPath] of Object.entries(overrides)) {
    let value: unknown;
    try {
      value = parseFile(localPath, 'auto', options.cwd).value;
    } catch (error) {
      const cause = toError(error);
      throw new RefOverrideError(url, localPath, cause.message, cause);
    }

    try {
      compiler.addResource(url, value);
    } catch (error) {
      const cause = toError(error);
      throw new RefOverrideError(url, localPath, `cannot register schema: ${cause.message}`, cause);
    }

    options.logger?.debug('ref_override_registered', {
      url,
      path: path.resolve(options.cwd, localPath),
    });
    registered.push(url);
  }

  return registered;
}

/**
 * Collects the `$ref` values of a schema, resolved against the base URI
 * and any nested `$id` (or `id`, for draft-04).
 */
export function collectRefs(schema: unknown, baseUri: string): string[] {
  const refs: string[] = [];

  const visit = (node: unknown, base: string): void => {
    if (Array.isArray(node)) {
      for (const item of node) {
        visit(item, base);
      }
      return;
    }
    if (typeof node !== 'object' || node === null) {
      return;
    }

    const entries = Object.entries(node);
    let scope = base;
    for (const [key, value] of entries) {
      if ((key === '$id' || key === 'id') && typeof value === 'string') {
        scope = resolveUri(value, base) ?? base;
      }
    }

    for (const [key, value] of entries) {
      if (key === '$ref' && typeof value === 'string') {
        const resolved = resolveUri(value, scope);
        if (resolved !== undefined) {
          refs.push(resolved);
        }
      } else {
        visit(value, scope);
      }
    }
  };

  visit(schema, baseUri);
  return refs;
}

function resolveUri(reference: string, base: string): string | undefined {
  try {
    return new URL(reference, base).href;
  } catch {
    return undefined;
  }
}

/**
 * Pre-registers local files reached through `file:` `$ref`s, recursively,
 * so relative references between schema files resolve without a loader.
 *
 * URLs already registered (overrides included) and the root schema itself
 * are skipped. URLs with no local path (a remote host, an encoded
 * separator), missing files and unparsable files are left for the
 * compiler to report as unresolved references.
 *
 * @returns The URLs registered.
 */
export function registerLocalRefs(
  compiler: SchemaCompiler,
  schema: unknown,
  rootUri: string,
  logger?: Logger
): string[] {
  const registered: string[] = [];
  const visited = new Set<string>([resourceKey(rootUri)]);
  const pending: Array<{ schema: unknown; base: string }> = [{ schema, base: rootUri }];

  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    for (const ref of collectRefs(item.schema, item.base)) {
      const key = resourceKey(ref);
      if (!key.startsWith('file:') || visited.has(key) || compiler.hasResource(key)) {
        continue;
      }
      visited.add(key);

      let filePath: string;
      try {
        filePath = fileURLToPath(key);
      } catch (error) {
        logger?.debug('local_ref_skipped', { url: key, reason: errorMessage(error) });
        continue;
      }
      if (!safeExistsSync(filePath)) {
        logger?.debug('local_ref_missing', { url: key });
        continue;
      }

      let value: unknown;
      try {
        value = parseFile(filePath).value;
        compiler.addResource(key, value);
      } catch (error) {
        logger?.warn('local_ref_skipped', { url: key, reason: errorMessage(error) });
        continue;
      }

      logger?.debug('local_ref_registered', { url: key, path: filePath });
      registered.push(key);
      pending.push({ schema: value, base: key });
    }
  }

  return registered;
}

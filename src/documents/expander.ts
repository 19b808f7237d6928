/**
 * Expands document glob patterns into concrete file paths.
 *
 * @packageDocumentation
 */

import fg from 'fast-glob';
import type { Logger } from '../utils/logger.js';

/**
 * Options for {@link expandDocumentGlobs}.
 */
export interface ExpandOptions {
  /** Directory relative patterns are matched against. */
  readonly cwd: string;
  readonly logger?: Logger | undefined;
}

/**
 * Returns true when the string contains a glob metacharacter: `*`, `?` or `[`.
 *
 * @example
 * ```typescript
 * containsGlobChars('data/*.json'); // true
 * containsGlobChars('data/a.json'); // false
 * ```
 */
export function containsGlobChars(value: string): boolean {
  return value.includes('*') || value.includes('?') || value.includes('[');
}

/**
 * Expands document patterns in order.
 *
 * Literal paths are kept as given, whether or not they exist. Glob patterns
 * are replaced by the files they match, sorted; a pattern matching nothing
 * contributes nothing. Duplicates across patterns are kept.
 *
 * @param patterns - Literal paths and glob patterns.
 * @param options - Matching options.
 * @returns The expanded list.
 */
export function expandDocumentGlobs(patterns: readonly string[], options: ExpandOptions): string[] {
  const expanded: string[] = [];

  for (const pattern of patterns) {
    if (!containsGlobChars(pattern)) {
      expanded.push(pattern);
      continue;
    }

    const matches = fg
      .sync(pattern, { cwd: options.cwd, onlyFiles: true, dot: true, unique: true })
      .sort();

    if (matches.length === 0) {
      options.logger?.warn('glob_no_matches', { pattern, cwd: options.cwd });
    }
    expanded.push(...matches);
  }

  options.logger?.debug('documents_expanded', { patterns: [...patterns], count: expanded.length });

  return expanded;
}

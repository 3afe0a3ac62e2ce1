/**
 * @file cache.ts
 * @module shared/cache
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Layout of the page cache directory.
 */

import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { CACHE_FILE_EXTENSION } from '../config.js';

/**
 * Get the cache path of a symbol's page.
 * @param cacheDir - Cache directory
 * @param name - Symbol name (e.g., "std::vector")
 * @returns `<cacheDir>/<name>.html`
 */
export function getCachePath(cacheDir: string, name: string): string {
  return join(cacheDir, `${name}${CACHE_FILE_EXTENSION}`);
}

/**
 * List the symbol names that have a cached page.
 *
 * A missing cache directory is treated as empty.
 */
export function listCachedNames(cacheDir: string): Set<string> {
  if (!existsSync(cacheDir)) return new Set();

  const names = new Set<string>();
  for (const entry of readdirSync(cacheDir, { withFileTypes: true })) {
    if (entry.isFile() && entry.name.endsWith(CACHE_FILE_EXTENSION)) {
      names.add(entry.name.slice(0, -CACHE_FILE_EXTENSION.length));
    }
  }
  return names;
}

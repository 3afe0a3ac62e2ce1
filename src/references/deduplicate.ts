/**
 * @file deduplicate.ts
 * @module references/deduplicate
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Folds raw reference entries into a set keyed by symbol name.
 */

import { DuplicateConflictError } from '../shared/errors.js';
import type { RawReference, Reference, ReferenceSet } from './types.js';

/**
 * Deduplicate references by name.
 *
 * The first occurrence of a name wins. Later occurrences with the same URL
 * are folded; the first one with a different URL throws immediately.
 *
 * @param records - Entries in discovery order
 * @param verbose - Log folded duplicates
 * @returns References keyed by name
 * @throws DuplicateConflictError when a name maps to two URLs
 */
export function deduplicateReferences(records: Iterable<RawReference>, verbose: boolean = false): ReferenceSet {
  const unique = new Map<string, Reference>();

  for (const record of records) {
    const existing = unique.get(record.name);

    if (!existing) {
      unique.set(record.name, {
        name: record.name,
        url: record.url,
        source: { file: record.file, line: record.line },
      });
      continue;
    }

    if (existing.url !== record.url) {
      throw new DuplicateConflictError(
        record.name,
        { url: existing.url, location: existing.source },
        { url: record.url, location: { file: record.file, line: record.line } }
      );
    }

    if (verbose) {
      console.log(`Duplicate entry found but no conflict: ${record.name} (${record.file}:${record.line})`);
    }
  }

  return unique;
}

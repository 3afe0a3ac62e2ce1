/**
 * @file types.ts
 * @module references/types
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Type definitions for extracted symbol references.
 */

import type { SourceLocation } from '../shared/errors.js';

export type { SourceLocation };

/**
 * One reference entry as matched on a single Markdown line.
 */
export interface RawReference {
  /** Scoped symbol name without backticks or annotation (e.g., "std::vector") */
  name: string;
  /** Documentation page URL, verbatim from the link target */
  url: string;
  /** Markdown file the entry was found in */
  file: string;
  /** 1-based line number */
  line: number;
}

/**
 * A deduplicated reference to one documented symbol.
 */
export interface Reference {
  name: string;
  url: string;
  /** Where the name was first seen */
  source: SourceLocation;
}

/**
 * Unique references keyed by symbol name.
 *
 * Its keys are the complete set of pages the cache must hold.
 */
export type ReferenceSet = ReadonlyMap<string, Reference>;

/**
 * @file required.ts
 * @module references/required
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Shared scan → extract → deduplicate stage of both pipelines.
 */

import { DEFAULT_CONTENTS_DIR } from '../config.js';
import { deduplicateReferences } from './deduplicate.js';
import { findMarkdownFiles } from './markdown-scanner.js';
import { ReferenceExtractor, type ReferenceExtractorOptions } from './ReferenceExtractor.js';
import type { ReferenceSet } from './types.js';

/**
 * Options for collecting the required references.
 */
export interface RequiredReferencesOptions extends ReferenceExtractorOptions {
  /** Root of the Markdown corpus (default: ./contents) */
  contentsDir?: string;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Collect every reference cited by the Markdown corpus.
 *
 * @param options - Corpus location and pattern overrides
 * @returns The deduplicated reference set
 */
export function getRequiredReferences(options: RequiredReferencesOptions = {}): ReferenceSet {
  const contentsDir = options.contentsDir ?? DEFAULT_CONTENTS_DIR;
  const files = findMarkdownFiles(contentsDir);

  if (options.verbose) {
    console.log(`Scanning ${files.length} markdown file(s) in ${contentsDir}`);
  }

  const extractor = new ReferenceExtractor(options);
  const records = extractor.extractFromFiles(files);

  return deduplicateReferences(records, options.verbose ?? false);
}

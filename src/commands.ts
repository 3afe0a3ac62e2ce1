/**
 * @file commands.ts
 * @module commands
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Implementations of the fetch, print and list commands.
 */

import { resolve } from 'node:path';
import { DEFAULT_CONTENTS_DIR } from './config.js';
import { ReferenceDownloader, type DownloadStats, type ReferenceDownloaderOptions } from './fetch/ReferenceDownloader.js';
import { PrintAssembler, type PrintAssemblerOptions } from './print/PrintAssembler.js';
import { sortSymbolNames } from './references/compare.js';
import { getRequiredReferences, type RequiredReferencesOptions } from './references/required.js';
import type { Reference } from './references/types.js';
import { NoReferencesError } from './shared/errors.js';

/**
 * Options for the fetch command.
 */
export type FetchCommandOptions = RequiredReferencesOptions & ReferenceDownloaderOptions;

/**
 * Options for the print command.
 */
export type PrintCommandOptions = RequiredReferencesOptions & PrintAssemblerOptions;

/**
 * Download every page cited by the corpus that is not cached yet.
 *
 * @param options - Corpus, cache and network options
 * @returns Download statistics
 */
export async function runFetch(options: FetchCommandOptions): Promise<DownloadStats> {
  console.log('Starting C++ reference downloader');

  const references = getRequiredReferences(options);
  console.log(`Found ${references.size} unique references`);

  const downloader = new ReferenceDownloader(options);
  const stats = await downloader.download(references);

  console.log(`Download completed: ${stats.downloaded} downloaded, ${stats.skipped} already cached`);
  return stats;
}

/**
 * Concatenate the cached pages into the print file.
 *
 * @param options - Corpus, cache and output options
 * @returns Path of the written file
 * @throws NoReferencesError when the corpus cites nothing
 * @throws MissingCachedPagesError when pages still have to be fetched
 */
export function runPrint(options: PrintCommandOptions): string {
  console.log('Starting reference printer');

  const references = getRequiredReferences(options);
  if (references.size === 0) {
    throw new NoReferencesError(resolve(options.contentsDir ?? DEFAULT_CONTENTS_DIR));
  }
  console.log(`Found ${references.size} required references`);

  return new PrintAssembler(options).print(references);
}

/**
 * Collect the references cited by the corpus in canonical order.
 *
 * @param options - Corpus options
 * @returns Sorted references
 */
export function listReferences(options: RequiredReferencesOptions): Reference[] {
  const references = getRequiredReferences(options);
  const sorted: Reference[] = [];
  for (const name of sortSymbolNames(references.keys())) {
    const reference = references.get(name);
    if (reference) sorted.push(reference);
  }
  return sorted;
}

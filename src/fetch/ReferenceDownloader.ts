/**
 * @file ReferenceDownloader.ts
 * @module fetch/ReferenceDownloader
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Fills the page cache with sanitized reference pages.
 */

import { existsSync, mkdirSync, renameSync, writeFileSync } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import {
  CACHE_FILE_EXTENSION,
  DEFAULT_CACHE_DIR,
  DEFAULT_REQUEST_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from '../config.js';
import { removeNavigationElements } from '../html/PageSanitizer.js';
import { getCachePath } from '../shared/cache.js';
import { sortSymbolNames } from '../references/compare.js';
import type { ReferenceSet } from '../references/types.js';
import { fetchPage, type PageFetchFn } from './PageFetcher.js';

/**
 * Statistics for a download run.
 */
export interface DownloadStats {
  /** Number of references considered */
  total: number;
  /** Pages fetched and written */
  downloaded: number;
  /** Pages left alone because they were already cached */
  skipped: number;
}

/**
 * Options for ReferenceDownloader.
 */
export interface ReferenceDownloaderOptions {
  /** Cache directory (default: ./cppreference) */
  cacheDir?: string;
  /** Re-fetch pages that are already cached */
  overwrite?: boolean;
  /** Pause between two requests in milliseconds (default: 500) */
  delayMs?: number;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** User-Agent header for requests */
  userAgent?: string;
  /** Enable verbose logging */
  verbose?: boolean;
  /** Page fetcher (default: HTTP GET via fetch) */
  fetchPage?: PageFetchFn;
}

/**
 * Downloads the reference pages that are missing from the cache.
 *
 * Requests run one at a time with a fixed pause between them. The first
 * failing request aborts the run; pages written before it stay cached, so
 * running again picks up where it stopped.
 *
 * @example
 * ```typescript
 * const downloader = new ReferenceDownloader({ cacheDir: './cppreference' });
 * await downloader.download(getRequiredReferences());
 * console.log(downloader.getStats());
 * // { total: 42, downloaded: 3, skipped: 39 }
 * ```
 */
export class ReferenceDownloader {
  private cacheDir: string;
  private overwrite: boolean;
  private delayMs: number;
  private timeoutMs: number;
  private userAgent: string;
  private verbose: boolean;
  private fetchPage: PageFetchFn;
  private stats: DownloadStats = {
    total: 0,
    downloaded: 0,
    skipped: 0,
  };

  /**
   * Create a new ReferenceDownloader.
   * @param options - Optional configuration
   */
  constructor(options?: ReferenceDownloaderOptions) {
    this.cacheDir = options?.cacheDir ?? DEFAULT_CACHE_DIR;
    this.overwrite = options?.overwrite ?? false;
    this.delayMs = options?.delayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
    this.verbose = options?.verbose ?? false;
    this.fetchPage = options?.fetchPage ?? fetchPage;
  }

  /**
   * Make sure every reference has a cached page.
   *
   * @param references - Required references
   * @returns Statistics for this run
   * @throws FetchError when a request fails; filesystem errors propagate as is
   */
  async download(references: ReferenceSet): Promise<DownloadStats> {
    this.resetStats();
    this.stats.total = references.size;

    if (!existsSync(this.cacheDir)) {
      console.log(`Creating cache directory: ${this.cacheDir}`);
      mkdirSync(this.cacheDir, { recursive: true });
    }

    let requested = false;

    for (const name of sortSymbolNames(references.keys())) {
      const reference = references.get(name);
      if (!reference) continue;

      const outputPath = getCachePath(this.cacheDir, name);

      if (existsSync(outputPath) && !this.overwrite) {
        this.stats.skipped++;
        if (this.verbose) {
          console.log(`File already exists: ${name}${CACHE_FILE_EXTENSION}, skipping download`);
        }
        continue;
      }

      if (requested && this.delayMs > 0) {
        await sleep(this.delayMs);
      }
      requested = true;

      console.log(`Downloading ${name} from ${reference.url}`);
      const content = await this.fetchPage(reference.url, {
        userAgent: this.userAgent,
        timeoutMs: this.timeoutMs,
      });

      this.writeAtomically(outputPath, removeNavigationElements(content, name));
      this.stats.downloaded++;

      if (this.verbose) {
        console.log(`Saved ${name} to ${outputPath}`);
      }
    }

    return this.getStats();
  }

  /**
   * Get download statistics.
   * @returns A copy of the statistics of the last run
   */
  getStats(): DownloadStats {
    return { ...this.stats };
  }

  /**
   * Reset statistics.
   */
  resetStats(): void {
    this.stats = {
      total: 0,
      downloaded: 0,
      skipped: 0,
    };
  }

  private writeAtomically(filePath: string, content: string): void {
    const tempPath = `${filePath}.${process.pid}.tmp`;
    writeFileSync(tempPath, content, 'utf-8');
    renameSync(tempPath, filePath);
  }
}

/**
 * @file ReferenceExtractor.ts
 * @module references/ReferenceExtractor
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Extracts symbol references from Markdown reference tables.
 */

import { readFileSync } from 'node:fs';
import { DEFAULT_NAMESPACE, DEFAULT_URL_PREFIX } from '../config.js';
import { InvalidEntryError, InvalidUrlError, MissingUrlError } from '../shared/errors.js';
import type { RawReference } from './types.js';

/**
 * Options for ReferenceExtractor.
 */
export interface ReferenceExtractorOptions {
  /** Namespace every symbol name starts with (default: "std") */
  namespace?: string;
  /** Prefix every documentation URL starts with */
  urlPrefix?: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Scans Markdown files line by line for reference-table entries.
 *
 * An entry is a table row with a cell of the form
 * ``[`std::name` (annotation)](https://en.cppreference.com/w/cpp/...)``.
 * The annotation is optional and may also follow the link. Only the first
 * entry on a line is taken.
 *
 * Lines that look like an entry but are malformed throw instead of being
 * skipped, since a silently dropped reference only surfaces later as a
 * missing page.
 *
 * @example
 * ```typescript
 * const extractor = new ReferenceExtractor();
 * const refs = extractor.extractFromContent(
 *   '| Sorting | [`std::sort`](https://en.cppreference.com/w/cpp/algorithm/sort) |',
 *   'algorithms.md'
 * );
 * // [{ name: 'std::sort', url: 'https://en.cppreference.com/w/cpp/algorithm/sort', file: 'algorithms.md', line: 1 }]
 * ```
 */
export class ReferenceExtractor {
  private urlPrefix: string;
  private namePattern: RegExp;
  private linkPattern: RegExp;
  private entryPattern: RegExp;

  /**
   * Create a new ReferenceExtractor.
   * @param options - Optional namespace and URL prefix overrides
   */
  constructor(options?: ReferenceExtractorOptions) {
    const namespace = escapeRegExp(options?.namespace ?? DEFAULT_NAMESPACE);
    this.urlPrefix = options?.urlPrefix ?? DEFAULT_URL_PREFIX;

    const name = `\\[\`(${namespace}::[^\`]+)\`\\s*(?:\\([^)]*\\))?\\]`;
    const annotation = '(?:\\s*\\([^)]*\\))?';
    // Link targets may carry balanced parentheses, e.g. `.../operator()`
    const target = '(?:[^()\\s]|\\([^()\\s]*\\))';

    this.namePattern = new RegExp(name);
    this.linkPattern = new RegExp(`${name}\\((${target}*)\\)`);
    this.entryPattern = new RegExp(
      `\\|\\s*[^|]+\\|\\s*${name}\\((${escapeRegExp(this.urlPrefix)}${target}+)\\)${annotation}\\s*\\|`
    );
  }

  /**
   * Extract references from a list of Markdown files, in file order.
   * @param files - Paths of Markdown files
   * @returns All matched entries, duplicates included
   */
  extractFromFiles(files: string[]): RawReference[] {
    const references: RawReference[] = [];
    for (const file of files) {
      const content = readFileSync(file, 'utf-8');
      references.push(...this.extractFromContent(content, file));
    }
    return references;
  }

  /**
   * Extract references from Markdown content.
   * @param content - Markdown text
   * @param file - File name used in records and error locations
   * @returns Matched entries in line order
   */
  extractFromContent(content: string, file: string): RawReference[] {
    const references: RawReference[] = [];
    const lines = content.split(/\r?\n/);

    lines.forEach((text, index) => {
      const reference = this.extractFromLine(text, { file, line: index + 1 });
      if (reference) {
        references.push(reference);
      }
    });

    return references;
  }

  private extractFromLine(text: string, location: { file: string; line: number }): RawReference | undefined {
    const entry = this.entryPattern.exec(text);
    if (entry) {
      return { name: entry[1].trim(), url: entry[2], ...location };
    }

    if (this.namePattern.test(text)) {
      const link = this.linkPattern.exec(text);
      if (!link || link[2] === '') {
        throw new MissingUrlError(location);
      }
      if (!link[2].startsWith(this.urlPrefix)) {
        throw new InvalidUrlError(location, link[2]);
      }
      throw new InvalidEntryError(location);
    }

    // A table row pointing at the documentation site without a usable name
    if (text.trimStart().startsWith('|') && text.includes(this.urlPrefix)) {
      throw new InvalidEntryError(location);
    }

    return undefined;
  }
}

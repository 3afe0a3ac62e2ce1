/**
 * @file PrintAssembler.ts
 * @module print/PrintAssembler
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Merges cached reference pages into one printable document.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import * as cheerio from 'cheerio';
import {
  CODE_BLOCK_CLASS,
  DEFAULT_CACHE_DIR,
  DEFAULT_OUTPUT_DIR,
  PRINT_COLORED_FILE_NAME,
  PRINT_FILE_NAME,
} from '../config.js';
import { flattenLoadedCodeBlocks } from '../html/flatten.js';
import { sortSymbolNames } from '../references/compare.js';
import type { ReferenceSet } from '../references/types.js';
import { getCachePath, listCachedNames } from '../shared/cache.js';
import { HtmlParsingError, MissingCachedPagesError, NoReferencesError } from '../shared/errors.js';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

function isCopied(node: { nodeType: number }): boolean {
  return node.nodeType === ELEMENT_NODE || node.nodeType === TEXT_NODE;
}

/**
 * Options for PrintAssembler.
 */
export interface PrintAssemblerOptions {
  /** Cache directory (default: ./cppreference) */
  cacheDir?: string;
  /** Directory receiving the print file (default: current directory) */
  outputDir?: string;
  /** Keep syntax highlighting instead of flattening code blocks */
  colored?: boolean;
  /** Class of highlighted code blocks (default: "de1") */
  codeBlockClass?: string;
  /** Enable verbose logging */
  verbose?: boolean;
}

/**
 * Assembles all required cached pages into a single HTML document.
 *
 * The first page (in canonical name order) is the root document. The body
 * of every following page is deep-copied into a fresh `<div>` appended to
 * the root body. Cached pages that are not required are ignored.
 *
 * @example
 * ```typescript
 * const assembler = new PrintAssembler({ colored: false });
 * const outputPath = assembler.print(getRequiredReferences());
 * // ./cppreference_print.html
 * ```
 */
export class PrintAssembler {
  private cacheDir: string;
  private outputDir: string;
  private colored: boolean;
  private codeBlockClass: string;
  private verbose: boolean;

  /**
   * Create a new PrintAssembler.
   * @param options - Optional configuration
   */
  constructor(options?: PrintAssemblerOptions) {
    this.cacheDir = options?.cacheDir ?? DEFAULT_CACHE_DIR;
    this.outputDir = options?.outputDir ?? DEFAULT_OUTPUT_DIR;
    this.colored = options?.colored ?? false;
    this.codeBlockClass = options?.codeBlockClass ?? CODE_BLOCK_CLASS;
    this.verbose = options?.verbose ?? false;
  }

  /**
   * Path of the print file for the configured mode.
   */
  getOutputPath(): string {
    return join(this.outputDir, this.colored ? PRINT_COLORED_FILE_NAME : PRINT_FILE_NAME);
  }

  /**
   * List the required names that have no cached page.
   * @param references - Required references
   * @returns Missing names in canonical order
   */
  checkCache(references: ReferenceSet): string[] {
    const cached = listCachedNames(this.cacheDir);
    return sortSymbolNames([...references.keys()].filter(name => !cached.has(name)));
  }

  /**
   * Build the merged document.
   *
   * @param references - Required references
   * @returns Serialized HTML
   * @throws NoReferencesError when there is nothing to print
   * @throws MissingCachedPagesError listing every page that still has to be fetched
   */
  assemble(references: ReferenceSet): string {
    if (references.size === 0) {
      throw new NoReferencesError();
    }

    const missing = this.checkCache(references);
    if (missing.length > 0) {
      throw new MissingCachedPagesError(missing);
    }

    const [first, ...rest] = sortSymbolNames(references.keys());

    const $ = cheerio.load(this.readPage(first));
    const body = $('body');
    if (body.length === 0) {
      throw new HtmlParsingError(getCachePath(this.cacheDir, first), 'Could not find body element');
    }

    for (const name of rest) {
      const $page = cheerio.load(this.readPage(name));
      const pageBody = $page('body').get(0);
      const wrapper = $('<div></div>');

      for (const child of pageBody?.children ?? []) {
        if (!isCopied(child)) continue;
        const copy = $page(child).clone();
        // Only elements and text survive, at every depth
        copy.find('*').addBack().contents().filter((_, node) => !isCopied(node)).remove();
        wrapper.append(copy);
      }

      body.append(wrapper);

      if (this.verbose) {
        console.log(`Appended ${name}`);
      }
    }

    if (!this.colored) {
      const flattened = flattenLoadedCodeBlocks($, this.codeBlockClass);
      if (this.verbose) {
        console.log(`Flattened ${flattened} code block(s)`);
      }
    }

    return $.html();
  }

  /**
   * Assemble the document and write it to the print file.
   * @param references - Required references
   * @returns Path of the written file
   */
  print(references: ReferenceSet): string {
    const html = this.assemble(references);
    const outputPath = this.getOutputPath();

    mkdirSync(this.outputDir, { recursive: true });
    writeFileSync(outputPath, html, 'utf-8');
    console.log(`Saved ${references.size} concatenated reference(s) to ${outputPath}`);

    return outputPath;
  }

  private readPage(name: string): string {
    return readFileSync(getCachePath(this.cacheDir, name), 'utf-8');
  }
}

/**
 * @file flatten.ts
 * @module html/flatten
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Collapses syntax-highlighted code blocks to plain text.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { CODE_BLOCK_CLASS } from '../config.js';

/**
 * Replace the children of every `pre.<codeBlockClass>` in a loaded document
 * with a single text node holding their concatenated text.
 *
 * @returns Number of blocks flattened
 */
export function flattenLoadedCodeBlocks($: CheerioAPI, codeBlockClass: string = CODE_BLOCK_CLASS): number {
  const blocks = $(`pre.${codeBlockClass}`);

  blocks.each((_, element) => {
    const pre = $(element);
    pre.text(pre.text());
  });

  return blocks.length;
}

/**
 * Strip highlighting markup from code blocks for monochrome printing.
 *
 * @example
 * ```typescript
 * flattenCodeBlocks('<pre class="de1"><span class="kw1">int</span> x;</pre>');
 * // ...<pre class="de1">int x;</pre>...
 * ```
 *
 * @param html - Document markup
 * @param codeBlockClass - Class marking highlighted blocks (default: "de1")
 * @returns The re-serialized document
 */
export function flattenCodeBlocks(html: string, codeBlockClass: string = CODE_BLOCK_CLASS): string {
  const $ = cheerio.load(html);
  flattenLoadedCodeBlocks($, codeBlockClass);
  return $.html();
}

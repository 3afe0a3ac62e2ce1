/**
 * @file PageSanitizer.ts
 * @module html/PageSanitizer
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Strips site navigation chrome from fetched reference pages.
 */

import * as cheerio from 'cheerio';
import { MASTHEAD_SELECTOR, NAVBAR_SELECTOR } from '../config.js';

/**
 * Remove the navigation bar and the page masthead from a reference page.
 *
 * Both regions must appear exactly once. Otherwise a warning is logged and
 * the input is returned unchanged, since a page with its navigation intact
 * is still printable.
 *
 * @param html - Raw page markup
 * @param label - Page name used in the warning
 * @returns Sanitized markup, or `html` itself when a region count is off
 */
export function removeNavigationElements(html: string, label: string): string {
  const $ = cheerio.load(html);
  const navbar = $(NAVBAR_SELECTOR);
  const masthead = $(MASTHEAD_SELECTOR);

  if (navbar.length !== 1 || masthead.length !== 1) {
    console.warn(
      `Unexpected element count for ${label}: t-navbar=${navbar.length}, mw-head=${masthead.length}. ` +
        'Skipping element removal.'
    );
    return html;
  }

  navbar.remove();
  masthead.remove();

  return $.html();
}

/**
 * @file config.ts
 * @module config
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Default locations, network settings and page selectors.
 */

/** Directory scanned for Markdown files */
export const DEFAULT_CONTENTS_DIR = './contents';

/** Directory holding one sanitized page per symbol */
export const DEFAULT_CACHE_DIR = './cppreference';

/** Directory receiving the assembled print documents */
export const DEFAULT_OUTPUT_DIR = '.';

/** Output file for flattened (monochrome) printing */
export const PRINT_FILE_NAME = 'cppreference_print.html';

/** Output file for colored printing */
export const PRINT_COLORED_FILE_NAME = 'cppreference_print_colored.html';

/** Pause between two consecutive page requests */
export const DEFAULT_REQUEST_DELAY_MS = 500;

/** Per-request timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

/** Namespace every extracted symbol name starts with */
export const DEFAULT_NAMESPACE = 'std';

/** Scope separator inside symbol names */
export const SCOPE_SEPARATOR = '::';

/** Every reference URL must start with this prefix */
export const DEFAULT_URL_PREFIX = 'https://en.cppreference.com/w/cpp/';

/** Site navigation bar removed from fetched pages */
export const NAVBAR_SELECTOR = '.t-navbar';

/** Page masthead removed from fetched pages */
export const MASTHEAD_SELECTOR = '#mw-head';

/** Class of syntax-highlighted `pre` blocks */
export const CODE_BLOCK_CLASS = 'de1';

/** File extension of cached pages */
export const CACHE_FILE_EXTENSION = '.html';

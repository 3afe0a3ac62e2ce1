/**
 * @file errors.ts
 * @module shared/errors
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview Error types raised by the reference, fetch and print pipelines.
 */

import { CACHE_FILE_EXTENSION } from '../config.js';

/**
 * Location of a line inside a Markdown source file.
 */
export interface SourceLocation {
  /** Path of the Markdown file */
  file: string;
  /** 1-based line number */
  line: number;
}

/**
 * Base class for all refbook errors.
 *
 * `code` is stable across releases and meant for programmatic checks;
 * `message` is meant for the operator.
 */
export class RefbookError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

/**
 * A reference name was found but no link target follows it.
 */
export class MissingUrlError extends RefbookError {
  readonly location: SourceLocation;

  constructor(location: SourceLocation) {
    super(`Missing URL in ${location.file}:${location.line}`, 'MISSING_URL');
    this.location = location;
  }
}

/**
 * A reference links somewhere other than the documentation site.
 */
export class InvalidUrlError extends RefbookError {
  readonly location: SourceLocation;
  readonly url: string;

  constructor(location: SourceLocation, url: string) {
    super(`Invalid URL in ${location.file}:${location.line}: ${url}`, 'INVALID_URL');
    this.location = location;
    this.url = url;
  }
}

/**
 * A line looks like a reference entry but does not have the table-row shape.
 */
export class InvalidEntryError extends RefbookError {
  readonly location: SourceLocation;

  constructor(location: SourceLocation) {
    super(`Invalid file format in ${location.file}:${location.line}`, 'INVALID_ENTRY');
    this.location = location;
  }
}

/**
 * The same symbol name was linked to two different URLs.
 */
export class DuplicateConflictError extends RefbookError {
  readonly symbol: string;
  readonly firstUrl: string;
  readonly secondUrl: string;
  readonly firstLocation: SourceLocation;
  readonly secondLocation: SourceLocation;

  constructor(
    symbol: string,
    first: { url: string; location: SourceLocation },
    second: { url: string; location: SourceLocation }
  ) {
    super(
      `Duplicate entry with conflicting information: ${symbol} at ${first.url} ` +
        `(${first.location.file}:${first.location.line}) and ${second.url} ` +
        `(${second.location.file}:${second.location.line})`,
      'DUPLICATE_CONFLICT'
    );
    this.symbol = symbol;
    this.firstUrl = first.url;
    this.secondUrl = second.url;
    this.firstLocation = first.location;
    this.secondLocation = second.location;
  }
}

/**
 * A page request failed at the transport level or returned a non-2xx status.
 */
export class FetchError extends RefbookError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, reason: string, options?: { status?: number; cause?: unknown }) {
    super(`Failed to fetch ${url}: ${reason}`, 'FETCH_FAILED', { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * Printing was requested before every required page was fetched.
 */
export class MissingCachedPagesError extends RefbookError {
  readonly missing: string[];

  constructor(missing: string[]) {
    const files = missing.map(name => `${name}${CACHE_FILE_EXTENSION}`).join(', ');
    super(
      `Missing ${missing.length} required HTML file(s): ${files}. Run "refbook fetch" first.`,
      'MISSING_CACHED_PAGES'
    );
    this.missing = [...missing];
  }
}

/**
 * The Markdown corpus contains no references at all.
 */
export class NoReferencesError extends RefbookError {
  readonly contentsDir?: string;

  constructor(contentsDir?: string) {
    super(contentsDir ? `No references found in ${contentsDir}` : 'No references to print', 'NO_REFERENCES');
    this.contentsDir = contentsDir;
  }
}

/**
 * A cached page could not be used as part of the assembled document.
 */
export class HtmlParsingError extends RefbookError {
  readonly file: string;

  constructor(file: string, reason: string) {
    super(`HTML parsing error in ${file}: ${reason}`, 'HTML_PARSING');
    this.file = file;
  }
}

/**
 * @file PageFetcher.ts
 * @module fetch/PageFetcher
 * @created 2026-10-19
 * @license MIT
 *
 * @fileoverview HTTP GET of a single reference page.
 */

import { DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_USER_AGENT } from '../config.js';
import { FetchError } from '../shared/errors.js';

/**
 * Options for a page request.
 */
export interface FetchPageOptions {
  /** User-Agent header sent with the request */
  userAgent?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Signature of a page fetcher, so the download loop can be driven without a network.
 */
export type PageFetchFn = (url: string, options: FetchPageOptions) => Promise<string>;

/**
 * Fetch a page and return its body as text.
 *
 * @param url - Absolute page URL
 * @param options - User agent and timeout
 * @returns Response body
 * @throws FetchError on transport failure, timeout or a non-2xx status
 */
export const fetchPage: PageFetchFn = async (url, options) => {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FetchError(url, reason, { cause: error });
  }

  if (!response.ok) {
    throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  try {
    return await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FetchError(url, reason, { cause: error });
  }
};

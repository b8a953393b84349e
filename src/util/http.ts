/**
 * HTTP Utility Module
 *
 * Provides HTTP client functionality with support for:
 * - ETag and Last-Modified headers for conditional requests
 * - Custom headers (e.g., If-None-Match for conditional GET)
 * - A hard per-request timeout
 */

import axios from 'axios';
import { FetchError, toError } from '../errors/index.js';
import { FETCH } from '../core/constants.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure for text pages
 */
export interface HttpResponse {
  status: number; // HTTP status code
  data: string; // Response body as text
  etag?: string; // ETag header value (for conditional requests)
  lastModified?: string; // Last-Modified header value (for conditional requests)
}

/**
 * Signature of the low-level GET used by the conditional fetcher
 */
export type HttpGetter = (url: string, headers: Record<string, string>) => Promise<HttpResponse>;

/**
 * Reads a single string header from an axios header bag
 */
function header(headers: Record<string, unknown>, name: string): string | undefined {
  const value = headers[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Performs an HTTP GET request for a text page
 *
 * This function:
 * - Accepts custom headers (e.g., If-None-Match for conditional requests)
 * - Follows redirects
 * - Extracts ETag and Last-Modified headers for future conditional requests
 * - Never throws on HTTP status (validateStatus: () => true); the caller decides
 * - Throws FetchError (status 0) on network errors and timeouts
 *
 * @example
 * // Conditional request with ETag
 * const res = await httpGet('https://club.example.org/schedule', {
 *   'If-None-Match': 'previous-etag-value'
 * });
 * // Returns 304 if unchanged, 200 with new body if changed
 */
export const httpGet: HttpGetter = async (url, headers) => {
  try {
    const res = await axios.get<string>(url, {
      headers,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      timeout: FETCH.TIMEOUT_MS,
      signal: AbortSignal.timeout(FETCH.TIMEOUT_MS),
      validateStatus: () => true
    });

    // Log errors for non-2xx/304 responses
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    const responseHeaders: Record<string, unknown> = { ...res.headers };
    return {
      status: res.status,
      data: typeof res.data === 'string' ? res.data : '',
      etag: header(responseHeaders, 'etag'),
      lastModified: header(responseHeaders, 'last-modified')
    };
  } catch (err) {
    const error = toError(err);
    throw new FetchError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
};

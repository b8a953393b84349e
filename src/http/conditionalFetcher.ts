/**
 * Conditional Fetcher
 *
 * Retrieves pages with If-None-Match / If-Modified-Since headers and reuses the
 * last body when the server answers 304 Not Modified.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { FetchError } from '../errors/index.js';
import { httpGet, type HttpGetter } from '../util/http.js';

/**
 * Cache validators remembered for one URL
 */
interface Validators {
  etag?: string;
  lastModified?: string;
}

export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export class ConditionalFetcher implements PageFetcher {
  private readonly validators = new Map<string, Validators>();
  private readonly bodies = new Map<string, string>();

  constructor(
    private readonly get: HttpGetter = httpGet,
    private readonly userAgent: string = cfg.site.userAgent
  ) {}

  /**
   * Fetches a page as text
   *
   * Single attempt, no retries.
   *
   * @throws FetchError on network error, timeout, or a status other than 2xx/304
   */
  async fetch(url: string): Promise<string> {
    const headers: Record<string, string> = { 'User-Agent': this.userAgent };
    const known = this.validators.get(url);
    if (known?.etag) headers['If-None-Match'] = known.etag;
    if (known?.lastModified) headers['If-Modified-Since'] = known.lastModified;

    const res = await this.get(url, headers);

    if (res.status === 304) {
      const cached = this.bodies.get(url);
      if (cached !== undefined) {
        logger.debug({ url }, 'not modified');
        return cached;
      }
      throw new FetchError(`Not modified but no cached body for ${url}`, url, 304);
    }

    if (res.status < 200 || res.status >= 300) {
      throw new FetchError(`Unexpected status ${res.status} for ${url}`, url, res.status);
    }

    const next: Validators = { ...known };
    if (res.etag) next.etag = res.etag;
    if (res.lastModified) next.lastModified = res.lastModified;
    this.validators.set(url, next);
    this.bodies.set(url, res.data);

    return res.data;
  }
}

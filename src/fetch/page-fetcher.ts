/**
 * Page fetcher: download a URL and reduce it to readable text.
 */

import type { FetchConfig } from '../config/pipeline-config.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { truncateText } from '../utils/text.js';
import { extractMainText, extractTitle } from './html-text.js';

const log = createLogger('page-fetcher');

export const CONTENT_TRUNCATED_SUFFIX = '... [Content truncated]';

export interface FetchedPage {
  url: string;
  title: string;
  content: string;
  contentType: string;
  /** False for pages that downloaded but carry no usable text (e.g. non-HTML). */
  success: boolean;
}

export interface PageFetcher {
  /** Resolves to null when the page could not be downloaded. */
  fetch(url: string): Promise<FetchedPage | null>;
}

export interface HttpPageFetcherOptions extends FetchConfig {
  /** Injected fetch implementation. Default: global fetch. */
  fetchFn?: typeof fetch;
  /** Shared limiter; by default one is built from `minIntervalMs`. */
  rateLimiter?: RateLimiter;
}

/**
 * Validate that a URL has a scheme and a host.
 *
 * @throws FetchError with code INVALID_URL.
 */
export function parsePageUrl(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new FetchError(`Invalid URL format: ${url}`, 'INVALID_URL', error);
  }
  if (!parsed.protocol || !parsed.host) {
    throw new FetchError(`Invalid URL format: ${url}`, 'INVALID_URL');
  }
  return parsed;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly fetchFn: typeof fetch;
  private readonly rateLimiter: RateLimiter;

  constructor(private readonly options: HttpPageFetcherOptions) {
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(options.minIntervalMs);
  }

  async fetch(url: string): Promise<FetchedPage | null> {
    try {
      return await this.download(url);
    } catch (error) {
      log.warn(`Failed to fetch ${url}`, { error: errorMessage(error) });
      return null;
    }
  }

  private async download(url: string): Promise<FetchedPage> {
    parsePageUrl(url);
    await this.rateLimiter.wait();

    log.debug(`Fetching ${url}`);
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml',
          'Accept-Language': 'en-US,en;q=0.9',
        },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new FetchError(`Request to ${url} failed`, 'REQUEST_FAILED', error);
    }

    if (!response.ok) {
      throw new FetchError(`Request to ${url} returned HTTP ${response.status}`, 'HTTP_STATUS');
    }

    const contentType = (response.headers.get('content-type') ?? '').toLowerCase();
    if (!contentType.includes('text/html')) {
      log.info(`Skipping non-HTML content (${contentType || 'unknown'}) at ${url}`);
      return {
        url,
        title: url.split('/').pop() || url,
        content: `[Non-HTML content: ${contentType}]`,
        contentType,
        success: false,
      };
    }

    const html = await response.text();
    const text = extractMainText(html);

    return {
      url,
      title: extractTitle(html, url),
      content: text
        ? truncateText(text, this.options.maxContentLength, CONTENT_TRUNCATED_SUFFIX)
        : '[No content extracted]',
      contentType,
      success: true,
    };
  }
}

/**
 * Web search through a SearXNG instance's JSON API.
 */

import type { SearchConfig } from '../config/pipeline-config.js';
import { RetrievalError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { WebSearchEngine, WebSearchHit } from './web-backend.js';

const log = createLogger('searxng');

/** SearXNG rejects or slows down on larger pages. */
export const MAX_SEARCH_RESULTS = 25;

const CATEGORIES = ['general', 'news', 'images', 'videos', 'files', 'science', 'it', 'social media'];

/**
 * Map a search type to a SearXNG category; unknown types search `general`.
 */
export function mapSearchType(searchType: string): string {
  const normalized = searchType.toLowerCase();
  return CATEGORIES.includes(normalized) ? normalized : 'general';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert a SearXNG response body into hits, skipping entries with no url or title.
 */
export function parseSearxngResults(body: unknown): WebSearchHit[] {
  if (!isRecord(body) || !Array.isArray(body.results)) {
    return [];
  }

  const hits: WebSearchHit[] = [];
  for (const result of body.results) {
    if (!isRecord(result)) continue;
    const { url, title, content, engine, score } = result;
    if (typeof url !== 'string' || !url || typeof title !== 'string' || !title) continue;

    hits.push({
      title,
      url,
      snippet: typeof content === 'string' ? content : '',
      engine: typeof engine === 'string' ? engine : 'web',
      ...(typeof score === 'number' ? { score } : {}),
    });
  }
  return hits;
}

export interface SearxngOptions extends SearchConfig {
  userAgent?: string;
  /** Injected fetch implementation. Default: global fetch. */
  fetchFn?: typeof fetch;
}

export class SearxngSearchEngine implements WebSearchEngine {
  private readonly searchUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: SearxngOptions) {
    this.searchUrl = `${options.searxngUrl.replace(/\/+$/, '')}/search`;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  /** Request URL for a query, exposed for logging and tests. */
  buildUrl(query: string, limit: number): string {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      categories: mapSearchType(this.options.searchType),
      results: String(Math.min(limit, MAX_SEARCH_RESULTS)),
      language: 'en',
    });
    return `${this.searchUrl}?${params.toString()}`;
  }

  async search(query: string, limit: number): Promise<WebSearchHit[]> {
    try {
      const hits = await this.request(query, limit);
      log.info(`Retrieved ${hits.length} results for "${query}"`);
      return hits;
    } catch (error) {
      log.error('SearXNG search failed', { query, error: errorMessage(error) });
      return [];
    }
  }

  private async request(query: string, limit: number): Promise<WebSearchHit[]> {
    const response = await this.fetchFn(this.buildUrl(query, limit), {
      headers: {
        Accept: 'application/json',
        'User-Agent': this.options.userAgent ?? 'Quarry/0.1',
      },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new RetrievalError(`SearXNG returned HTTP ${response.status}`, 'SEARCH_FAILED');
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RetrievalError('SearXNG response is not JSON', 'BAD_RESPONSE', error);
    }

    return parseSearxngResults(body).slice(0, Math.min(limit, MAX_SEARCH_RESULTS));
  }
}

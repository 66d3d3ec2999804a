/**
 * Fetches a batch of URLs through the shared worker pool.
 */

import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { FetchedPage, PageFetcher } from './page-fetcher.js';
import { WorkerPool } from './worker-pool.js';

const log = createLogger('page-fetch-pool');

export interface PageFetchFailure {
  url: string;
  reason: string;
}

export interface PageFetchBatch {
  /** Successfully fetched pages, in URL input order. */
  pages: FetchedPage[];
  failures: PageFetchFailure[];
}

export interface FetchAllOptions {
  /** Fetch concurrently through the pool. Default: true. */
  parallel?: boolean;
}

type Attempt = { ok: true; page: FetchedPage } | { ok: false; failure: PageFetchFailure };

export class PageFetchPool {
  constructor(
    readonly fetcher: PageFetcher,
    readonly pool: WorkerPool = new WorkerPool(),
  ) {}

  async fetchAll(urls: readonly string[], options: FetchAllOptions = {}): Promise<PageFetchBatch> {
    const { parallel = true } = options;

    let attempts: Attempt[];
    if (parallel && urls.length > 1) {
      attempts = await this.pool.map(urls, (url) => this.attempt(url));
    } else {
      attempts = [];
      for (const url of urls) {
        attempts.push(await this.attempt(url));
      }
    }

    const batch: PageFetchBatch = { pages: [], failures: [] };
    for (const attempt of attempts) {
      if (attempt.ok) {
        batch.pages.push(attempt.page);
      } else {
        batch.failures.push(attempt.failure);
      }
    }

    log.debug(`Fetched ${batch.pages.length}/${urls.length} pages`, { parallel });
    return batch;
  }

  private async attempt(url: string): Promise<Attempt> {
    try {
      const page = await this.fetcher.fetch(url);
      if (!page) {
        return { ok: false, failure: { url, reason: 'fetch failed' } };
      }
      if (!page.success) {
        return { ok: false, failure: { url, reason: page.content } };
      }
      return { ok: true, page };
    } catch (error) {
      return { ok: false, failure: { url, reason: errorMessage(error) } };
    }
  }
}

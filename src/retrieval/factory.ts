import type { PipelineConfig } from '../config/pipeline-config.js';
import { PageFetchPool } from '../fetch/page-fetch-pool.js';
import { HttpPageFetcher } from '../fetch/page-fetcher.js';
import { WorkerPool } from '../fetch/worker-pool.js';
import type { CompletionProvider } from '../llm/completion-provider.js';
import type { BackendKind } from '../pipeline/types.js';
import { ConfigError } from '../utils/errors.js';
import type { RetrievalBackendVariant } from './backend.js';
import { DeepWebRetrieval } from './deep-web-backend.js';
import { DocumentRetrieval, type DocumentIndex } from './document-backend.js';
import { SearxngSearchEngine } from './searxng.js';
import { WebRetrieval, type WebSearchEngine } from './web-backend.js';

export interface RetrievalDependencies {
  completion: CompletionProvider;
  /** Required for the document backend. */
  documentIndex?: DocumentIndex;
  /** Default: SearXNG at `search.searxngUrl`. */
  searchEngine?: WebSearchEngine;
  /** Default: HTTP fetcher over a pool of `deepWeb.maxWorkers`. */
  fetchPool?: PageFetchPool;
}

/**
 * Build a retrieval backend. This is the only place a misconfigured backend
 * surfaces; once built, `retrieve` never throws.
 *
 * @throws ConfigError when a required collaborator is missing.
 */
export function createRetrievalBackend(
  kind: BackendKind,
  deps: RetrievalDependencies,
  config: PipelineConfig,
): RetrievalBackendVariant {
  const searchEngine = (): WebSearchEngine =>
    deps.searchEngine ?? new SearxngSearchEngine({ ...config.search, userAgent: config.fetch.userAgent });

  switch (kind) {
    case 'document':
      if (!deps.documentIndex) {
        throw new ConfigError('The document backend needs a document index', 'MISSING_REQUIRED');
      }
      return new DocumentRetrieval(deps.documentIndex, deps.completion, config.llm);
    case 'web':
      return new WebRetrieval(searchEngine(), deps.completion, config.llm);
    case 'deep_web': {
      const fetchPool =
        deps.fetchPool ??
        new PageFetchPool(new HttpPageFetcher(config.fetch), new WorkerPool(config.deepWeb.maxWorkers));
      return new DeepWebRetrieval(searchEngine(), fetchPool, deps.completion, config.deepWeb);
    }
  }
}

/**
 * Deep web retrieval: search, fetch the top pages, summarise each page
 * against the current subquery, then answer from the summaries.
 */

import type { DeepWebConfig } from '../config/pipeline-config.js';
import type { PageFetchPool } from '../fetch/page-fetch-pool.js';
import { isCompletionFailure, type CompletionProvider } from '../llm/completion-provider.js';
import {
  buildPageAnalysisPrompt,
  buildSubqueryAnalysisPrompt,
  PAGE_ANALYSIS_MAX_TOKENS,
  SUBQUERY_ANALYSIS_MAX_TOKENS,
  type PageSummary,
} from '../pipeline/prompts.js';
import type { RetrievedContext } from '../pipeline/types.js';
import { createLogger } from '../utils/logger.js';
import { hashUrl } from '../utils/text.js';
import {
  BaseRetrievalBackend,
  emptyOutcome,
  type RetrievalIssue,
  type RetrievalOutcome,
} from './backend.js';
import { noWebResultsAnswer, type WebSearchEngine } from './web-backend.js';

const log = createLogger('deep-web');

/** Full-page summaries rank above snippet-only web hits. */
export const DEEP_WEB_SCORE = 0.98;

export class DeepWebRetrieval extends BaseRetrievalBackend {
  readonly kind = 'deep_web' as const;

  constructor(
    private readonly engine: WebSearchEngine,
    private readonly fetchPool: PageFetchPool,
    private readonly completion: CompletionProvider,
    private readonly options: Pick<DeepWebConfig, 'maxUrls' | 'parallel'>,
  ) {
    super();
  }

  protected async search(subquery: string, maxResults: number): Promise<RetrievalOutcome> {
    const hits = await this.engine.search(subquery, maxResults);
    if (hits.length === 0) {
      return emptyOutcome(subquery, noWebResultsAnswer(subquery), 'no web search results');
    }

    const urls = hits.slice(0, this.options.maxUrls).map((hit) => hit.url);
    const batch = await this.fetchPool.fetchAll(urls, { parallel: this.options.parallel });

    const issues = batch.failures.map((failure): RetrievalIssue => ({
      kind: 'fetch_failure',
      message: `${failure.url}: ${failure.reason}`,
      subquery,
    }));

    const summaries: PageSummary[] = [];
    for (const page of batch.pages) {
      const summary = await this.completion.generate(
        buildPageAnalysisPrompt(subquery, page),
        PAGE_ANALYSIS_MAX_TOKENS,
      );
      if (isCompletionFailure(summary)) {
        issues.push({ kind: 'fetch_failure', message: `${page.url}: ${summary}`, subquery });
        continue;
      }
      summaries.push({ title: page.title, url: page.url, summary });
    }

    log.info(`Summarised ${summaries.length}/${urls.length} pages for "${subquery}"`);

    if (summaries.length === 0) {
      return { answer: `No detailed information found for '${subquery}'`, contexts: [], issues };
    }

    const contexts = summaries.map((s): RetrievedContext => ({
      sourceId: `deep_web_${hashUrl(s.url)}`,
      title: s.title,
      content: s.summary,
      score: DEEP_WEB_SCORE,
      sourceType: 'deep_web',
      url: s.url,
    }));

    const answer = await this.completion.generate(
      buildSubqueryAnalysisPrompt(subquery, summaries),
      SUBQUERY_ANALYSIS_MAX_TOKENS,
    );
    if (isCompletionFailure(answer)) {
      issues.push({ kind: 'retrieval_failure', message: answer, subquery });
    }

    return { answer, contexts, issues };
  }
}

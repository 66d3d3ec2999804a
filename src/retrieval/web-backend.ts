/**
 * Retrieval over a web search engine, answering from result snippets.
 */

import type { LlmConfig } from '../config/pipeline-config.js';
import { isCompletionFailure, type CompletionProvider } from '../llm/completion-provider.js';
import { buildWebAnswerPrompt } from '../pipeline/prompts.js';
import type { RetrievedContext } from '../pipeline/types.js';
import { clampScore, hashUrl } from '../utils/text.js';
import { BaseRetrievalBackend, emptyOutcome, type RetrievalOutcome } from './backend.js';

/** Score given to web hits that carry none. */
export const DEFAULT_WEB_SCORE = 0.95;

export interface WebSearchHit {
  title: string;
  url: string;
  snippet: string;
  /** Engine that produced the hit. */
  engine?: string;
  score?: number;
}

export interface WebSearchEngine {
  /** Resolves to [] when the engine is unreachable. */
  search(query: string, limit: number): Promise<WebSearchHit[]>;
}

export function noWebResultsAnswer(query: string): string {
  return `No web search results found for '${query}'.`;
}

export class WebRetrieval extends BaseRetrievalBackend {
  readonly kind = 'web' as const;

  constructor(
    private readonly engine: WebSearchEngine,
    private readonly completion: CompletionProvider,
    private readonly llm: Pick<LlmConfig, 'maxTokens'>,
  ) {
    super();
  }

  protected async search(subquery: string, maxResults: number): Promise<RetrievalOutcome> {
    const hits = await this.engine.search(subquery, maxResults);
    if (hits.length === 0) {
      return emptyOutcome(subquery, noWebResultsAnswer(subquery), 'no web search results');
    }

    const contexts = hits.map((hit): RetrievedContext => ({
      sourceId: `web_${hashUrl(hit.url)}`,
      title: hit.title,
      content: hit.snippet,
      score: clampScore(hit.score ?? DEFAULT_WEB_SCORE),
      sourceType: 'web',
      url: hit.url,
    }));

    const answer = await this.completion.generate(buildWebAnswerPrompt(subquery, hits), this.llm.maxTokens);
    const issues = isCompletionFailure(answer)
      ? [{ kind: 'retrieval_failure' as const, message: answer, subquery }]
      : [];

    return { answer, contexts, issues };
  }
}

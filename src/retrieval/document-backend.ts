/**
 * Retrieval over a document similarity index.
 *
 * The index itself (embedding + vector search) lives outside this package;
 * anything implementing `DocumentIndex` can be plugged in.
 */

import type { LlmConfig } from '../config/pipeline-config.js';
import { isCompletionFailure, type CompletionProvider } from '../llm/completion-provider.js';
import { buildDocumentAnswerPrompt } from '../pipeline/prompts.js';
import type { RetrievedContext } from '../pipeline/types.js';
import { clampScore } from '../utils/text.js';
import { BaseRetrievalBackend, emptyOutcome, type RetrievalOutcome } from './backend.js';

export interface DocumentHit {
  documentId: string;
  title: string;
  content: string;
  score: number;
}

export interface DocumentIndex {
  search(query: string, limit: number): Promise<DocumentHit[]>;
}

export class DocumentRetrieval extends BaseRetrievalBackend {
  readonly kind = 'document' as const;

  constructor(
    private readonly index: DocumentIndex,
    private readonly completion: CompletionProvider,
    private readonly llm: Pick<LlmConfig, 'maxTokens'>,
  ) {
    super();
  }

  protected async search(subquery: string, maxResults: number): Promise<RetrievalOutcome> {
    const hits = await this.index.search(subquery, maxResults);
    if (hits.length === 0) {
      return emptyOutcome(subquery, `No relevant documents found for '${subquery}'.`, 'no documents matched');
    }

    const contexts = hits.map((hit): RetrievedContext => ({
      sourceId: hit.documentId,
      title: hit.title || 'Unknown',
      content: hit.content,
      score: clampScore(hit.score),
      sourceType: 'document',
    }));

    const answer = await this.completion.generate(buildDocumentAnswerPrompt(subquery, hits), this.llm.maxTokens);
    const issues = isCompletionFailure(answer)
      ? [{ kind: 'retrieval_failure' as const, message: answer, subquery }]
      : [];

    return { answer, contexts, issues };
  }
}

/**
 * Retrieval backend contract.
 *
 * `retrieve` never rejects. Failures come back as an outcome with no
 * contexts, an explanatory answer and a `retrieval_failure` issue.
 */

import type { BackendKind, PipelineIssue, RetrievedContext } from '../pipeline/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { DeepWebRetrieval } from './deep-web-backend.js';
import type { DocumentRetrieval } from './document-backend.js';
import type { WebRetrieval } from './web-backend.js';

const log = createLogger('retrieval');

/** Issue raised inside a backend; the caller attaches the pipeline stage. */
export type RetrievalIssue = Omit<PipelineIssue, 'stage'>;

export interface RetrievalOutcome {
  answer: string;
  /** In the order the backend ranked them. */
  contexts: RetrievedContext[];
  issues: RetrievalIssue[];
}

export interface RetrievalBackend {
  readonly kind: BackendKind;
  retrieve(subquery: string, maxResults: number): Promise<RetrievalOutcome>;
}

export type RetrievalBackendVariant = DocumentRetrieval | WebRetrieval | DeepWebRetrieval;

/**
 * Outcome for a subquery that produced no evidence.
 */
export function emptyOutcome(subquery: string, answer: string, reason: string): RetrievalOutcome {
  return {
    answer,
    contexts: [],
    issues: [{ kind: 'retrieval_failure', message: reason, subquery }],
  };
}

/**
 * Implements the never-reject contract around a variant's `search`.
 */
export abstract class BaseRetrievalBackend implements RetrievalBackend {
  abstract readonly kind: BackendKind;

  protected abstract search(subquery: string, maxResults: number): Promise<RetrievalOutcome>;

  async retrieve(subquery: string, maxResults: number): Promise<RetrievalOutcome> {
    try {
      return await this.search(subquery, maxResults);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`${this.kind} retrieval failed for "${subquery}"`, { error: message });
      return emptyOutcome(subquery, `Retrieval failed for '${subquery}': ${message}`, message);
    }
  }
}

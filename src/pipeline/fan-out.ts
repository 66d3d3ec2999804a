/**
 * Runs retrieval once per subquery, one subquery at a time.
 */

import type { RetrievalBackend, RetrievalOutcome } from '../retrieval/backend.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { collectContexts } from './aggregator.js';
import type { Context, IntermediateResult, PipelineIssue, Subquery } from './types.js';

const log = createLogger('fan-out');

export function initialQueryLabel(query: string): string {
  return `Initial query: ${query}`;
}

/** A first-pass retrieval to report ahead of the subquery results. */
export interface InitialRetrieval {
  query: string;
  outcome: RetrievalOutcome;
}

export interface FanOutResult {
  intermediateResults: IntermediateResult[];
  /** Every context, in processing order. */
  contexts: Context[];
  issues: PipelineIssue[];
}

function toIntermediate(subquery: Subquery, outcome: RetrievalOutcome): IntermediateResult {
  return {
    subquery,
    answer: outcome.answer,
    contexts: outcome.contexts.map((context) => ({ ...context, subquery: subquery.text })),
  };
}

export class FanOutExecutor {
  constructor(private readonly backend: RetrievalBackend) {}

  async execute(
    subqueries: readonly Subquery[],
    maxResults: number,
    initial?: InitialRetrieval,
  ): Promise<FanOutResult> {
    const intermediateResults: IntermediateResult[] = [];
    const issues: PipelineIssue[] = [];

    if (initial) {
      const label: Subquery = { text: initialQueryLabel(initial.query), strategy: 'informed', origin: 'initial' };
      intermediateResults.push(toIntermediate(label, initial.outcome));
    }

    for (const subquery of subqueries) {
      log.info(`Processing subquery: "${subquery.text}"`);
      const outcome = await this.retrieveGuarded(subquery.text, maxResults);
      intermediateResults.push(toIntermediate(subquery, outcome));
      issues.push(...outcome.issues.map((issue): PipelineIssue => ({ ...issue, stage: 'fan_out' })));
    }

    return {
      intermediateResults,
      contexts: collectContexts(intermediateResults),
      issues,
    };
  }

  private async retrieveGuarded(subquery: string, maxResults: number): Promise<RetrievalOutcome> {
    try {
      return await this.backend.retrieve(subquery, maxResults);
    } catch (error) {
      // Backends should not throw; keep the run going if one does
      const message = errorMessage(error);
      log.error(`Backend threw for "${subquery}"`, { error: message });
      return {
        answer: `Retrieval failed for '${subquery}': ${message}`,
        contexts: [],
        issues: [{ kind: 'retrieval_failure', message, subquery }],
      };
    }
  }
}

/**
 * Query decomposition into focused subqueries.
 */

import { isCompletionFailure, type CompletionProvider } from '../llm/completion-provider.js';
import { PipelineError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { truncateText } from '../utils/text.js';
import { DEFAULT_DECOMPOSITION_BUDGET, formatContextsForPrompt } from './aggregator.js';
import {
  buildBlindDecompositionPrompt,
  buildInformedDecompositionPrompt,
  DECOMPOSE_MAX_TOKENS,
} from './prompts.js';
import type { RetrievedContext, Strategy, Subquery } from './types.js';

const log = createLogger('decomposer');

export const MAX_SUBQUERIES = 4;
/** Prior contexts shown to informed decomposition. */
export const MAX_PRIOR_CONTEXTS = 3;
/** Per-context content limit in the informed prompt. */
export const PRIOR_CONTENT_CHARS = 500;

const BULLET = /^\s*(?:[-*•+]|\d+[.)])\s*/;

/** A first-pass retrieval that steers informed decomposition. */
export interface PriorRetrieval {
  answer: string;
  contexts: readonly RetrievedContext[];
}

export interface DecomposeOptions {
  isWebSearch: boolean;
  /** Required for informed mode. */
  prior?: PriorRetrieval;
}

export interface DecompositionOutcome {
  subqueries: Subquery[];
  /** True when nothing parsed and the deterministic fallback was used. */
  usedFallback: boolean;
}

export interface DecomposerOptions {
  decompositionBudget?: number;
  maxSubqueries?: number;
}

/**
 * Parse a bulleted completion into unique, non-empty lines.
 */
export function parseSubqueries(response: string, limit: number = MAX_SUBQUERIES): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const line of response.split('\n')) {
    const cleaned = line.replace(BULLET, '').trim();
    if (!cleaned || seen.has(cleaned)) continue;
    seen.add(cleaned);
    result.push(cleaned);
    if (result.length >= limit) break;
  }
  return result;
}

/**
 * Follow-ups used when informed decomposition parses nothing.
 */
export function informedFallbacks(query: string, isWebSearch: boolean): string[] {
  if (isWebSearch) {
    return [`${query} latest information`, `${query} alternative perspectives`];
  }
  return [
    `What additional details can be found about ${query}?`,
    `Are there any alternative perspectives on ${query}?`,
  ];
}

/**
 * Render the prior retrieval for the informed prompt: the initial answer,
 * then the first few contexts (each cut short) ranked within the budget.
 */
export function formatPrior(prior: PriorRetrieval, budget: number = DEFAULT_DECOMPOSITION_BUDGET): string {
  const contexts = prior.contexts.slice(0, MAX_PRIOR_CONTEXTS).map((context) => ({
    ...context,
    content: truncateText(context.content, PRIOR_CONTENT_CHARS),
  }));

  return `Initial answer: ${truncateText(prior.answer, PRIOR_CONTENT_CHARS)}\n\n${formatContextsForPrompt(contexts, budget)}`;
}

export class Decomposer {
  private readonly budget: number;
  private readonly maxSubqueries: number;

  constructor(
    private readonly completion: CompletionProvider,
    options: DecomposerOptions = {},
  ) {
    this.budget = options.decompositionBudget ?? DEFAULT_DECOMPOSITION_BUDGET;
    this.maxSubqueries = options.maxSubqueries ?? MAX_SUBQUERIES;
  }

  /**
   * Split `query` into subqueries. Always returns at least one.
   *
   * @throws PipelineError when informed mode is requested without a prior retrieval.
   */
  async decompose(query: string, mode: Strategy, options: DecomposeOptions): Promise<DecompositionOutcome> {
    const { isWebSearch, prior } = options;

    let prompt: string;
    if (mode === 'informed') {
      if (!prior) {
        throw new PipelineError('Informed decomposition needs a prior retrieval', 'MISSING_PRIOR');
      }
      prompt = buildInformedDecompositionPrompt(query, formatPrior(prior, this.budget), isWebSearch);
    } else {
      prompt = buildBlindDecompositionPrompt(query, isWebSearch);
    }

    const response = await this.completion.generate(prompt, DECOMPOSE_MAX_TOKENS);
    const parsed = isCompletionFailure(response) ? [] : parseSubqueries(response, this.maxSubqueries);

    if (parsed.length > 0) {
      log.debug(`Decomposed into ${parsed.length} subqueries`, { mode });
      return {
        subqueries: parsed.map((text): Subquery => ({ text, strategy: mode, origin: 'decomposed' })),
        usedFallback: false,
      };
    }

    log.warn('Failed to decompose query, using fallback subqueries', { mode });
    const fallbacks = mode === 'informed' ? informedFallbacks(query, isWebSearch) : [query];
    return {
      subqueries: fallbacks.map((text): Subquery => ({ text, strategy: mode, origin: 'fallback' })),
      usedFallback: true,
    };
  }
}

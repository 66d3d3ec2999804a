/**
 * Final answer synthesis over every intermediate result.
 */

import {
  COMPLETION_FAILURE_PREFIX,
  isCompletionFailure,
  type CompletionProvider,
} from '../llm/completion-provider.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { collectContexts, DEFAULT_SYNTHESIS_BUDGET, formatContextsForPrompt } from './aggregator.js';
import { buildSynthesisPrompt, SYNTHESIS_MAX_TOKENS } from './prompts.js';
import type { IntermediateResult } from './types.js';

const log = createLogger('synthesizer');

export const SYNTHESIS_FAILURE_PREFIX = 'Unable to synthesize an answer';

export interface SynthesisOutcome {
  answer: string;
  /** True when `answer` is a diagnostic rather than a synthesized answer. */
  failed: boolean;
}

export interface SynthesizerOptions {
  synthesisBudget?: number;
}

export function synthesisFailureAnswer(query: string, detail: string): string {
  return `${SYNTHESIS_FAILURE_PREFIX} for "${query}": ${detail || 'unknown error'}`;
}

export class Synthesizer {
  private readonly budget: number;

  constructor(
    private readonly completion: CompletionProvider,
    options: SynthesizerOptions = {},
  ) {
    this.budget = options.synthesisBudget ?? DEFAULT_SYNTHESIS_BUDGET;
  }

  /**
   * Never rejects. `evidence` is the ranked context block; built from
   * `results` when not given.
   */
  async synthesize(
    query: string,
    results: readonly IntermediateResult[],
    isWebSearch: boolean,
    evidence?: string,
  ): Promise<SynthesisOutcome> {
    try {
      const prompt = buildSynthesisPrompt(
        query,
        results.map((result) => ({ subquery: result.subquery.text, answer: result.answer })),
        evidence ?? formatContextsForPrompt(collectContexts(results), this.budget),
        isWebSearch,
      );
      const answer = await this.completion.generate(prompt, SYNTHESIS_MAX_TOKENS);

      if (isCompletionFailure(answer)) {
        const detail = answer.slice(COMPLETION_FAILURE_PREFIX.length).trim();
        return { answer: synthesisFailureAnswer(query, detail), failed: true };
      }
      return { answer, failed: false };
    } catch (error) {
      log.error('Synthesis failed', { error: errorMessage(error) });
      return { answer: synthesisFailureAnswer(query, errorMessage(error)), failed: true };
    }
  }
}

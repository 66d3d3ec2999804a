/**
 * Context aggregation.
 *
 * Two views over the same contexts:
 * - caller-facing: insertion order, untouched, no dedup
 * - prompt-facing: ranked by score and cut to a character budget
 */

import type { Context, IntermediateResult, RetrievedContext } from './types.js';

export const TRUNCATION_MARKER = '...(additional context truncated due to length)...';

export const DEFAULT_SYNTHESIS_BUDGET = 4000;
export const DEFAULT_DECOMPOSITION_BUDGET = 2000;

/**
 * Flatten intermediate results into one list, in processing order.
 */
export function collectContexts(results: readonly IntermediateResult[]): Context[] {
  return results.flatMap((result) => result.contexts);
}

/**
 * Render one context entry for a prompt. `rank` is 1-based.
 */
export function formatContextEntry(context: RetrievedContext, rank: number): string {
  const url = context.url ? `URL: ${context.url}\n` : '';
  return `[Source ${rank}] From '${context.title}' (relevance: ${context.score.toFixed(2)}):\n${url}${context.content}\n\n`;
}

/**
 * Rank contexts by descending score and render as many whole entries as fit
 * in `budget` characters. When an entry would overflow, the truncation marker
 * is appended (if anything was written) and rendering stops.
 */
export function formatContextsForPrompt(
  contexts: readonly RetrievedContext[],
  budget: number = DEFAULT_SYNTHESIS_BUDGET,
): string {
  // Array.prototype.sort is stable, so equal scores keep insertion order
  const ranked = [...contexts].sort((a, b) => b.score - a.score);

  let output = '';
  for (const [i, context] of ranked.entries()) {
    const entry = formatContextEntry(context, i + 1);
    if (output.length + entry.length > budget) {
      if (output.length > 0) {
        output += TRUNCATION_MARKER;
      }
      break;
    }
    output += entry;
  }
  return output;
}

/**
 * Small string helpers shared by prompt builders.
 */

import { createHash } from 'node:crypto';

/**
 * Truncate text to `maxChars`, appending `suffix` when cut.
 */
export function truncateText(text: string, maxChars: number, suffix: string = '...'): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + suffix;
}

/**
 * Collapse every whitespace run to a single space and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Stable short identifier for a URL (first 12 hex chars of its SHA-1).
 */
export function hashUrl(url: string): string {
  return createHash('sha1').update(url).digest('hex').slice(0, 12);
}

/**
 * Clamp a relevance score into [0, 1]. Non-finite values become 0.
 */
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

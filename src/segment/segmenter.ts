/**
 * Boundary-aware text chunking for similarity search.
 *
 * Strategies:
 * 1. sentence: pack whole sentences, carry a word-aligned character overlap
 * 2. paragraph: pack whole paragraphs, carry whole trailing paragraphs
 * 3. fixed: sliding character window snapped back to word boundaries
 *
 * Every chunk is a substring of the normalized input, so `start`/`end`
 * offsets can be used to map chunks back onto it. Pure and deterministic.
 */

import type { Chunk, ChunkOptions, ChunkStrategy, Span } from './types.js';
import { CHUNK_STRATEGIES } from './types.js';
import { collapseWhitespace } from '../utils/text.js';

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

const PARAGRAPH_SEPARATOR = '\n\n';

/**
 * Resolve size/overlap into a usable pair: size ≥ 1, 0 ≤ overlap < size.
 */
export function clampChunkParams(size: number, overlap: number): { size: number; overlap: number } {
  const safeSize = Number.isFinite(size) ? Math.max(1, Math.floor(size)) : DEFAULT_CHUNK_SIZE;
  const safeOverlap = Number.isFinite(overlap) ? Math.max(0, Math.floor(overlap)) : 0;
  return { size: safeSize, overlap: Math.min(safeOverlap, safeSize - 1) };
}

function resolveStrategy(strategy: string | undefined): ChunkStrategy {
  return CHUNK_STRATEGIES.find((s) => s === strategy) ?? 'sentence';
}

function splitParagraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map(collapseWhitespace)
    .filter((p) => p.length > 0);
}

/**
 * The text that chunk offsets refer to for a given strategy.
 *
 * Paragraph strategy keeps paragraph breaks (joined by a blank line);
 * the others collapse all whitespace to single spaces.
 */
export function normalizeForChunking(text: string, strategy: ChunkStrategy = 'sentence'): string {
  if (resolveStrategy(strategy) === 'paragraph') {
    return splitParagraphs(text).join(PARAGRAPH_SEPARATOR);
  }
  return collapseWhitespace(text);
}

/**
 * Split text into overlapping chunks. Never throws; empty input gives [].
 */
export function chunkText(text: string, options: ChunkOptions = {}): Chunk[] {
  const strategy = resolveStrategy(options.strategy);
  const { size, overlap } = clampChunkParams(
    options.size ?? DEFAULT_CHUNK_SIZE,
    options.overlap ?? DEFAULT_CHUNK_OVERLAP,
  );

  if (!text || !text.trim()) return [];

  switch (strategy) {
    case 'paragraph':
      return chunkByParagraph(text, size, overlap);
    case 'fixed':
      return chunkFixed(collapseWhitespace(text), size, overlap);
    case 'sentence':
      return chunkBySentence(collapseWhitespace(text), size, overlap);
  }
}

function toChunks(normalized: string, spans: Span[]): Chunk[] {
  return spans.map((span, index) => ({
    index,
    text: normalized.slice(span.start, span.end),
    start: span.start,
    end: span.end,
    overlapsPrevious: index > 0 && span.start < spans[index - 1].end,
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Sentence strategy
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Sentence spans in single-spaced text: a boundary is a space that follows
 * sentence-ending punctuation.
 */
export function sentenceSpans(normalized: string): Span[] {
  const spans: Span[] = [];
  let start = 0;

  for (let i = 1; i < normalized.length; i++) {
    if (normalized[i] === ' ' && /[.!?]/.test(normalized[i - 1])) {
      spans.push({ start, end: i });
      start = i + 1;
    }
  }
  if (start < normalized.length) {
    spans.push({ start, end: normalized.length });
  }

  return spans;
}

/**
 * Start of a word-aligned suffix of `span` that is at most `overlap` chars.
 * Returns null when no whole word fits.
 */
function wordAlignedOverlapStart(normalized: string, span: Span, overlap: number): number | null {
  if (overlap <= 0) return null;

  let start = span.end - Math.min(overlap, span.end - span.start);

  if (start > span.start && normalized[start - 1] !== ' ') {
    // Landed mid-word: drop the partial word
    const space = normalized.indexOf(' ', start);
    if (space === -1 || space >= span.end) return null;
    start = space + 1;
  }
  while (start < span.end && normalized[start] === ' ') start++;

  return start < span.end ? start : null;
}

function chunkBySentence(normalized: string, size: number, overlap: number): Chunk[] {
  const spans: Span[] = [];
  let current: Span | null = null;

  for (const sentence of sentenceSpans(normalized)) {
    if (!current) {
      current = { ...sentence };
      continue;
    }

    if (sentence.end - current.start <= size) {
      current.end = sentence.end;
      continue;
    }

    spans.push(current);
    const seed = wordAlignedOverlapStart(normalized, current, overlap);
    // Sentences are separated by one space, so seed + sentence is contiguous
    current = { start: seed ?? sentence.start, end: sentence.end };
  }

  if (current) spans.push(current);
  return toChunks(normalized, spans);
}

// ─────────────────────────────────────────────────────────────────────────────
// Paragraph strategy
// ─────────────────────────────────────────────────────────────────────────────

function chunkByParagraph(text: string, size: number, overlap: number): Chunk[] {
  const paragraphs = splitParagraphs(text);
  const normalized = paragraphs.join(PARAGRAPH_SEPARATOR);

  const paragraphSpans: Span[] = [];
  let offset = 0;
  for (const p of paragraphs) {
    paragraphSpans.push({ start: offset, end: offset + p.length });
    offset += p.length + PARAGRAPH_SEPARATOR.length;
  }

  const spans: Span[] = [];
  // Indices into paragraphSpans of the chunk being built
  let first = -1;
  let last = -1;

  for (let i = 0; i < paragraphSpans.length; i++) {
    const para = paragraphSpans[i];

    if (first === -1) {
      first = last = i;
      continue;
    }

    if (para.end - paragraphSpans[first].start <= size) {
      last = i;
      continue;
    }

    const chunkEnd = paragraphSpans[last].end;
    spans.push({ start: paragraphSpans[first].start, end: chunkEnd });

    // Carry trailing whole paragraphs whose text plus separator fits the budget
    let seed = i;
    for (let k = last; k >= first; k--) {
      if (chunkEnd - paragraphSpans[k].start + PARAGRAPH_SEPARATOR.length > overlap) break;
      seed = k;
    }

    first = seed;
    last = i;
  }

  if (first !== -1) {
    spans.push({ start: paragraphSpans[first].start, end: paragraphSpans[last].end });
  }

  return toChunks(normalized, spans);
}

// ─────────────────────────────────────────────────────────────────────────────
// Fixed strategy
// ─────────────────────────────────────────────────────────────────────────────

function isMidWord(normalized: string, boundary: number): boolean {
  return (
    boundary > 0 &&
    boundary < normalized.length &&
    normalized[boundary] !== ' ' &&
    normalized[boundary - 1] !== ' '
  );
}

function chunkFixed(normalized: string, size: number, overlap: number): Chunk[] {
  const spans: Span[] = [];
  let cursor = 0;

  while (cursor < normalized.length) {
    let end = Math.min(cursor + size, normalized.length);

    if (isMidWord(normalized, end)) {
      const space = normalized.lastIndexOf(' ', end - 1);
      if (space > cursor) end = space;
    }

    let start = cursor;
    let trimmedEnd = end;
    while (start < trimmedEnd && normalized[start] === ' ') start++;
    while (trimmedEnd > start && normalized[trimmedEnd - 1] === ' ') trimmedEnd--;
    if (start < trimmedEnd) {
      spans.push({ start, end: trimmedEnd });
    }

    if (end >= normalized.length) break;

    let next = end - cursor > overlap ? end - overlap : end;
    if (next < end && isMidWord(normalized, next)) {
      const space = normalized.indexOf(' ', next);
      next = space !== -1 && space < end ? space + 1 : end;
    }
    cursor = next;
  }

  return toChunks(normalized, spans);
}

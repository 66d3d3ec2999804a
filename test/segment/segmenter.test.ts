/**
 * Tests for boundary-aware chunking.
 */

import { describe, it, expect } from 'vitest';
import {
  chunkText,
  clampChunkParams,
  normalizeForChunking,
  sentenceSpans,
} from '../../src/segment/segmenter.js';
import type { Chunk } from '../../src/segment/types.js';

const WORDS = ['alpha', 'beta', 'gamma', 'delta', 'epsilon', 'zeta', 'eta', 'theta'];

function prose(sentences: number): string {
  const out: string[] = [];
  for (let i = 0; i < sentences; i++) {
    const length = 3 + (i % 5);
    const words = Array.from({ length }, (_, j) => WORDS[(i * 3 + j) % WORDS.length]);
    out.push(`${words.join(' ')}.`);
  }
  return out.join(' \n ');
}

function covered(normalized: string, chunks: Chunk[]): boolean {
  for (let i = 0; i < normalized.length; i++) {
    if (normalized[i] === ' ' || normalized[i] === '\n') continue;
    if (!chunks.some((c) => c.start <= i && i < c.end)) return false;
  }
  return true;
}

describe('clampChunkParams', () => {
  it('raises size to 1 and keeps overlap below size', () => {
    expect(clampChunkParams(0, 5)).toEqual({ size: 1, overlap: 0 });
    expect(clampChunkParams(10, -3)).toEqual({ size: 10, overlap: 0 });
    expect(clampChunkParams(10, 10)).toEqual({ size: 10, overlap: 9 });
  });
});

describe('sentenceSpans', () => {
  it('splits after terminal punctuation followed by a space', () => {
    const text = 'One. Two! Three? Four';
    const spans = sentenceSpans(text);

    expect(spans.map((s) => text.slice(s.start, s.end))).toEqual(['One.', 'Two!', 'Three?', 'Four']);
  });

  it('does not split on punctuation inside a word', () => {
    const text = 'Version 1.2 shipped. Done.';
    expect(sentenceSpans(text).map((s) => text.slice(s.start, s.end))).toEqual([
      'Version 1.2 shipped.',
      'Done.',
    ]);
  });
});

describe('chunkText', () => {
  it('returns [] for empty or whitespace input', () => {
    expect(chunkText('')).toEqual([]);
    expect(chunkText('  \n\t ')).toEqual([]);
  });

  it('is deterministic', () => {
    const text = prose(40);
    for (const strategy of ['sentence', 'paragraph', 'fixed'] as const) {
      expect(chunkText(text, { size: 120, overlap: 30, strategy })).toEqual(
        chunkText(text, { size: 120, overlap: 30, strategy }),
      );
    }
  });

  it('offsets index into the normalized text', () => {
    const text = prose(25);
    for (const strategy of ['sentence', 'paragraph', 'fixed'] as const) {
      const normalized = normalizeForChunking(text, strategy);
      for (const chunk of chunkText(text, { size: 100, overlap: 20, strategy })) {
        expect(normalized.slice(chunk.start, chunk.end)).toBe(chunk.text);
      }
    }
  });

  describe('sentence strategy', () => {
    it('carries a word-aligned overlap between chunks', () => {
      const chunks = chunkText('A. B. C. D.', { size: 5, overlap: 2, strategy: 'sentence' });

      expect(chunks.map((c) => c.text)).toEqual(['A. B.', 'B. C.', 'C. D.']);
      expect(chunks.map((c) => [c.start, c.end])).toEqual([
        [0, 5],
        [3, 8],
        [6, 11],
      ]);
      expect(chunks.map((c) => c.overlapsPrevious)).toEqual([false, true, true]);
    });

    it('carries no overlap when none is asked for', () => {
      const chunks = chunkText('A. B. C. D.', { size: 5, overlap: 0, strategy: 'sentence' });

      expect(chunks.map((c) => c.text)).toEqual(['A. B.', 'C. D.']);
      expect(chunks[1].overlapsPrevious).toBe(false);
    });

    it('keeps an overlong sentence whole', () => {
      const chunks = chunkText('Short. This sentence is far too long. End.', {
        size: 10,
        overlap: 0,
        strategy: 'sentence',
      });

      expect(chunks.map((c) => c.text)).toEqual(['Short.', 'This sentence is far too long.', 'End.']);
    });

    it('covers every non-space character', () => {
      const text = prose(50);
      const chunks = chunkText(text, { size: 150, overlap: 40, strategy: 'sentence' });

      expect(chunks.length).toBeGreaterThan(1);
      expect(covered(normalizeForChunking(text, 'sentence'), chunks)).toBe(true);
    });

    it('never carries more than overlap characters', () => {
      const text = prose(50);
      const chunks = chunkText(text, { size: 150, overlap: 40, strategy: 'sentence' });

      for (let i = 1; i < chunks.length; i++) {
        const shared = Math.max(0, chunks[i - 1].end - chunks[i].start);
        expect(shared).toBeLessThanOrEqual(40);
      }
    });
  });

  describe('paragraph strategy', () => {
    const text = 'Para one.\n\nPara two.\n\n\nPara   three.';

    it('normalizes paragraphs and joins them with a blank line', () => {
      expect(normalizeForChunking(text, 'paragraph')).toBe('Para one.\n\nPara two.\n\nPara three.');
    });

    it('packs whole paragraphs up to size', () => {
      const chunks = chunkText(text, { size: 25, overlap: 0, strategy: 'paragraph' });

      expect(chunks.map((c) => c.text)).toEqual(['Para one.\n\nPara two.', 'Para three.']);
      expect(chunks[1].start).toBe(22);
    });

    it('seeds the next chunk with trailing paragraphs that fit the overlap', () => {
      const chunks = chunkText(text, { size: 25, overlap: 12, strategy: 'paragraph' });

      expect(chunks.map((c) => c.text)).toEqual([
        'Para one.\n\nPara two.',
        'Para two.\n\nPara three.',
      ]);
      expect(chunks[1].overlapsPrevious).toBe(true);
    });
  });

  describe('fixed strategy', () => {
    it('cuts windows back to word boundaries', () => {
      const chunks = chunkText('aaaa bbbb cccc', { size: 10, overlap: 0, strategy: 'fixed' });

      expect(chunks.map((c) => c.text)).toEqual(['aaaa bbbb', 'cccc']);
    });

    it('overlaps windows without starting mid-word', () => {
      const chunks = chunkText('one two three four', { size: 9, overlap: 4, strategy: 'fixed' });

      expect(chunks.map((c) => c.text)).toEqual(['one two', 'two', 'three', 'four']);
    });

    it('keeps every chunk within size', () => {
      const text = prose(60);
      const chunks = chunkText(text, { size: 64, overlap: 16, strategy: 'fixed' });

      expect(chunks.length).toBeGreaterThan(5);
      for (const chunk of chunks) {
        expect(chunk.text.length).toBeLessThanOrEqual(64);
      }
      expect(covered(normalizeForChunking(text, 'fixed'), chunks)).toBe(true);
    });

    it('splits a single long word into size windows', () => {
      const chunks = chunkText('abcdefghij', { size: 4, overlap: 0, strategy: 'fixed' });

      expect(chunks.map((c) => c.text)).toEqual(['abcd', 'efgh', 'ij']);
    });
  });
});

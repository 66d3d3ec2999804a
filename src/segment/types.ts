/**
 * Types for document segmentation.
 */

/** How text is split into chunks. */
export type ChunkStrategy = 'sentence' | 'paragraph' | 'fixed';

export const CHUNK_STRATEGIES: readonly ChunkStrategy[] = ['sentence', 'paragraph', 'fixed'];

/**
 * A bounded text segment produced for indexing. Immutable once produced.
 */
export interface Chunk {
  /** Position in the chunk sequence (0-based). */
  readonly index: number;
  /** Chunk text, a substring of the normalized input. */
  readonly text: string;
  /** Start offset (inclusive) into the normalized input. */
  readonly start: number;
  /** End offset (exclusive) into the normalized input. */
  readonly end: number;
  /** True when this chunk begins before the previous chunk ended. */
  readonly overlapsPrevious: boolean;
}

export interface ChunkOptions {
  /** Target maximum characters per chunk. Default: 1000. */
  size?: number;
  /** Characters shared with the previous chunk. Default: 200. */
  overlap?: number;
  /** Split strategy. Default: 'sentence'. */
  strategy?: ChunkStrategy;
}

/** Half-open character span into the normalized text. */
export interface Span {
  start: number;
  end: number;
}

/**
 * Runtime configuration for a Quarry pipeline.
 *
 * Built once (see `toPipelineConfig` in loader.ts) and passed into each
 * component's constructor. Nothing reads configuration from a global.
 */

import type { ChunkStrategy } from '../segment/types.js';
import type { BackendKind, Strategy } from '../pipeline/types.js';

export type LlmProviderName = 'anthropic' | 'openai' | 'ollama';

export interface LlmConfig {
  provider: LlmProviderName;
  model: string;
  /** Max tokens for per-subquery answers. */
  maxTokens: number;
  /** Base URL of a local Ollama server. */
  ollamaUrl: string;
}

export interface PipelineSettings {
  strategy: Strategy;
  backend: BackendKind;
  /** Results requested from the backend per subquery. */
  maxResults: number;
  /** Character budget for the evidence block in the synthesis prompt. */
  synthesisBudget: number;
  /** Character budget for prior evidence in informed decomposition. */
  decompositionBudget: number;
  /** Prior conversation turns folded into the query. */
  historyTurns: number;
}

export interface SegmenterConfig {
  size: number;
  overlap: number;
  strategy: ChunkStrategy;
}

export interface DeepWebConfig {
  /** Top-K result URLs fetched per subquery. */
  maxUrls: number;
  /** Fetch through the worker pool (true) or one by one (false). */
  parallel: boolean;
  /** Worker pool size. */
  maxWorkers: number;
}

export interface FetchConfig {
  timeoutMs: number;
  maxContentLength: number;
  userAgent: string;
  /** Minimum spacing between page requests; 0 disables. */
  minIntervalMs: number;
}

export interface SearchConfig {
  searxngUrl: string;
  searchType: string;
  timeoutMs: number;
}

export interface PipelineConfig {
  llm: LlmConfig;
  pipeline: PipelineSettings;
  segmenter: SegmenterConfig;
  deepWeb: DeepWebConfig;
  fetch: FetchConfig;
  search: SearchConfig;
}

export const DEFAULT_CONFIG: PipelineConfig = {
  llm: {
    provider: 'anthropic',
    model: 'claude-3-5-haiku-20241022',
    maxTokens: 1000,
    ollamaUrl: 'http://localhost:11434',
  },
  pipeline: {
    strategy: 'blind',
    backend: 'web',
    maxResults: 5,
    synthesisBudget: 4000,
    decompositionBudget: 2000,
    historyTurns: 3,
  },
  segmenter: {
    size: 1000,
    overlap: 200,
    strategy: 'sentence',
  },
  deepWeb: {
    maxUrls: 5,
    parallel: true,
    maxWorkers: 3,
  },
  fetch: {
    timeoutMs: 10_000,
    maxContentLength: 100_000,
    userAgent: 'Quarry/0.1 (+retrieval pipeline)',
    minIntervalMs: 0,
  },
  search: {
    searxngUrl: 'http://localhost:8080',
    searchType: 'general',
    timeoutMs: 10_000,
  },
};

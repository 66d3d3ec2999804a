/**
 * Quarry
 *
 * Query decomposition, fan-out retrieval and answer synthesis, plus a
 * boundary-aware text segmenter for indexing.
 *
 * @packageDocumentation
 */

// Configuration
export * from './config/pipeline-config.js';
export {
  loadConfig,
  validateExternalConfig,
  toPipelineConfig,
  parseStrategy,
  parseBackendKind,
  resolvePath,
  EXTERNAL_DEFAULTS,
} from './config/loader.js';
export type { ExternalConfig, ResolvedExternalConfig, LoadConfigOptions } from './config/loader.js';

// Segmentation
export * from './segment/types.js';
export * from './segment/segmenter.js';

// Pipeline
export * from './pipeline/types.js';
export { formatConversation, DEFAULT_HISTORY_TURNS } from './pipeline/conversation.js';
export * from './pipeline/aggregator.js';
export * from './pipeline/decomposer.js';
export * from './pipeline/fan-out.js';
export * from './pipeline/synthesizer.js';
export * from './pipeline/controller.js';
export * from './pipeline/serialize.js';

// Completion providers
export * from './llm/completion-provider.js';
export { AnthropicCompletionProvider } from './llm/anthropic-provider.js';
export type { AnthropicProviderOptions } from './llm/anthropic-provider.js';
export { OpenAICompletionProvider } from './llm/openai-provider.js';
export type { OpenAIProviderOptions } from './llm/openai-provider.js';
export { OllamaCompletionProvider } from './llm/ollama-provider.js';
export type { OllamaProviderOptions } from './llm/ollama-provider.js';
export { createCompletionProvider } from './llm/factory.js';

// Retrieval
export * from './retrieval/backend.js';
export * from './retrieval/document-backend.js';
export * from './retrieval/web-backend.js';
export * from './retrieval/deep-web-backend.js';
export * from './retrieval/searxng.js';
export * from './retrieval/factory.js';

// Fetching
export * from './fetch/worker-pool.js';
export * from './fetch/page-fetcher.js';
export * from './fetch/page-fetch-pool.js';
export { extractMainText, extractTitle } from './fetch/html-text.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, setJsonMode } from './utils/logger.js';
export type { Logger, LogLevel, LogMeta } from './utils/logger.js';
export { RateLimiter } from './utils/rate-limiter.js';

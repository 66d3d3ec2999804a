import type { LlmConfig } from '../config/pipeline-config.js';
import { AnthropicCompletionProvider } from './anthropic-provider.js';
import type { CompletionProvider } from './completion-provider.js';
import { OllamaCompletionProvider } from './ollama-provider.js';
import { OpenAICompletionProvider } from './openai-provider.js';

/**
 * Build the completion provider named by `llm.provider`.
 *
 * @throws ConfigError when the provider cannot be constructed (e.g. no API key).
 */
export function createCompletionProvider(config: LlmConfig): CompletionProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicCompletionProvider({ model: config.model });
    case 'openai':
      return new OpenAICompletionProvider({ model: config.model });
    case 'ollama':
      return new OllamaCompletionProvider({ model: config.model, baseUrl: config.ollamaUrl });
  }
}

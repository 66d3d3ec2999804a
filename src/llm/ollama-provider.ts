/**
 * Completion provider for a local Ollama server (`POST /api/generate`).
 */

import type { ModelDescriptor } from '../pipeline/types.js';
import { CompletionError } from '../utils/errors.js';
import { BaseCompletionProvider, DEFAULT_SYSTEM_PROMPT } from './completion-provider.js';

export interface OllamaProviderOptions {
  model: string;
  baseUrl: string;
  systemPrompt?: string;
  /** Injected fetch implementation. Default: global fetch. */
  fetchFn?: typeof fetch;
}

export class OllamaCompletionProvider extends BaseCompletionProvider {
  readonly descriptor: ModelDescriptor;
  private readonly endpoint: string;
  private readonly systemPrompt: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: OllamaProviderOptions) {
    super();
    this.descriptor = { provider: 'ollama', model: options.model };
    this.endpoint = `${options.baseUrl.replace(/\/+$/, '')}/api/generate`;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.fetchFn(this.endpoint, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.descriptor.model,
        // Plain-text turns work better than chat messages on most local models
        prompt: `System: ${this.systemPrompt}\n\nUser: ${prompt}\n\nAssistant:`,
        stream: false,
        options: { num_predict: maxTokens },
      }),
    });

    if (!response.ok) {
      throw new CompletionError(`Ollama returned HTTP ${response.status}`, 'COMPLETION_FAILED');
    }

    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'response' in body && typeof body.response === 'string') {
      return body.response;
    }
    return '';
  }
}

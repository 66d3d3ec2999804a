/**
 * Completion provider backed by the Anthropic Messages API.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ModelDescriptor } from '../pipeline/types.js';
import { ConfigError } from '../utils/errors.js';
import { BaseCompletionProvider, DEFAULT_SYSTEM_PROMPT } from './completion-provider.js';

export interface AnthropicProviderOptions {
  model: string;
  /** Defaults to ANTHROPIC_API_KEY. */
  apiKey?: string;
  systemPrompt?: string;
}

export class AnthropicCompletionProvider extends BaseCompletionProvider {
  readonly descriptor: ModelDescriptor;
  private readonly client: Anthropic;
  private readonly systemPrompt: string;

  constructor(options: AnthropicProviderOptions) {
    super();
    this.descriptor = { provider: 'anthropic', model: options.model };
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ConfigError(
        'No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.',
        'MISSING_REQUIRED',
      );
    }
    this.client = new Anthropic({ apiKey });
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.messages.create({
      model: this.descriptor.model,
      max_tokens: maxTokens,
      system: this.systemPrompt,
      messages: [{ role: 'user', content: prompt }],
    });

    const first = response.content[0];
    return first && first.type === 'text' ? first.text : '';
  }
}

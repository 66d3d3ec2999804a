/**
 * Completion provider backed by the OpenAI Chat Completions API.
 */

import OpenAI from 'openai';
import type { ModelDescriptor } from '../pipeline/types.js';
import { ConfigError } from '../utils/errors.js';
import { BaseCompletionProvider, DEFAULT_SYSTEM_PROMPT } from './completion-provider.js';

export interface OpenAIProviderOptions {
  model: string;
  /** Defaults to OPENAI_API_KEY. */
  apiKey?: string;
  systemPrompt?: string;
}

export class OpenAICompletionProvider extends BaseCompletionProvider {
  readonly descriptor: ModelDescriptor;
  private readonly client: OpenAI;
  private readonly systemPrompt: string;

  constructor(options: OpenAIProviderOptions) {
    super();
    this.descriptor = { provider: 'openai', model: options.model };
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigError('No OpenAI API key found. Set the OPENAI_API_KEY environment variable.', 'MISSING_REQUIRED');
    }
    this.client = new OpenAI({ apiKey });
  }

  protected async complete(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.descriptor.model,
      max_tokens: maxTokens,
      messages: [
        { role: 'system', content: this.systemPrompt },
        { role: 'user', content: prompt },
      ],
    });

    return response.choices[0]?.message.content ?? '';
  }
}

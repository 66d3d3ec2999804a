/**
 * Completion provider contract.
 *
 * `generate` never rejects: provider failures are logged and returned as a
 * diagnostic string starting with `COMPLETION_FAILURE_PREFIX`, so callers
 * can tell a real answer from a failed call without a try/catch.
 */

import type { ModelDescriptor } from '../pipeline/types.js';
import { CompletionError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('completion');

export const COMPLETION_FAILURE_PREFIX = '[completion failed]';

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant.';

export interface CompletionProvider {
  readonly descriptor: ModelDescriptor;
  generate(prompt: string, maxTokens: number): Promise<string>;
}

/**
 * True when `text` is the diagnostic a provider returns on failure.
 */
export function isCompletionFailure(text: string): boolean {
  return text.startsWith(COMPLETION_FAILURE_PREFIX);
}

/**
 * Implements the no-reject contract around a provider-specific `complete`.
 */
export abstract class BaseCompletionProvider implements CompletionProvider {
  abstract readonly descriptor: ModelDescriptor;

  /** Provider call. May throw; `generate` turns that into a diagnostic. */
  protected abstract complete(prompt: string, maxTokens: number): Promise<string>;

  async generate(prompt: string, maxTokens: number): Promise<string> {
    try {
      const text = await this.complete(prompt, maxTokens);
      if (!text.trim()) {
        throw new CompletionError('Provider returned no text', 'EMPTY_COMPLETION');
      }
      return text;
    } catch (error) {
      log.error(`Completion failed (${this.descriptor.provider}/${this.descriptor.model})`, {
        error: errorMessage(error),
      });
      return `${COMPLETION_FAILURE_PREFIX} ${errorMessage(error)}`;
    }
  }
}

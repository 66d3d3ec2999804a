/**
 * Error types for Quarry.
 *
 * Every error extends QuarryError and carries a code from its class's code
 * union plus an optional cause. Inside a pipeline run these are caught at
 * stage boundaries and turned into `PipelineIssue` records; only
 * construction-time `ConfigError`s reach callers.
 *
 * ```typescript
 * throw new ConfigError('No Anthropic API key found', 'MISSING_REQUIRED');
 *
 * try {
 *   await fetch(url);
 * } catch (err) {
 *   throw new FetchError(`Request to ${url} failed`, 'REQUEST_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

export class QuarryError<Code extends string = string> extends Error {
  readonly code: Code;

  /** Always an Error; non-Error causes are wrapped. */
  declare readonly cause?: Error;

  constructor(message: string, code: Code, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    Error.captureStackTrace?.(this, new.target);
  }

  /**
   * `Name [CODE]: message`, followed by the direct cause if there is one.
   */
  toDetailedString(): string {
    const head = `${this.name} [${this.code}]: ${this.message}`;
    if (!this.cause) return head;

    const causeCode = this.cause instanceof QuarryError ? ` [${this.cause.code}]` : '';
    return `${head}\n  Caused by: ${this.cause.message}${causeCode}`;
  }
}

/** Misconfiguration, found while loading config or constructing components. */
export type ConfigErrorCode = 'CONFIG_INVALID' | 'MISSING_REQUIRED' | 'INVALID_VALUE' | 'UNKNOWN_BACKEND';

export class ConfigError extends QuarryError<ConfigErrorCode> {}

/** A search engine or document index failed. */
export type RetrievalErrorCode = 'SEARCH_FAILED' | 'INDEX_FAILED' | 'BAD_RESPONSE';

export class RetrievalError extends QuarryError<RetrievalErrorCode> {}

/** A single page could not be fetched. */
export type FetchErrorCode = 'INVALID_URL' | 'REQUEST_FAILED' | 'HTTP_STATUS';

export class FetchError extends QuarryError<FetchErrorCode> {}

/** A completion provider call failed or produced nothing. */
export type CompletionErrorCode = 'COMPLETION_FAILED' | 'EMPTY_COMPLETION';

export class CompletionError extends QuarryError<CompletionErrorCode> {}

/** Raised inside a pipeline stage; the controller catches these. */
export type PipelineErrorCode = 'STAGE_FAILED' | 'MISSING_PRIOR' | 'ILLEGAL_TRANSITION';

export class PipelineError extends QuarryError<PipelineErrorCode> {}

export function isErrorWithCode(error: unknown, code: string): error is QuarryError {
  return error instanceof QuarryError && error.code === code;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isCompletionError(error: unknown): error is CompletionError {
  return error instanceof CompletionError;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Return QuarryErrors as they are; wrap anything else with code `UNKNOWN`.
 */
export function wrapError(error: unknown, message?: string): QuarryError {
  if (error instanceof QuarryError) return error;
  return new QuarryError(message ?? errorMessage(error), 'UNKNOWN', error);
}

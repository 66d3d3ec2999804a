/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (QUARRY_*)
 * 3. Project config file (./quarry.config.json)
 * 4. User config file (~/.quarry/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  type LlmProviderName,
  type PipelineConfig,
} from './pipeline-config.js';
import { CHUNK_STRATEGIES, type ChunkStrategy } from '../segment/types.js';
import { STRATEGIES, type BackendKind, type Strategy } from '../pipeline/types.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config-loader');

const LLM_PROVIDERS: readonly LlmProviderName[] = ['anthropic', 'openai', 'ollama'];
const BACKEND_KINDS: readonly BackendKind[] = ['document', 'web', 'deep_web'];

/** External config file structure. Enum-like fields stay strings until validated. */
export interface ExternalConfig {
  llm?: {
    provider?: string;
    model?: string;
    maxTokens?: number;
    ollamaUrl?: string;
  };
  pipeline?: {
    /** 'blind' | 'informed' ('direct' is accepted as an alias of 'blind') */
    strategy?: string;
    backend?: string;
    maxResults?: number;
    synthesisBudget?: number;
    decompositionBudget?: number;
    historyTurns?: number;
  };
  segmenter?: {
    size?: number;
    overlap?: number;
    strategy?: string;
  };
  deepWeb?: {
    maxUrls?: number;
    parallel?: boolean;
    maxWorkers?: number;
  };
  fetch?: {
    timeoutMs?: number;
    maxContentLength?: number;
    userAgent?: string;
    minIntervalMs?: number;
  };
  search?: {
    searxngUrl?: string;
    searchType?: string;
    timeoutMs?: number;
  };
}

/** ExternalConfig with every section and field present. */
export type ResolvedExternalConfig = {
  [K in keyof ExternalConfig]-?: Required<NonNullable<ExternalConfig[K]>>;
};

/** Default external config values */
const EXTERNAL_DEFAULTS: ResolvedExternalConfig = {
  llm: { ...DEFAULT_CONFIG.llm },
  pipeline: { ...DEFAULT_CONFIG.pipeline },
  segmenter: { ...DEFAULT_CONFIG.segmenter },
  deepWeb: { ...DEFAULT_CONFIG.deepWeb },
  fetch: { ...DEFAULT_CONFIG.fetch },
  search: { ...DEFAULT_CONFIG.search },
};

/** User-wide config file, below the project file in priority. */
export const USER_CONFIG_PATH = '~/.quarry/config.json';

/** Project config file: `quarry.config.json` in the working directory. */
export function projectConfigPath(): string {
  return join(process.cwd(), 'quarry.config.json');
}

/**
 * Expand a leading `~` to the home directory.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(resolvedPath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      log.warn(`Ignoring config file ${path}: expected a JSON object`);
      return null;
    }
    return parsed as ExternalConfig;
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, { error: errorMessage(error) });
    return null;
  }
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  return raw ? parseInt(raw, 10) : undefined;
}

function envBool(name: string): boolean | undefined {
  const raw = process.env[name];
  return raw ? raw.toLowerCase() === 'true' : undefined;
}

function envString(name: string): string | undefined {
  return process.env[name] || undefined;
}

/**
 * Load config from environment variables.
 * Variables are prefixed with QUARRY_ and use underscores for nesting.
 * Examples:
 *   QUARRY_PIPELINE_STRATEGY=informed
 *   QUARRY_DEEP_WEB_MAX_WORKERS=4
 *   QUARRY_SEARCH_SEARXNG_URL=http://searxng:8080
 */
function loadEnvConfig(): ExternalConfig {
  return {
    llm: {
      provider: envString('QUARRY_LLM_PROVIDER'),
      model: envString('QUARRY_LLM_MODEL'),
      maxTokens: envInt('QUARRY_LLM_MAX_TOKENS'),
      ollamaUrl: envString('QUARRY_LLM_OLLAMA_URL'),
    },
    pipeline: {
      strategy: envString('QUARRY_PIPELINE_STRATEGY'),
      backend: envString('QUARRY_PIPELINE_BACKEND'),
      maxResults: envInt('QUARRY_PIPELINE_MAX_RESULTS'),
      synthesisBudget: envInt('QUARRY_PIPELINE_SYNTHESIS_BUDGET'),
      decompositionBudget: envInt('QUARRY_PIPELINE_DECOMPOSITION_BUDGET'),
      historyTurns: envInt('QUARRY_PIPELINE_HISTORY_TURNS'),
    },
    segmenter: {
      size: envInt('QUARRY_SEGMENTER_SIZE'),
      overlap: envInt('QUARRY_SEGMENTER_OVERLAP'),
      strategy: envString('QUARRY_SEGMENTER_STRATEGY'),
    },
    deepWeb: {
      maxUrls: envInt('QUARRY_DEEP_WEB_MAX_URLS'),
      parallel: envBool('QUARRY_DEEP_WEB_PARALLEL'),
      maxWorkers: envInt('QUARRY_DEEP_WEB_MAX_WORKERS'),
    },
    fetch: {
      timeoutMs: envInt('QUARRY_FETCH_TIMEOUT_MS'),
      maxContentLength: envInt('QUARRY_FETCH_MAX_CONTENT_LENGTH'),
      userAgent: envString('QUARRY_FETCH_USER_AGENT'),
      minIntervalMs: envInt('QUARRY_FETCH_MIN_INTERVAL_MS'),
    },
    search: {
      searxngUrl: envString('QUARRY_SEARCH_SEARXNG_URL'),
      searchType: envString('QUARRY_SEARCH_TYPE'),
      timeoutMs: envInt('QUARRY_SEARCH_TIMEOUT_MS'),
    },
  };
}

/**
 * Copy only the fields of a section that are set.
 */
function definedFields<T extends object>(section: T | undefined): Partial<T> {
  const result: Partial<T> = {};
  if (!section) return result;

  for (const key of Object.keys(section) as (keyof T)[]) {
    if (section[key] !== undefined) {
      result[key] = section[key];
    }
  }
  return result;
}

/**
 * Merge a partial config over a resolved one, section by section.
 */
function mergeConfig(target: ResolvedExternalConfig, source: ExternalConfig): ResolvedExternalConfig {
  return {
    llm: { ...target.llm, ...definedFields(source.llm) },
    pipeline: { ...target.pipeline, ...definedFields(source.pipeline) },
    segmenter: { ...target.segmenter, ...definedFields(source.segmenter) },
    deepWeb: { ...target.deepWeb, ...definedFields(source.deepWeb) },
    fetch: { ...target.fetch, ...definedFields(source.fetch) },
    search: { ...target.search, ...definedFields(source.search) },
  };
}

function isPositiveInt(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // LLM
  if (config.llm?.provider !== undefined && !LLM_PROVIDERS.some((p) => p === config.llm?.provider)) {
    errors.push(`llm.provider must be one of: ${LLM_PROVIDERS.join(', ')}`);
  }
  if (config.llm?.maxTokens !== undefined && !isPositiveInt(config.llm.maxTokens)) {
    errors.push('llm.maxTokens must be a positive integer');
  }

  // Pipeline
  if (config.pipeline?.strategy !== undefined && parseStrategy(config.pipeline.strategy) === null) {
    errors.push('pipeline.strategy must be one of: blind, informed, direct');
  }
  if (config.pipeline?.backend !== undefined && parseBackendKind(config.pipeline.backend) === null) {
    errors.push(`pipeline.backend must be one of: ${BACKEND_KINDS.join(', ')}`);
  }
  if (config.pipeline?.maxResults !== undefined && !isPositiveInt(config.pipeline.maxResults)) {
    errors.push('pipeline.maxResults must be a positive integer');
  }
  if (config.pipeline?.synthesisBudget !== undefined && config.pipeline.synthesisBudget < 100) {
    errors.push('pipeline.synthesisBudget should be at least 100');
  }
  if (config.pipeline?.decompositionBudget !== undefined && config.pipeline.decompositionBudget < 100) {
    errors.push('pipeline.decompositionBudget should be at least 100');
  }
  if (config.pipeline?.historyTurns !== undefined && config.pipeline.historyTurns < 0) {
    errors.push('pipeline.historyTurns must be >= 0');
  }

  // Segmenter
  if (config.segmenter?.size !== undefined && !isPositiveInt(config.segmenter.size)) {
    errors.push('segmenter.size must be a positive integer');
  }
  if (config.segmenter?.overlap !== undefined && config.segmenter.overlap < 0) {
    errors.push('segmenter.overlap must be >= 0');
  }
  if (
    config.segmenter?.strategy !== undefined &&
    !CHUNK_STRATEGIES.some((s) => s === config.segmenter?.strategy)
  ) {
    errors.push(`segmenter.strategy must be one of: ${CHUNK_STRATEGIES.join(', ')}`);
  }

  // Deep web
  if (config.deepWeb?.maxUrls !== undefined && !isPositiveInt(config.deepWeb.maxUrls)) {
    errors.push('deepWeb.maxUrls must be a positive integer');
  }
  if (config.deepWeb?.maxWorkers !== undefined && !isPositiveInt(config.deepWeb.maxWorkers)) {
    errors.push('deepWeb.maxWorkers must be a positive integer');
  }

  // Fetch
  if (config.fetch?.timeoutMs !== undefined && !isPositiveInt(config.fetch.timeoutMs)) {
    errors.push('fetch.timeoutMs must be a positive integer');
  }
  if (config.fetch?.maxContentLength !== undefined && !isPositiveInt(config.fetch.maxContentLength)) {
    errors.push('fetch.maxContentLength must be a positive integer');
  }
  if (config.fetch?.minIntervalMs !== undefined && config.fetch.minIntervalMs < 0) {
    errors.push('fetch.minIntervalMs must be >= 0');
  }

  // Search
  if (config.search?.timeoutMs !== undefined && !isPositiveInt(config.search.timeoutMs)) {
    errors.push('search.timeoutMs must be a positive integer');
  }

  return errors;
}

/**
 * Parse a strategy name; 'direct' is the older name for 'blind'.
 */
export function parseStrategy(value: string): Strategy | null {
  if (value === 'direct') return 'blind';
  return STRATEGIES.find((s) => s === value) ?? null;
}

export function parseBackendKind(value: string): BackendKind | null {
  return BACKEND_KINDS.find((k) => k === value) ?? null;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedExternalConfig {
  let config = mergeConfig(EXTERNAL_DEFAULTS, {});

  if (!options.skipUserConfig) {
    const userConfig = loadConfigFile(options.userConfigPath ?? USER_CONFIG_PATH);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  if (!options.skipProjectConfig) {
    const projectConfig = loadConfigFile(options.projectConfigPath ?? projectConfigPath());
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert a resolved ExternalConfig into the runtime PipelineConfig.
 *
 * @throws ConfigError when the config does not validate.
 */
export function toPipelineConfig(external: ResolvedExternalConfig): PipelineConfig {
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const provider = LLM_PROVIDERS.find((p) => p === external.llm.provider) ?? DEFAULT_CONFIG.llm.provider;
  const chunkStrategy: ChunkStrategy =
    CHUNK_STRATEGIES.find((s) => s === external.segmenter.strategy) ?? DEFAULT_CONFIG.segmenter.strategy;

  return {
    llm: { ...external.llm, provider },
    pipeline: {
      ...external.pipeline,
      strategy: parseStrategy(external.pipeline.strategy) ?? DEFAULT_CONFIG.pipeline.strategy,
      backend: parseBackendKind(external.pipeline.backend) ?? DEFAULT_CONFIG.pipeline.backend,
    },
    segmenter: { ...external.segmenter, strategy: chunkStrategy },
    deepWeb: { ...external.deepWeb },
    fetch: { ...external.fetch },
    search: { ...external.search },
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };

/**
 * Shared CLI utilities.
 */

import { loadConfig, toPipelineConfig, type ExternalConfig } from '../config/loader.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { isConfigError } from '../utils/errors.js';

export interface ParsedArgs {
  positionals: string[];
  /** `--name value` flags hold their value; bare `--name` flags hold true. */
  flags: Record<string, string | true>;
}

/**
 * Split arguments into positionals and flags. Names listed in `valueFlags`
 * consume the following argument as their value.
 */
export function parseArgs(args: readonly string[], valueFlags: readonly string[] = []): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], flags: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      parsed.positionals.push(arg);
      continue;
    }
    const name = arg.slice(2);
    const next = args[i + 1];
    if (valueFlags.includes(name) && next !== undefined) {
      parsed.flags[name] = next;
      i++;
    } else {
      parsed.flags[name] = true;
    }
  }
  return parsed;
}

/** String value of a flag, or undefined when absent or bare. */
export function stringFlag(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.flags[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Integer value of a flag. Returns null (not undefined) when present but not an integer.
 */
export function intFlag(parsed: ParsedArgs, name: string): number | null | undefined {
  const value = stringFlag(parsed, name);
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isInteger(n) ? n : null;
}

/**
 * Report a usage error and exit with code 2.
 */
export function usageError(message: string, usage: string): void {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage}`);
  process.exit(2);
}

/**
 * Load and validate the pipeline config. Invalid config is reported and
 * exits with code 3; null is returned in that case.
 */
export function resolvePipelineConfig(overrides?: ExternalConfig): PipelineConfig | null {
  try {
    return toPipelineConfig(loadConfig({ cliOverrides: overrides }));
  } catch (error) {
    if (isConfigError(error)) {
      console.error(`Error: ${error.message}`);
      process.exit(3);
      return null;
    }
    throw error;
  }
}

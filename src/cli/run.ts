/**
 * Top-level argument handling for the `quarry` binary: global flags, help
 * and dispatch to a subcommand.
 */

import { errorMessage } from '../utils/errors.js';
import { setJsonMode, setLogLevel, type LogLevel } from '../utils/logger.js';
import { askCommand } from './commands/ask.js';
import { chunkCommand } from './commands/chunk.js';
import { configCommand } from './commands/config.js';
import type { Command } from './types.js';

export const VERSION = '0.1.0';

export const commands: readonly Command[] = [askCommand, chunkCommand, configCommand];

const GLOBAL_OPTIONS: ReadonlyArray<[flag: string, description: string]> = [
  ['--verbose', 'Log debug output to stderr'],
  ['--quiet', 'Log nothing to stderr'],
  ['--log-json', 'Log one JSON object per line'],
  ['--version', 'Show version'],
  ['--help', 'Show help'],
];

export interface GlobalFlags {
  logLevel?: LogLevel;
  logJson: boolean;
  /** Arguments with the logging flags removed. */
  rest: string[];
}

/**
 * Pull the logging flags out of argv. They may appear anywhere, so
 * `quarry ask --verbose "..."` and `quarry --verbose ask "..."` are the same.
 * When both are given, --quiet wins.
 */
export function extractGlobalFlags(argv: readonly string[]): GlobalFlags {
  const flags: GlobalFlags = { logJson: false, rest: [] };
  let verbose = false;
  let quiet = false;

  for (const arg of argv) {
    if (arg === '--verbose') verbose = true;
    else if (arg === '--quiet') quiet = true;
    else if (arg === '--log-json') flags.logJson = true;
    else flags.rest.push(arg);
  }

  if (quiet) flags.logLevel = 'silent';
  else if (verbose) flags.logLevel = 'debug';
  return flags;
}

export function formatHelp(): string {
  const lines = ['Quarry - query decomposition and retrieval pipeline', '', 'Usage: quarry <command> [options]', ''];
  lines.push('Commands:');
  for (const cmd of commands) {
    lines.push(`  ${cmd.name.padEnd(14)}${cmd.description}`);
  }
  lines.push('', 'Global options:');
  for (const [flag, description] of GLOBAL_OPTIONS) {
    lines.push(`  ${flag.padEnd(14)}${description}`);
  }
  lines.push('', 'Run "quarry <command> --help" for command-specific help.');
  return lines.join('\n');
}

export function formatCommandHelp(command: Command): string {
  const lines = [command.description, '', `Usage: ${command.usage}`];
  if (command.examples && command.examples.length > 0) {
    lines.push('', 'Examples:', ...command.examples.map((example) => `  ${example}`));
  }
  return lines.join('\n');
}

/**
 * Run the CLI against `argv` (without the node and script entries).
 * Exits with 2 on unknown commands and 1 when a command throws.
 */
export async function run(argv: readonly string[]): Promise<void> {
  const { logLevel, logJson, rest } = extractGlobalFlags(argv);
  if (logLevel) setLogLevel(logLevel);
  if (logJson) setJsonMode(true);

  const [commandName, ...commandArgs] = rest;

  if (commandName === '--version' || commandName === '-v') {
    console.log(`quarry ${VERSION}`);
    return;
  }
  if (commandName === undefined || commandName === '--help' || commandName === '-h') {
    console.log(formatHelp());
    return;
  }

  const command = commands.find((c) => c.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "quarry --help" for available commands.');
    process.exit(2);
    return;
  }

  if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
    console.log(formatCommandHelp(command));
    return;
  }

  try {
    await command.handler(commandArgs);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }
}

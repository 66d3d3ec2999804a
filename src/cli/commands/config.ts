import { existsSync } from 'node:fs';
import type { Command } from '../types.js';
import {
  USER_CONFIG_PATH,
  loadConfig,
  projectConfigPath,
  resolvePath,
  validateExternalConfig,
  type ResolvedExternalConfig,
} from '../../config/loader.js';
import { usageError } from '../utils.js';

const USAGE = 'quarry config <show [section]|validate|paths>';

function isSection(config: ResolvedExternalConfig, name: string): name is keyof ResolvedExternalConfig {
  return Object.prototype.hasOwnProperty.call(config, name);
}

function show(section: string | undefined): void {
  const config = loadConfig();
  if (section === undefined) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }
  if (!isSection(config, section)) {
    usageError(`Unknown section: ${section} (expected one of ${Object.keys(config).join(', ')})`, USAGE);
    return;
  }
  console.log(JSON.stringify(config[section], null, 2));
}

function validate(): void {
  const errors = validateExternalConfig(loadConfig());
  if (errors.length === 0) {
    console.log('Configuration is valid.');
    return;
  }
  console.error(`${errors.length} configuration error(s):`);
  for (const error of errors) {
    console.error(`  - ${error}`);
  }
  process.exit(3);
}

/** Config files in the order they are applied; later files win. */
function paths(): void {
  const files: Array<[label: string, path: string]> = [
    ['user', resolvePath(USER_CONFIG_PATH)],
    ['project', projectConfigPath()],
  ];
  for (const [label, path] of files) {
    console.log(`${label.padEnd(8)}${path}${existsSync(path) ? '' : ' (not found)'}`);
  }
  console.log('Environment variables (QUARRY_*) and CLI flags are applied on top.');
}

export const configCommand: Command = {
  name: 'config',
  description: 'Show, validate or locate configuration',
  usage: USAGE,
  examples: ['quarry config show pipeline', 'QUARRY_PIPELINE_STRATEGY=informed quarry config validate'],
  handler: async (args) => {
    const [subcommand, section] = args;

    switch (subcommand) {
      case 'show':
        show(section);
        break;
      case 'validate':
        validate();
        break;
      case 'paths':
        paths();
        break;
      default:
        usageError(subcommand ? `Unknown subcommand: ${subcommand}` : 'Subcommand required', USAGE);
    }
  },
};

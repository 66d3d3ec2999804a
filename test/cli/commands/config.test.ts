/**
 * Tests for the config CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('node:fs', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:fs')>()),
  existsSync: vi.fn(),
}));

vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadConfig: vi.fn(),
  validateExternalConfig: vi.fn(),
  projectConfigPath: vi.fn(() => '/work/site/quarry.config.json'),
}));

import { existsSync } from 'node:fs';
import { configCommand } from '../../../src/cli/commands/config.js';
import { loadConfig, resolvePath, validateExternalConfig } from '../../../src/config/loader.js';
import { DEFAULT_CONFIG } from '../../../src/config/pipeline-config.js';

const mockLoadConfig = vi.mocked(loadConfig);
const mockValidate = vi.mocked(validateExternalConfig);
const mockExists = vi.mocked(existsSync);

const RESOLVED = {
  llm: { ...DEFAULT_CONFIG.llm },
  pipeline: { ...DEFAULT_CONFIG.pipeline, strategy: 'informed' },
  segmenter: { ...DEFAULT_CONFIG.segmenter },
  deepWeb: { ...DEFAULT_CONFIG.deepWeb },
  fetch: { ...DEFAULT_CONFIG.fetch },
  search: { ...DEFAULT_CONFIG.search },
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  mockLoadConfig.mockReturnValue(RESOLVED);
});

describe('config show', () => {
  it('prints the whole resolved configuration', async () => {
    await configCommand.handler(['show']);

    expect(console.log).toHaveBeenCalledWith(JSON.stringify(RESOLVED, null, 2));
  });

  it('prints a single section', async () => {
    await configCommand.handler(['show', 'pipeline']);

    expect(console.log).toHaveBeenCalledWith(JSON.stringify(RESOLVED.pipeline, null, 2));
  });

  it('rejects an unknown section with code 2', async () => {
    await configCommand.handler(['show', 'storage']);

    expect(console.error).toHaveBeenCalledWith(
      'Error: Unknown section: storage (expected one of llm, pipeline, segmenter, deepWeb, fetch, search)',
    );
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

describe('config validate', () => {
  it('reports a valid configuration', async () => {
    mockValidate.mockReturnValue([]);

    await configCommand.handler(['validate']);

    expect(mockValidate).toHaveBeenCalledWith(RESOLVED);
    expect(console.log).toHaveBeenCalledWith('Configuration is valid.');
    expect(process.exit).not.toHaveBeenCalled();
  });

  it('lists errors and exits with code 3', async () => {
    mockValidate.mockReturnValue([
      'pipeline.maxResults must be a positive integer',
      'deepWeb.maxWorkers must be a positive integer',
    ]);

    await configCommand.handler(['validate']);

    expect(console.error).toHaveBeenCalledWith('2 configuration error(s):');
    expect(console.error).toHaveBeenCalledWith('  - pipeline.maxResults must be a positive integer');
    expect(console.error).toHaveBeenCalledWith('  - deepWeb.maxWorkers must be a positive integer');
    expect(process.exit).toHaveBeenCalledWith(3);
  });
});

describe('config paths', () => {
  it('lists the config files and marks missing ones', async () => {
    mockExists.mockImplementation((path) => path === '/work/site/quarry.config.json');

    await configCommand.handler(['paths']);

    expect(console.log).toHaveBeenCalledWith(`user    ${resolvePath('~/.quarry/config.json')} (not found)`);
    expect(console.log).toHaveBeenCalledWith('project /work/site/quarry.config.json');
  });
});

describe('config subcommands', () => {
  it('rejects an unknown subcommand with code 2', async () => {
    await configCommand.handler(['edit']);

    expect(console.error).toHaveBeenCalledWith('Error: Unknown subcommand: edit');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('requires a subcommand', async () => {
    await configCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: Subcommand required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });
});

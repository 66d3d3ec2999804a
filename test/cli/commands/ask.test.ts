/**
 * Tests for the ask CLI command handler.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../src/cli/utils.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/cli/utils.js')>()),
  resolvePipelineConfig: vi.fn(),
}));

vi.mock('../../../src/llm/factory.js', () => ({
  createCompletionProvider: vi.fn(),
}));

vi.mock('../../../src/retrieval/factory.js', () => ({
  createRetrievalBackend: vi.fn(),
}));

import { askCommand } from '../../../src/cli/commands/ask.js';
import { resolvePipelineConfig } from '../../../src/cli/utils.js';
import { createCompletionProvider } from '../../../src/llm/factory.js';
import { createRetrievalBackend } from '../../../src/retrieval/factory.js';
import { WebRetrieval } from '../../../src/retrieval/web-backend.js';
import { ConfigError } from '../../../src/utils/errors.js';
import { ScriptedCompletion, StaticSearchEngine, hit, testConfig } from '../../test-utils.js';

const mockResolvePipelineConfig = vi.mocked(resolvePipelineConfig);
const mockCreateCompletionProvider = vi.mocked(createCompletionProvider);
const mockCreateRetrievalBackend = vi.mocked(createRetrievalBackend);

const config = testConfig();

function wirePipeline(): ScriptedCompletion {
  const completion = new ScriptedCompletion((prompt) => {
    if (prompt.startsWith('You are an expert at breaking down')) return '- granite composition';
    if (prompt.startsWith('You are tasked with synthesizing')) return 'Granite is a coarse igneous rock.';
    return 'Mostly quartz and feldspar.';
  });
  mockCreateCompletionProvider.mockReturnValue(completion);
  mockCreateRetrievalBackend.mockReturnValue(
    new WebRetrieval(new StaticSearchEngine([hit('a'), hit('b')]), completion, config.llm),
  );
  return completion;
}

function logged(): unknown[] {
  return vi.mocked(console.log).mock.calls.map((call) => call[0]);
}

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
  vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
  mockResolvePipelineConfig.mockReturnValue(config);
});

describe('askCommand', () => {
  it('has correct name and usage', () => {
    expect(askCommand.name).toBe('ask');
    expect(askCommand.usage).toContain('--strategy blind|informed');
    expect(askCommand.usage).toContain('--backend web|deep_web');
  });

  it('prints the answer, subqueries and sources', async () => {
    wirePipeline();

    await askCommand.handler(['What', 'is', 'granite?', '--strategy', 'blind']);

    expect(mockResolvePipelineConfig).toHaveBeenCalledWith({
      pipeline: { strategy: 'blind', backend: undefined, maxResults: undefined },
    });
    expect(mockCreateRetrievalBackend).toHaveBeenCalledWith('web', { completion: expect.anything() }, config);
    expect(logged()).toEqual([
      'Granite is a coarse igneous rock.',
      '',
      'Subqueries:',
      '  - granite composition',
      '',
      'Sources:',
      '  - https://a.example/',
      '  - https://b.example/',
    ]);
  });

  it('prints the serialized result with --json', async () => {
    wirePipeline();

    await askCommand.handler(['What is granite?', '--json', '--max-results', '2']);

    expect(mockResolvePipelineConfig).toHaveBeenCalledWith({
      pipeline: { strategy: undefined, backend: undefined, maxResults: 2 },
    });
    const output = JSON.parse(String(logged()[0]));
    expect(output.original_query).toBe('What is granite?');
    expect(output.subqueries).toEqual(['granite composition']);
    expect(output.final_answer).toBe('Granite is a coarse igneous rock.');
    expect(output.backend).toBe('web');
    expect(output.model_info).toEqual({ provider: 'test', model: 'scripted' });
    expect(output.contexts[0].subquery).toBe('granite composition');
  });

  it('requires a query', async () => {
    await askCommand.handler(['--json']);

    expect(console.error).toHaveBeenCalledWith('Error: Query required');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockResolvePipelineConfig).not.toHaveBeenCalled();
  });

  it('rejects an unknown strategy', async () => {
    await askCommand.handler(['q', '--strategy', 'clever']);

    expect(console.error).toHaveBeenCalledWith('Error: Unknown strategy: clever');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('rejects the document backend', async () => {
    await askCommand.handler(['q', '--backend', 'document']);

    expect(console.error).toHaveBeenCalledWith('Error: Unsupported backend: document');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('rejects a non-positive --max-results', async () => {
    await askCommand.handler(['q', '--max-results', '0']);

    expect(console.error).toHaveBeenCalledWith('Error: --max-results must be a positive integer');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('rejects a configured document backend', async () => {
    mockResolvePipelineConfig.mockReturnValue(testConfig({ backend: 'document' }));

    await askCommand.handler(['q']);

    expect(console.error).toHaveBeenCalledWith('Error: The document backend is not available from the CLI');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockCreateCompletionProvider).not.toHaveBeenCalled();
  });

  it('exits with code 3 when the provider cannot be built', async () => {
    mockCreateCompletionProvider.mockImplementation(() => {
      throw new ConfigError('No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.', 'MISSING_REQUIRED');
    });

    await askCommand.handler(['q']);

    expect(console.error).toHaveBeenCalledWith(
      'Error: No Anthropic API key found. Set the ANTHROPIC_API_KEY environment variable.',
    );
    expect(process.exit).toHaveBeenCalledWith(3);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('stops when the configuration is invalid', async () => {
    mockResolvePipelineConfig.mockReturnValue(null);

    await askCommand.handler(['q']);

    expect(mockCreateCompletionProvider).not.toHaveBeenCalled();
  });
});

/**
 * Tests for the chunk CLI command handler.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/cli/utils.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/cli/utils.js')>()),
  resolvePipelineConfig: vi.fn(),
}));

import { chunkCommand } from '../../../src/cli/commands/chunk.js';
import { resolvePipelineConfig } from '../../../src/cli/utils.js';
import { DEFAULT_CONFIG } from '../../../src/config/pipeline-config.js';

const mockResolvePipelineConfig = vi.mocked(resolvePipelineConfig);

describe('chunkCommand', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    mockResolvePipelineConfig.mockReturnValue(DEFAULT_CONFIG);

    dir = mkdtempSync(join(tmpdir(), 'quarry-chunk-'));
    file = join(dir, 'notes.txt');
    writeFileSync(file, 'A. B. C. D.');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('prints each chunk with its span', async () => {
    await chunkCommand.handler([file, '--size', '5', '--overlap', '2']);

    expect(vi.mocked(console.log).mock.calls.map((call) => call[0])).toEqual([
      '--- chunk 0 [0, 5) ---',
      'A. B.',
      '--- chunk 1 [3, 8) ---',
      'B. C.',
      '--- chunk 2 [6, 11) ---',
      'C. D.',
      '3 chunks.',
    ]);
  });

  it('prints JSON with --json', async () => {
    await chunkCommand.handler([file, '--size', '5', '--overlap', '0', '--json']);

    const output = String(vi.mocked(console.log).mock.calls[0][0]);
    expect(JSON.parse(output)).toEqual([
      { index: 0, text: 'A. B.', start: 0, end: 5, overlapsPrevious: false },
      { index: 1, text: 'C. D.', start: 6, end: 11, overlapsPrevious: false },
    ]);
  });

  it('uses the configured segmenter defaults', async () => {
    await chunkCommand.handler([file]);

    expect(vi.mocked(console.log).mock.calls.map((call) => call[0])).toEqual([
      '--- chunk 0 [0, 11) ---',
      'A. B. C. D.',
      '1 chunks.',
    ]);
  });

  it('requires a file', async () => {
    await chunkCommand.handler([]);

    expect(console.error).toHaveBeenCalledWith('Error: File required');
    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('rejects invalid options', async () => {
    await chunkCommand.handler([file, '--strategy', 'words']);

    expect(console.error).toHaveBeenCalledWith('Error: Invalid --size, --overlap or --strategy');
    expect(process.exit).toHaveBeenCalledWith(2);
    expect(mockResolvePipelineConfig).not.toHaveBeenCalled();
  });

  it('reports an unreadable file', async () => {
    const missing = join(dir, 'missing.txt');

    await chunkCommand.handler([missing]);

    expect(console.error).toHaveBeenCalledWith(expect.stringContaining(`Error: Cannot read ${missing}: `));
    expect(process.exit).toHaveBeenCalledWith(1);
    expect(console.log).not.toHaveBeenCalled();
  });

  it('stops when the configuration is invalid', async () => {
    mockResolvePipelineConfig.mockReturnValue(null);

    await chunkCommand.handler([file]);

    expect(console.log).not.toHaveBeenCalled();
  });
});

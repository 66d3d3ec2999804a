import { readFileSync } from 'node:fs';
import type { Command } from '../types.js';
import { chunkText } from '../../segment/segmenter.js';
import { CHUNK_STRATEGIES } from '../../segment/types.js';
import { errorMessage } from '../../utils/errors.js';
import { intFlag, parseArgs, resolvePipelineConfig, stringFlag, usageError } from '../utils.js';

const USAGE = 'quarry chunk <file> [--size <n>] [--overlap <n>] [--strategy sentence|paragraph|fixed] [--json]';

export const chunkCommand: Command = {
  name: 'chunk',
  description: 'Split a text file into overlapping chunks',
  usage: USAGE,
  examples: ['quarry chunk notes.txt --size 800 --overlap 100', 'quarry chunk report.md --strategy paragraph --json'],
  handler: async (args) => {
    const parsed = parseArgs(args, ['size', 'overlap', 'strategy']);
    const file = parsed.positionals[0];
    if (!file) {
      usageError('File required', USAGE);
      return;
    }

    const size = intFlag(parsed, 'size');
    const overlap = intFlag(parsed, 'overlap');
    const strategyFlag = stringFlag(parsed, 'strategy');
    const strategy = CHUNK_STRATEGIES.find((s) => s === strategyFlag);
    if (size === null || overlap === null || (strategyFlag !== undefined && !strategy)) {
      usageError('Invalid --size, --overlap or --strategy', USAGE);
      return;
    }

    const config = resolvePipelineConfig();
    if (!config) return;
    const defaults = config.segmenter;

    let text: string;
    try {
      text = readFileSync(file, 'utf-8');
    } catch (error) {
      console.error(`Error: Cannot read ${file}: ${errorMessage(error)}`);
      process.exit(1);
      return;
    }

    const chunks = chunkText(text, {
      size: size ?? defaults.size,
      overlap: overlap ?? defaults.overlap,
      strategy: strategy ?? defaults.strategy,
    });

    if (parsed.flags.json) {
      console.log(JSON.stringify(chunks, null, 2));
      return;
    }

    for (const chunk of chunks) {
      console.log(`--- chunk ${chunk.index} [${chunk.start}, ${chunk.end}) ---`);
      console.log(chunk.text);
    }
    console.log(`${chunks.length} chunks.`);
  },
};

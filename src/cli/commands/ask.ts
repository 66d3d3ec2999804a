import type { Command } from '../types.js';
import { parseBackendKind, parseStrategy } from '../../config/loader.js';
import { createCompletionProvider } from '../../llm/factory.js';
import { StrategyController } from '../../pipeline/controller.js';
import { serializePipelineResult } from '../../pipeline/serialize.js';
import type { PipelineResult } from '../../pipeline/types.js';
import { createRetrievalBackend } from '../../retrieval/factory.js';
import { isConfigError } from '../../utils/errors.js';
import { intFlag, parseArgs, resolvePipelineConfig, stringFlag, usageError } from '../utils.js';

const USAGE =
  'quarry ask <query> [--strategy blind|informed] [--backend web|deep_web] [--max-results <n>] [--json]';

function printResult(result: PipelineResult): void {
  console.log(result.finalAnswer);
  console.log('');
  console.log('Subqueries:');
  for (const subquery of result.subqueries) {
    console.log(`  - ${subquery.text}`);
  }

  const sources = [...new Set(result.contexts.map((c) => c.url ?? c.title))];
  if (sources.length > 0) {
    console.log('');
    console.log('Sources:');
    for (const source of sources) {
      console.log(`  - ${source}`);
    }
  }

  if (result.issues.length > 0) {
    console.log('');
    console.log(`${result.issues.length} issue(s) during the run; use --json for details.`);
  }
}

export const askCommand: Command = {
  name: 'ask',
  description: 'Answer a question through the retrieval pipeline',
  usage: USAGE,
  examples: [
    'quarry ask "Compare solar and wind output in northern Europe"',
    'quarry ask "Who maintains the Rust compiler?" --strategy informed --json',
    'quarry ask "History of the printing press" --backend deep_web --max-results 3',
  ],
  handler: async (args) => {
    const parsed = parseArgs(args, ['strategy', 'backend', 'max-results']);
    const query = parsed.positionals.join(' ').trim();
    if (!query) {
      usageError('Query required', USAGE);
      return;
    }

    const strategyFlag = stringFlag(parsed, 'strategy');
    const backendFlag = stringFlag(parsed, 'backend');
    const maxResults = intFlag(parsed, 'max-results');

    if (strategyFlag !== undefined && parseStrategy(strategyFlag) === null) {
      usageError(`Unknown strategy: ${strategyFlag}`, USAGE);
      return;
    }
    // The document backend needs an index binding, which the CLI does not have
    const backend = backendFlag === undefined ? undefined : parseBackendKind(backendFlag);
    if (backend === null || backend === 'document') {
      usageError(`Unsupported backend: ${backendFlag}`, USAGE);
      return;
    }
    if (maxResults === null || (maxResults !== undefined && maxResults < 1)) {
      usageError('--max-results must be a positive integer', USAGE);
      return;
    }

    const config = resolvePipelineConfig({
      pipeline: { strategy: strategyFlag, backend, maxResults },
    });
    if (!config) return;
    if (config.pipeline.backend === 'document') {
      usageError('The document backend is not available from the CLI', USAGE);
      return;
    }

    let controller: StrategyController;
    try {
      const completion = createCompletionProvider(config.llm);
      controller = new StrategyController({
        backend: createRetrievalBackend(config.pipeline.backend, { completion }, config),
        completion,
        config,
      });
    } catch (error) {
      if (isConfigError(error)) {
        console.error(`Error: ${error.message}`);
        process.exit(3);
        return;
      }
      throw error;
    }

    const result = await controller.run(query);

    if (parsed.flags.json) {
      console.log(JSON.stringify(serializePipelineResult(result), null, 2));
    } else {
      printResult(result);
    }
  },
};

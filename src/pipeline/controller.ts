/**
 * Strategy controller: the state machine behind one pipeline run.
 *
 *   init → [initial_retrieval] → decompose → fan_out → aggregate → synthesize → done
 *
 * `initial_retrieval` runs only for the informed strategy. Every stage is
 * guarded; a failing stage records a `stage_failure` issue and the run
 * continues with a degraded value, so `done` is always reached.
 */

import type { PipelineConfig } from '../config/pipeline-config.js';
import type { CompletionProvider } from '../llm/completion-provider.js';
import type { RetrievalBackend, RetrievalIssue, RetrievalOutcome } from '../retrieval/backend.js';
import { PipelineError, errorMessage } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { collectContexts, formatContextsForPrompt } from './aggregator.js';
import { formatConversation } from './conversation.js';
import { Decomposer, type DecompositionOutcome } from './decomposer.js';
import { FanOutExecutor, type FanOutResult } from './fan-out.js';
import { Synthesizer, synthesisFailureAnswer, type SynthesisOutcome } from './synthesizer.js';
import type {
  Context,
  PipelineIssue,
  PipelineResult,
  PipelineStage,
  Query,
  Strategy,
} from './types.js';

const log = createLogger('controller');

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  init: ['initial_retrieval', 'decompose'],
  initial_retrieval: ['decompose'],
  decompose: ['fan_out'],
  fan_out: ['aggregate'],
  aggregate: ['synthesize'],
  synthesize: ['done'],
  done: [],
};

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Per-run state. Each run gets a fresh instance, so concurrent runs never
 * share accumulators.
 */
class PipelineRun {
  readonly stages: PipelineStage[] = ['init'];
  readonly issues: PipelineIssue[] = [];
  readonly startedAt = Date.now();

  /** Tags every line with the run number, since concurrent runs interleave. */
  constructor(readonly log: Logger) {}

  get stage(): PipelineStage {
    return this.stages[this.stages.length - 1];
  }

  advance(to: PipelineStage): void {
    if (!canTransition(this.stage, to)) {
      throw new PipelineError(`Illegal transition ${this.stage} → ${to}`, 'ILLEGAL_TRANSITION');
    }
    this.stages.push(to);
  }

  record(issues: readonly RetrievalIssue[]): void {
    this.issues.push(...issues.map((issue): PipelineIssue => ({ ...issue, stage: this.stage })));
  }

  /** Run a stage body; on failure record it and use the fallback instead. */
  async guard<T>(body: () => Promise<T>, fallback: () => T): Promise<T> {
    try {
      return await body();
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`Stage ${this.stage} failed`, { error: message });
      this.issues.push({ kind: 'stage_failure', stage: this.stage, message });
      return fallback();
    }
  }
}

export interface RunOptions {
  /** Default: `pipeline.strategy`. */
  strategy?: Strategy;
  /** Default: `pipeline.maxResults`. */
  maxResults?: number;
}

export interface StrategyControllerDeps {
  backend: RetrievalBackend;
  completion: CompletionProvider;
  config: PipelineConfig;
  decomposer?: Decomposer;
  fanOut?: FanOutExecutor;
  synthesizer?: Synthesizer;
}

export class StrategyController {
  private readonly backend: RetrievalBackend;
  private readonly completion: CompletionProvider;
  private readonly config: PipelineConfig;
  private readonly decomposer: Decomposer;
  private readonly fanOut: FanOutExecutor;
  private readonly synthesizer: Synthesizer;
  private runSequence = 0;

  constructor(deps: StrategyControllerDeps) {
    this.backend = deps.backend;
    this.completion = deps.completion;
    this.config = deps.config;
    this.decomposer =
      deps.decomposer ??
      new Decomposer(deps.completion, { decompositionBudget: deps.config.pipeline.decompositionBudget });
    this.fanOut = deps.fanOut ?? new FanOutExecutor(deps.backend);
    this.synthesizer =
      deps.synthesizer ?? new Synthesizer(deps.completion, { synthesisBudget: deps.config.pipeline.synthesisBudget });
  }

  /**
   * Run the pipeline for one query. Never rejects.
   */
  async run(input: Query | string, options: RunOptions = {}): Promise<PipelineResult> {
    const { pipeline } = this.config;
    const strategy = options.strategy ?? pipeline.strategy;
    const maxResults = options.maxResults ?? pipeline.maxResults;
    const isWebSearch = this.backend.kind !== 'document';

    const q = typeof input === 'string' ? { text: input } : input;
    const query = formatConversation(q.text, q.history, pipeline.historyTurns);
    const run = new PipelineRun(log.child({ run: ++this.runSequence }));

    run.log.info(`Running ${strategy} pipeline on ${this.backend.kind} backend`);

    // Initial retrieval (informed only)
    let initial: RetrievalOutcome | null = null;
    if (strategy === 'informed') {
      run.advance('initial_retrieval');
      initial = await run.guard<RetrievalOutcome | null>(() => this.backend.retrieve(query, maxResults), () => null);
      if (initial) run.record(initial.issues);
    }
    // Deep web decomposes blind when no page was summarised; the other
    // backends keep an empty initial outcome as the prior.
    const prior =
      initial && (initial.contexts.length > 0 || this.backend.kind !== 'deep_web') ? initial : null;
    if (initial && !prior) {
      run.log.warn('Initial retrieval summarised no pages, decomposing without it');
    }

    // Decompose
    run.advance('decompose');
    const decomposition = await run.guard(
      () => this.decomposer.decompose(query, prior ? 'informed' : 'blind', { isWebSearch, prior: prior ?? undefined }),
      (): DecompositionOutcome => ({
        subqueries: [{ text: query, strategy, origin: 'fallback' }],
        usedFallback: true,
      }),
    );
    if (decomposition.usedFallback) {
      run.issues.push({
        kind: 'decomposition_failure',
        stage: 'decompose',
        message: 'No subqueries parsed; using fallback subqueries',
      });
    }
    const subqueries = decomposition.subqueries;

    // Fan out
    run.advance('fan_out');
    const fanOut = await run.guard(
      () => this.fanOut.execute(subqueries, maxResults, prior ? { query, outcome: prior } : undefined),
      (): FanOutResult => ({ intermediateResults: [], contexts: [], issues: [] }),
    );
    run.issues.push(...fanOut.issues);
    const intermediateResults = fanOut.intermediateResults;

    // Aggregate
    run.advance('aggregate');
    const aggregated = await run.guard(
      async () => {
        const contexts = collectContexts(intermediateResults);
        return { contexts, evidence: formatContextsForPrompt(contexts, pipeline.synthesisBudget) };
      },
      (): { contexts: Context[]; evidence: string } => ({ contexts: fanOut.contexts, evidence: '' }),
    );

    // Synthesize
    run.advance('synthesize');
    const synthesis = await run.guard(
      () => this.synthesizer.synthesize(query, intermediateResults, isWebSearch, aggregated.evidence),
      (): SynthesisOutcome => ({ answer: synthesisFailureAnswer(query, 'synthesis stage failed'), failed: true }),
    );
    if (synthesis.failed) {
      run.issues.push({ kind: 'synthesis_failure', stage: 'synthesize', message: synthesis.answer });
    }

    run.advance('done');
    const durationMs = Date.now() - run.startedAt;
    run.log.info(`Pipeline finished in ${durationMs}ms`, {
      subqueries: subqueries.length,
      contexts: aggregated.contexts.length,
      issues: run.issues.length,
    });

    return {
      query,
      subqueries,
      intermediateResults,
      contexts: aggregated.contexts,
      finalAnswer: synthesis.answer,
      strategy,
      backend: this.backend.kind,
      model: this.completion.descriptor,
      stages: run.stages,
      issues: run.issues,
      durationMs,
    };
  }
}

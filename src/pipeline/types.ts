/**
 * Types shared across a pipeline run.
 */

/** Decomposition mode: blind (direct) or steered by a first-pass retrieval. */
export type Strategy = 'blind' | 'informed';

export const STRATEGIES: readonly Strategy[] = ['blind', 'informed'];

/** Where a piece of evidence came from. */
export type SourceType = 'document' | 'web' | 'deep_web';

/** Retrieval backend variants. */
export type BackendKind = SourceType;

export interface ConversationTurn {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface Query {
  text: string;
  /** Prior turns, oldest first. */
  history?: ConversationTurn[];
}

/**
 * How a subquery came to exist.
 * - decomposed: parsed from the completion provider's decomposition
 * - fallback: deterministic substitute when decomposition produced nothing
 * - initial: the synthetic first-pass entry of the informed strategy
 */
export type SubqueryOrigin = 'decomposed' | 'fallback' | 'initial';

export interface Subquery {
  text: string;
  strategy: Strategy;
  origin: SubqueryOrigin;
}

/**
 * Evidence as a backend returns it.
 */
export interface RetrievedContext {
  sourceId: string;
  title: string;
  content: string;
  /** Relevance in [0, 1]. */
  score: number;
  sourceType: SourceType;
  url?: string;
}

/**
 * Evidence attributed to the subquery that retrieved it.
 */
export interface Context extends RetrievedContext {
  subquery: string;
}

export interface IntermediateResult {
  subquery: Subquery;
  answer: string;
  contexts: Context[];
}

/** Pipeline states, in the order a run passes through them. */
export type PipelineStage =
  | 'init'
  | 'initial_retrieval'
  | 'decompose'
  | 'fan_out'
  | 'aggregate'
  | 'synthesize'
  | 'done';

export type IssueKind =
  | 'decomposition_failure'
  | 'retrieval_failure'
  | 'fetch_failure'
  | 'synthesis_failure'
  | 'stage_failure';

/**
 * A degraded-but-recovered problem encountered during a run.
 */
export interface PipelineIssue {
  kind: IssueKind;
  stage: PipelineStage;
  message: string;
  subquery?: string;
}

export interface ModelDescriptor {
  provider: string;
  model: string;
}

export interface PipelineResult {
  /** The query that was run, after folding in conversation history. */
  query: string;
  /** Subqueries in processing order, without the synthetic initial entry. */
  subqueries: Subquery[];
  intermediateResults: IntermediateResult[];
  /** All contexts, flattened in processing order. */
  contexts: Context[];
  finalAnswer: string;
  strategy: Strategy;
  backend: BackendKind;
  model: ModelDescriptor;
  /** States visited, ending in 'done'. */
  stages: PipelineStage[];
  issues: PipelineIssue[];
  durationMs: number;
}

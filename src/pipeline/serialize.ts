/**
 * Wire form of a pipeline result for presentation layers (snake_case).
 */

import type { Context, IntermediateResult, PipelineIssue, PipelineResult } from './types.js';

export interface SerializedContext {
  source_id: string;
  title: string;
  content: string;
  relevance_score: number;
  source_type: string;
  url?: string;
  subquery: string;
}

export interface SerializedIntermediateResult {
  subquery: string;
  answer: string;
  contexts: SerializedContext[];
}

export interface SerializedPipelineResult {
  original_query: string;
  subqueries: string[];
  intermediate_results: SerializedIntermediateResult[];
  contexts: SerializedContext[];
  final_answer: string;
  strategy: string;
  backend: string;
  model_info: { provider: string; model: string };
  issues: PipelineIssue[];
}

export function serializeContext(context: Context): SerializedContext {
  return {
    source_id: context.sourceId,
    title: context.title,
    content: context.content,
    relevance_score: context.score,
    source_type: context.sourceType,
    ...(context.url !== undefined ? { url: context.url } : {}),
    subquery: context.subquery,
  };
}

function serializeIntermediate(result: IntermediateResult): SerializedIntermediateResult {
  return {
    subquery: result.subquery.text,
    answer: result.answer,
    contexts: result.contexts.map(serializeContext),
  };
}

export function serializePipelineResult(result: PipelineResult): SerializedPipelineResult {
  return {
    original_query: result.query,
    subqueries: result.subqueries.map((s) => s.text),
    intermediate_results: result.intermediateResults.map(serializeIntermediate),
    contexts: result.contexts.map(serializeContext),
    final_answer: result.finalAnswer,
    strategy: result.strategy,
    backend: result.backend,
    model_info: { provider: result.model.provider, model: result.model.model },
    issues: result.issues,
  };
}

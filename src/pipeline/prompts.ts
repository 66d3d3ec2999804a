/**
 * Prompt builders for decomposition, per-source answers and synthesis.
 */

import type { DocumentHit } from '../retrieval/document-backend.js';
import type { WebSearchHit } from '../retrieval/web-backend.js';

/** Max tokens for decomposition completions. */
export const DECOMPOSE_MAX_TOKENS = 500;
/** Max tokens for the final synthesis. */
export const SYNTHESIS_MAX_TOKENS = 1000;
/** Max tokens for one page summary. */
export const PAGE_ANALYSIS_MAX_TOKENS = 500;
/** Max tokens for the per-subquery answer over page summaries. */
export const SUBQUERY_ANALYSIS_MAX_TOKENS = 600;

const lines = (...parts: string[]): string => parts.join('\n');

export function buildBlindDecompositionPrompt(query: string, isWebSearch: boolean): string {
  if (isWebSearch) {
    return lines(
      'You are an expert at breaking down complex questions into effective web search queries.',
      '',
      `Original Query: ${query}`,
      '',
      'Please break this query down into 2-4 specific, focused search queries that together will help answer the original question completely.',
      'Each search query should:',
      '1. Be phrased to maximize relevant search engine results',
      '2. Focus on a particular aspect of the original query',
      '3. Use search engine-friendly syntax (short, precise terms without unnecessary words)',
      '4. Avoid complex language that would reduce search effectiveness',
      '',
      'Format your response as a bulleted list with ONLY the search queries, nothing else.',
    );
  }
  return lines(
    'You are an expert at breaking down complex questions into simpler, more focused subqueries.',
    '',
    `Original Query: ${query}`,
    '',
    'Please break this query down into 2-4 specific, focused subqueries that together will help answer the original question completely.',
    'Each subquery should:',
    '1. Be self-contained and specific',
    '2. Focus on a particular aspect of the original query',
    '3. Be phrased as a complete question',
    '',
    'Format your response as a bulleted list with ONLY the subqueries, nothing else.',
  );
}

/**
 * @param initialResults - prior contexts and answer, already formatted and budgeted
 */
export function buildInformedDecompositionPrompt(
  query: string,
  initialResults: string,
  isWebSearch: boolean,
): string {
  const searchType = isWebSearch ? 'web search' : 'search';
  const queryType = isWebSearch ? 'search queries' : 'questions';
  const styleRules = isWebSearch
    ? [
        '- Be phrased to maximize relevant search engine results',
        '- Use search engine-friendly syntax (short, precise terms without unnecessary words)',
      ]
    : ['- Be self-contained and specific', '- Be phrased as a complete question'];

  return lines(
    `You are an expert at breaking down complex questions into effective ${queryType}.`,
    '',
    `Original Query: ${query}`,
    '',
    `I've already done an initial ${searchType} and found some information, but we need to explore further:`,
    '',
    'Initial Results:',
    initialResults,
    '',
    `Based on what we've found so far, please identify 2-3 specific, focused follow-up ${queryType} that would help us:`,
    '1. Fill in important missing information not covered in the initial search',
    "2. Explore specific aspects of the query that weren't fully addressed",
    '3. Resolve any ambiguities or contradictions in the initial results',
    '',
    'Each query should:',
    '- Be focused on gathering new information not already covered',
    '- NOT duplicate information we already have from the initial search',
    ...styleRules,
    '',
    'Format your response as a bulleted list with ONLY the queries, nothing else.',
  );
}

export function buildDocumentAnswerPrompt(query: string, hits: readonly DocumentHit[]): string {
  const context = hits
    .map((hit, i) => `[${i + 1}] From document '${hit.title}':\n${hit.content}`)
    .join('\n\n');

  return lines(
    'When answering the question, always review the context provided below.',
    'If relevant information is found in the context, prioritize and incorporate it into your answer, ' +
      'citing references to the source documents where applicable with the document title.',
    "If the context does not contain sufficient or relevant details, don't answer and state there is no relevant context.",
    '',
    'Context information:',
    '',
    context,
    '',
    `Question: ${query}`,
  );
}

export function formatWebResults(hits: readonly WebSearchHit[]): string {
  if (hits.length === 0) return 'No web search results found.';
  return hits.map((hit, i) => `[${i + 1}] ${hit.title}\nURL: ${hit.url}\n${hit.snippet}`).join('\n\n');
}

export function buildWebAnswerPrompt(query: string, hits: readonly WebSearchHit[]): string {
  return lines(
    `Based on the following web search results for the query: "${query}",`,
    'provide a comprehensive and well-structured answer.',
    '',
    'Web search results:',
    formatWebResults(hits),
    '',
    'Your answer should:',
    '1. Directly address the original query',
    '2. Integrate information from multiple sources when available',
    '3. Note any conflicting information found and provide a balanced perspective',
    "4. Acknowledge if the search results don't fully answer the query",
  );
}

export interface PageForAnalysis {
  title: string;
  url: string;
  content: string;
}

export function buildPageAnalysisPrompt(query: string, page: PageForAnalysis): string {
  return lines(
    'You are a web content analyst specialized in extracting relevant information from web pages.',
    '',
    `Please analyze the following web page content and extract key information relevant to: "${query}"`,
    '',
    `Web Page: ${page.title}`,
    `URL: ${page.url}`,
    '',
    'Content:',
    page.content,
    '',
    'Provide:',
    '1. A concise summary of the content (2-3 sentences)',
    '2. 3-5 key facts or points that are most relevant to the query',
    '3. An assessment of how well this content answers the query (high/medium/low)',
    '',
    'Format your response with clear sections. Only include information present in the content.',
  );
}

export interface PageSummary {
  title: string;
  url: string;
  summary: string;
}

export function buildSubqueryAnalysisPrompt(subquery: string, summaries: readonly PageSummary[]): string {
  const sources = summaries
    .map((s, i) => `Source ${i + 1}: ${s.title}\nURL: ${s.url}\n${s.summary}`)
    .join('\n\n');

  return lines(
    `Based on the following web content analyses for the query: "${subquery}",`,
    'please provide a concise, focused answer that specifically addresses this query.',
    '',
    'Analyzed web content:',
    sources,
    '',
    'Your response should:',
    `1. Focus specifically on answering "${subquery}"`,
    '2. Integrate information from all relevant sources',
    '3. Be concise but complete',
    '4. Cite sources with URLs where appropriate',
    '5. Indicate confidence level for your answer (high/medium/low)',
  );
}

export interface SynthesisEntry {
  subquery: string;
  answer: string;
}

export function buildSynthesisPrompt(
  query: string,
  entries: readonly SynthesisEntry[],
  evidence: string,
  isWebSearch: boolean,
): string {
  const label = isWebSearch ? 'Search Query' : 'Subquery';
  const results = entries
    .map((entry, i) => `${label} ${i + 1}: ${entry.subquery}\nResults: ${entry.answer}`)
    .join('\n\n');

  const citationRules = isWebSearch
    ? [
        '6. Includes proper citations to web sources including URLs in parentheses',
        '7. Notes any conflicting information found and provides a balanced perspective',
      ]
    : [
        '6. Cites the source documents by title where applicable',
        "7. If the results do not contain sufficient or relevant details, don't answer and state there is no relevant context",
      ];

  return lines(
    'You are tasked with synthesizing a comprehensive answer to a complex query based on search results.',
    '',
    `Original Query: ${query}`,
    '',
    "I've broken this query down and found results for each part:",
    '',
    results,
    '',
    ...(evidence ? ['Supporting evidence, most relevant first:', '', evidence, ''] : []),
    'Please synthesize a comprehensive, cohesive answer to the original query that:',
    '1. Directly addresses the original question',
    '2. Integrates information from all results',
    '3. Presents a logical flow of information',
    '4. Avoids unnecessary repetition',
    '5. Maintains factual accuracy from the source information',
    ...citationRules,
    '',
    'Your answer should be thorough but concise, well-structured, and directly useful to the person who asked the original query.',
  );
}

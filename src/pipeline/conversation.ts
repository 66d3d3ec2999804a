/**
 * Folds prior conversation turns into a single query string.
 */

import type { ConversationTurn } from './types.js';

export const DEFAULT_HISTORY_TURNS = 3;

function capitalize(role: string): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

/**
 * Prefix a follow-up question with the most recent turns.
 * System turns are skipped; with no history the query is returned unchanged.
 */
export function formatConversation(
  query: string,
  history?: ConversationTurn[],
  maxTurns: number = DEFAULT_HISTORY_TURNS,
): string {
  if (!history || history.length === 0 || maxTurns <= 0) {
    return query;
  }

  const recent = history.slice(-maxTurns).filter((turn) => turn.role !== 'system');
  if (recent.length === 0) {
    return query;
  }

  const lines = recent.map((turn) => `${capitalize(turn.role)}: ${turn.content}`);

  return (
    `Previous conversation:\n${lines.join('\n')}\n\n\n` +
    `Considering the conversation above, answer this follow-up question: ${query}`
  );
}

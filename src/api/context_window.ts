/**
 * @fileoverview Query contextualizer
 *
 * Picks the prior turns that travel with a question to generation: the last
 * two question/answer pairs at most. The question itself is never rewritten;
 * resolving an ambiguous follow-up ("what about interns?") is left to the
 * model, which is instructed to read it as a continuation.
 */

import type { ContextTurn, Turn } from '../types.js';
import type { SessionMemory } from '../memory/session_memory.js';

export const DEFAULT_MAX_CONTEXT_TURNS = 4;

export interface ContextualizedQuestion {
  sessionId: string;
  /** The raw question, unmodified. */
  question: string;
  contextTurns: ContextTurn[];
  /** Length of the stored history the context was cut from. */
  historyLength: number;
}

/**
 * Select the bounded context from a session history in append order.
 *
 * With two or more user turns the window starts at the second-to-last one;
 * otherwise it is the whole history. Either way at most `maxTurns` of the
 * most recent turns are kept. An unanswered question in the history is kept
 * as it is.
 */
export function selectContextTurns(history: Turn[], maxTurns = DEFAULT_MAX_CONTEXT_TURNS): ContextTurn[] {
  if (history.length === 0 || maxTurns <= 0) return [];

  const userIndices: number[] = [];
  for (let i = history.length - 1; i >= 0 && userIndices.length < 2; i -= 1) {
    if (history[i]?.role === 'user') userIndices.push(i);
  }
  const start = userIndices.length >= 2 ? (userIndices[1] ?? 0) : 0;

  return history
    .slice(start)
    .slice(-maxTurns)
    .map((turn) => ({ role: turn.role, content: turn.content }));
}

export class QueryContextualizer {
  constructor(
    private readonly memory: SessionMemory,
    private readonly maxContextTurns = DEFAULT_MAX_CONTEXT_TURNS
  ) {}

  async contextualize(sessionId: string, rawQuestion: string): Promise<ContextualizedQuestion> {
    const history = await this.memory.history(sessionId);
    return {
      sessionId,
      question: rawQuestion,
      contextTurns: selectContextTurns(history, this.maxContextTurns),
      historyLength: history.length,
    };
  }
}

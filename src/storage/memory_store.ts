/**
 * @fileoverview In-process session store
 *
 * The local fallback tier. Keeps turns with full fidelity (sources included)
 * for the lifetime of the process and never fails.
 */

import type { Turn } from '../types.js';
import { summarizeTurns, type SessionStore, type StoredSessionSummary } from './types.js';

export class MemorySessionStore implements SessionStore {
  readonly kind = 'memory' as const;
  private readonly sessions = new Map<string, Turn[]>();

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    const turns = this.sessions.get(sessionId);
    const copy = cloneTurn(turn);
    if (turns) {
      turns.push(copy);
    } else {
      this.sessions.set(sessionId, [copy]);
    }
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    return (this.sessions.get(sessionId) ?? []).map(cloneTurn);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.sessions.delete(sessionId);
  }

  async listSessionSummaries(): Promise<StoredSessionSummary[]> {
    const summaries: StoredSessionSummary[] = [];
    for (const [sessionId, turns] of this.sessions) {
      const summary = summarizeTurns(sessionId, turns);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }

  /**
   * Copy turns into a session that has none yet. Used when a session moves
   * to this tier mid-conversation.
   */
  async seedSession(sessionId: string, turns: Turn[]): Promise<boolean> {
    if (this.sessions.has(sessionId) || turns.length === 0) return false;
    this.sessions.set(sessionId, turns.map(cloneTurn));
    return true;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }
}

// Turns are immutable once appended; callers only ever see copies.
function cloneTurn(turn: Turn): Turn {
  return {
    ...turn,
    ...(turn.sources ? { sources: turn.sources.map((source) => ({ ...source })) } : {}),
  };
}

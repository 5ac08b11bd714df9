/**
 * @fileoverview Storage interfaces for policy-qa
 *
 * Session stores hold conversation turns; the vector index answers
 * nearest-neighbour queries over embedded policy chunks. Backends:
 * - In-memory (local fallback tier, always available)
 * - SQLite (persistent primary tier)
 * - Airtable (remote primary tier)
 */

import type { SourceChunk, Turn } from '../types.js';

// ============================================================================
// SESSION STORES
// ============================================================================

export interface StoredSessionSummary {
  sessionId: string;
  /** Content of the first user turn, untruncated; empty when there is none. */
  firstQuestion: string;
  /** ISO timestamp of the most recent turn. */
  lastActivityAt: string;
  turnCount: number;
}

/**
 * Implementations own their own concurrency discipline: several sessions
 * may append at the same time.
 */
export interface SessionStore {
  readonly kind: 'memory' | 'sqlite' | 'airtable';

  appendTurn(sessionId: string, turn: Turn): Promise<void>;

  /** Turns in append order; empty for an unknown session. */
  listTurns(sessionId: string): Promise<Turn[]>;

  /** Returns true when something was removed. Deleting an unknown session is not an error. */
  deleteSession(sessionId: string): Promise<boolean>;

  listSessionSummaries(): Promise<StoredSessionSummary[]>;

  close?(): Promise<void>;
}

/**
 * Build a summary from turns in append order.
 */
export function summarizeTurns(sessionId: string, turns: Turn[]): StoredSessionSummary | null {
  const last = turns[turns.length - 1];
  if (!last) return null;
  const firstUser = turns.find((turn) => turn.role === 'user');
  return {
    sessionId,
    firstQuestion: firstUser?.content ?? '',
    lastActivityAt: last.createdAt,
    turnCount: turns.length,
  };
}

// ============================================================================
// VECTOR INDEX
// ============================================================================

export interface ChunkMetadata {
  page: number | null;
  documentId: string;
}

export interface VectorSearchHit {
  chunkId: string;
  text: string;
  metadata: ChunkMetadata;
  score: number;
}

/**
 * Nearest-neighbour search over embedded chunks by cosine similarity.
 * Hits are in descending score order, at most k, all with score >= threshold.
 */
export interface VectorIndexService {
  search(vector: number[], k: number, threshold: number): Promise<VectorSearchHit[]>;
  size(): number;
}

/**
 * A chunk together with its embedding, as stored in the chunk store or read
 * from a vector export file.
 */
export interface EmbeddedChunk {
  id: string;
  chunk: SourceChunk;
  embedding: number[];
}

/**
 * @fileoverview Shared domain types for policy-qa
 *
 * Sessions, turns and retrieval results as they flow between session memory,
 * the contextualizer, the retriever, the synthesizer and the query engine.
 */

// ============================================================================
// SOURCES & RETRIEVAL
// ============================================================================

/**
 * A retrievable passage of a policy document. `page` is null when the
 * document loader did not record one.
 */
export interface SourceChunk {
  text: string;
  page: number | null;
  documentId: string;
}

export interface ScoredChunk {
  chunk: SourceChunk;
  /** Cosine similarity in [0, 1]. */
  score: number;
}

export type RetrievalFailureKind = 'embedding' | 'index';

/**
 * Ephemeral result of one retrieval: chunks in descending score order, at
 * most K, all at or above the threshold. `degraded` is set when the result is
 * empty because the embedding or index path failed.
 */
export interface RetrievalResult {
  query: string;
  chunks: ScoredChunk[];
  degraded?: {
    kind: RetrievalFailureKind;
    message: string;
  };
}

export function emptyRetrieval(query: string): RetrievalResult {
  return { query, chunks: [] };
}

// ============================================================================
// TURNS & SESSIONS
// ============================================================================

export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  content: string;
  /** Only on assistant turns; not guaranteed to survive in the primary store. */
  sources?: SourceChunk[];
  /** ISO timestamp stamped by session memory at append time. */
  createdAt: string;
}

/**
 * What a caller hands to session memory; the timestamp is added on append.
 */
export type NewTurn = Omit<Turn, 'createdAt'>;

/**
 * A turn as forwarded to generation: role and text only.
 */
export interface ContextTurn {
  role: TurnRole;
  content: string;
}

export type StorageOrigin = 'primary' | 'local';

export interface SessionSummary {
  sessionId: string;
  /** First user question, truncated to the preview length. */
  preview: string;
  /** ISO timestamp of the most recent turn. */
  lastActivityAt: string;
  origin: StorageOrigin;
}

// ============================================================================
// GENERATION MESSAGES
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

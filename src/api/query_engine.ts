/**
 * @fileoverview Query engine
 *
 * Runs one question through
 *
 *   RECEIVED → CONTEXTUALIZED → RETRIEVED → SYNTHESIZED → PERSISTED
 *
 * with FAILED reachable from any step. Retrieval failures continue with an
 * empty result. Any other failure answers with the fixed apology. Either way
 * exactly one user turn and one assistant turn are appended, so a session's
 * history always holds complete pairs.
 */

import { randomUUID } from 'node:crypto';
import {
  emptyRetrieval,
  type RetrievalResult,
  type SessionSummary,
  type SourceChunk,
  type StorageOrigin,
  type Turn,
} from '../types.js';
import type { SessionMemory, StorageDegraded } from '../memory/session_memory.js';
import { QueryContextualizer } from './context_window.js';
import type { Retriever } from './retrieval.js';
import type { AnswerSynthesizer } from './query_synthesis.js';
import type { FaqCatalog } from './faq.js';
import { QueryValidationError, isRetrievalFailure } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logError, logInfo, logWarning } from '../telemetry/logger.js';

export const APOLOGY_MESSAGE =
  'Unable to process your request at this time. Please try again or contact HR support for assistance.';

export const MAX_QUESTION_LENGTH = 4000;

// ============================================================================
// TYPES
// ============================================================================

export type QueryStage =
  | 'RECEIVED'
  | 'CONTEXTUALIZED'
  | 'RETRIEVED'
  | 'SYNTHESIZED'
  | 'PERSISTED'
  | 'FAILED';

export interface StageRecord {
  stage: QueryStage;
  at: string;
  /** Milliseconds since RECEIVED. */
  elapsedMs: number;
}

export type AnsweredFrom = 'faq' | 'generation' | 'fallback';

export interface AskOptions {
  /** Continue this session; a new one is started when omitted. */
  sessionId?: string;
  /** Start a new session even if sessionId is given. */
  newSession?: boolean;
}

export interface AskResult {
  sessionId: string;
  answer: string;
  sources: SourceChunk[];
  status: 'answered' | 'failed';
  answeredFrom: AnsweredFrom;
  stages: StageRecord[];
  retrievalDegraded: boolean;
  /** Tier holding the session after this question was persisted. */
  storage: StorageOrigin;
  storageDegraded?: StorageDegraded;
  /** Set when status is 'failed'. */
  failure?: { code: string; message: string };
}

export interface QueryEngineOptions {
  memory: SessionMemory;
  retriever: Retriever;
  synthesizer: AnswerSynthesizer;
  contextualizer?: QueryContextualizer;
  maxContextTurns?: number;
  faq?: FaqCatalog | null;
  newSessionId?: () => string;
  now?: () => Date;
}

interface Outcome {
  answer: string;
  sources: SourceChunk[];
  answeredFrom: AnsweredFrom;
  retrievalDegraded: boolean;
  failure?: { code: string; message: string };
}

// ============================================================================
// ENGINE
// ============================================================================

export class QueryEngine {
  private readonly memory: SessionMemory;
  private readonly contextualizer: QueryContextualizer;
  private readonly retriever: Retriever;
  private readonly synthesizer: AnswerSynthesizer;
  private readonly faq: FaqCatalog | null;
  private readonly newSessionId: () => string;
  private readonly now: () => Date;
  private sessionLocks = new Map<string, Promise<void>>();

  constructor(options: QueryEngineOptions) {
    this.memory = options.memory;
    this.contextualizer =
      options.contextualizer ?? new QueryContextualizer(options.memory, options.maxContextTurns);
    this.retriever = options.retriever;
    this.synthesizer = options.synthesizer;
    this.faq = options.faq ?? null;
    this.newSessionId = options.newSessionId ?? (() => randomUUID());
    this.now = options.now ?? (() => new Date());
  }

  startSession(): string {
    return this.newSessionId();
  }

  /**
   * Answer one question. Concurrent calls for the same session run one at a
   * time in arrival order.
   *
   * @throws QueryValidationError for an empty question; nothing is persisted
   */
  async ask(question: string, options: AskOptions = {}): Promise<AskResult> {
    const trimmed = question.trim();
    if (!trimmed) {
      throw new QueryValidationError('Question must not be empty');
    }
    if (trimmed.length > MAX_QUESTION_LENGTH) {
      throw new QueryValidationError(`Question must be at most ${MAX_QUESTION_LENGTH} characters`);
    }
    const requested = options.sessionId?.trim();
    const sessionId = options.newSession || !requested ? this.startSession() : requested;
    return this.withSessionLock(sessionId, () => this.run(sessionId, question));
  }

  async history(sessionId: string): Promise<Turn[]> {
    return this.memory.history(sessionId);
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.withSessionLock(sessionId, () => this.memory.delete(sessionId));
  }

  async listSessions(): Promise<SessionSummary[]> {
    return this.memory.listSessions();
  }

  sessionOrigin(sessionId: string): StorageOrigin {
    return this.memory.origin(sessionId);
  }

  async close(): Promise<void> {
    await this.memory.close();
  }

  // ==========================================================================
  // PIPELINE
  // ==========================================================================

  private async run(sessionId: string, question: string): Promise<AskResult> {
    const started = this.now().getTime();
    const stages: StageRecord[] = [];
    const enter = (stage: QueryStage): void => {
      const at = this.now();
      const record = { stage, at: at.toISOString(), elapsedMs: at.getTime() - started };
      stages.push(record);
      logDebug('Query stage', { sessionId, stage, elapsedMs: record.elapsedMs });
    };

    enter('RECEIVED');
    let outcome: Outcome;
    try {
      outcome = await this.answer(sessionId, question, enter);
    } catch (error) {
      enter('FAILED');
      const failure = {
        code: hasCode(error) ? error.code : 'UNEXPECTED_ERROR',
        message: getErrorMessage(error),
      };
      logError('Question failed; answering with apology', { sessionId, ...failure });
      outcome = {
        answer: APOLOGY_MESSAGE,
        sources: [],
        answeredFrom: 'fallback',
        retrievalDegraded: false,
        failure,
      };
    }

    const userWrite = await this.memory.append(sessionId, { role: 'user', content: question });
    const assistantWrite = await this.memory.append(sessionId, {
      role: 'assistant',
      content: outcome.answer,
      ...(outcome.sources.length > 0 ? { sources: outcome.sources } : {}),
    });
    const storageDegraded =
      (userWrite.tier === 'local' ? userWrite.degraded : undefined) ??
      (assistantWrite.tier === 'local' ? assistantWrite.degraded : undefined);
    if (!outcome.failure) enter('PERSISTED');

    const result: AskResult = {
      sessionId,
      answer: outcome.answer,
      sources: outcome.sources,
      status: outcome.failure ? 'failed' : 'answered',
      answeredFrom: outcome.answeredFrom,
      stages,
      retrievalDegraded: outcome.retrievalDegraded,
      storage: assistantWrite.tier,
      ...(storageDegraded ? { storageDegraded } : {}),
      ...(outcome.failure ? { failure: outcome.failure } : {}),
    };
    logInfo('Question handled', {
      sessionId,
      status: result.status,
      answeredFrom: result.answeredFrom,
      sources: result.sources.length,
      storage: result.storage,
      durationMs: this.now().getTime() - started,
    });
    return result;
  }

  private async answer(
    sessionId: string,
    question: string,
    enter: (stage: QueryStage) => void
  ): Promise<Outcome> {
    const canned = this.faq?.lookup(question);
    if (canned) {
      enter('SYNTHESIZED');
      return { answer: canned.answer, sources: [], answeredFrom: 'faq', retrievalDegraded: false };
    }

    const context = await this.contextualizer.contextualize(sessionId, question);
    enter('CONTEXTUALIZED');

    const retrieval = await this.retrieve(sessionId, question);
    enter('RETRIEVED');

    const synthesized = await this.synthesizer.synthesize({
      question: context.question,
      contextTurns: context.contextTurns,
      retrieval,
    });
    enter('SYNTHESIZED');

    return {
      answer: synthesized.answer,
      sources: synthesized.usedSources,
      answeredFrom: 'generation',
      retrievalDegraded: retrieval.degraded !== undefined,
    };
  }

  private async retrieve(sessionId: string, question: string): Promise<RetrievalResult> {
    try {
      return await this.retriever.retrieve(question);
    } catch (error) {
      if (!isRetrievalFailure(error)) throw error;
      logWarning('Retrieval failed; continuing without sources', { sessionId, error: error.message });
      return {
        ...emptyRetrieval(question),
        degraded: {
          kind: error.code === 'EMBEDDING_UNAVAILABLE' ? 'embedding' : 'index',
          message: error.message,
        },
      };
    }
  }

  private async withSessionLock<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    // The chain only ever resolves: each link waits on a gate released in finally.
    const previous = this.sessionLocks.get(sessionId) ?? Promise.resolve();
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const chain = previous.then(() => gate);
    this.sessionLocks.set(sessionId, chain);

    await previous;
    try {
      return await work();
    } finally {
      release();
      if (this.sessionLocks.get(sessionId) === chain) {
        this.sessionLocks.delete(sessionId);
      }
    }
  }
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

/**
 * @fileoverview policy-qa - contextual question answering over policy documents
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadConfig, createQueryEngine } from 'policy-qa';
 *
 * const engine = await createQueryEngine(await loadConfig());
 * const first = await engine.ask('What is the vacation policy?');
 * const followUp = await engine.ask('Does it apply to interns?', { sessionId: first.sessionId });
 * await engine.close();
 * ```
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// ============================================================================
// ENGINE
// ============================================================================

export {
  QueryEngine,
  APOLOGY_MESSAGE,
  MAX_QUESTION_LENGTH,
} from './api/query_engine.js';
export type {
  AskOptions,
  AskResult,
  AnsweredFrom,
  QueryStage,
  StageRecord,
  QueryEngineOptions,
} from './api/query_engine.js';
export { createQueryEngine, openPrimaryStore, loadVectorIndex } from './api/engine_factory.js';
export type { QueryEngineOverrides } from './api/engine_factory.js';

export { QueryContextualizer, selectContextTurns, DEFAULT_MAX_CONTEXT_TURNS } from './api/context_window.js';
export type { ContextualizedQuestion } from './api/context_window.js';
export { Retriever, cleanChunkText } from './api/retrieval.js';
export type { RetrieverOptions } from './api/retrieval.js';
export { AnswerSynthesizer, buildMessages, SYSTEM_PROMPT, CONTEXT_HEADER } from './api/query_synthesis.js';
export type { SynthesisInput, SynthesizedAnswer, AnswerSynthesizerOptions } from './api/query_synthesis.js';
export { FaqCatalog, loadFaqCatalog, normalizeQuestion, DEFAULT_FAQ_PATH } from './api/faq.js';
export type { FaqEntry } from './api/faq.js';

// ============================================================================
// SESSION MEMORY & STORAGE
// ============================================================================

export { SessionMemory, truncatePreview } from './memory/session_memory.js';
export type { SessionMemoryOptions, AppendOutcome, StorageDegraded } from './memory/session_memory.js';
export { MemorySessionStore } from './storage/memory_store.js';
export { SqliteSessionStore, createSqliteSessionStore } from './storage/sqlite_store.js';
export { AirtableSessionStore } from './storage/airtable_store.js';
export type { AirtableStoreOptions } from './storage/airtable_store.js';
export { VectorIndex, cosineSimilarity } from './storage/vector_index.js';
export { ChunkStore } from './storage/chunk_store.js';
export { parseVectorExport, readVectorExport } from './storage/vector_export.js';
export type {
  SessionStore,
  StoredSessionSummary,
  VectorIndexService,
  VectorSearchHit,
  EmbeddedChunk,
} from './storage/types.js';

// ============================================================================
// PROVIDERS
// ============================================================================

export * from './providers/index.js';

// ============================================================================
// CONFIGURATION, ERRORS & TYPES
// ============================================================================

export { loadConfig, resolveConfig, configFromEnv } from './config/index.js';
export type { PolicyQaConfig, PrimaryStoreKind } from './config/index.js';
export {
  PolicyQaError,
  EmbeddingUnavailableError,
  RetrievalUnavailableError,
  GenerationUnavailableError,
  StorageError,
  ConfigurationError,
  QueryValidationError,
  isPolicyQaError,
} from './core/errors.js';
export { setLogLevel } from './telemetry/logger.js';
export type { LogLevel } from './telemetry/logger.js';
export type * from './types.js';

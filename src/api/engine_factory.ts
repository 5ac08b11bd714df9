/**
 * @fileoverview Wires a QueryEngine from configuration
 *
 * Collaborators that cannot be built are left out instead of failing start-up:
 * no embeddings or index means empty retrieval, no LLM means the apology
 * answer, no primary store means every session lives locally. Each gap is
 * logged once here.
 */

import * as fs from 'node:fs/promises';
import type { PolicyQaConfig } from '../config/index.js';
import type { EmbeddingProvider, LLMProvider } from '../providers/types.js';
import { createAzureProviders } from '../providers/azure_openai.js';
import type { SessionStore, VectorIndexService } from '../storage/types.js';
import { createSqliteSessionStore } from '../storage/sqlite_store.js';
import { AirtableSessionStore } from '../storage/airtable_store.js';
import { ChunkStore } from '../storage/chunk_store.js';
import { VectorIndex } from '../storage/vector_index.js';
import { readVectorExport } from '../storage/vector_export.js';
import { SessionMemory, type StorageDegraded } from '../memory/session_memory.js';
import { Retriever } from './retrieval.js';
import { AnswerSynthesizer } from './query_synthesis.js';
import { loadFaqCatalog, type FaqCatalog } from './faq.js';
import { QueryEngine } from './query_engine.js';
import { getErrorMessage } from '../utils/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';

/**
 * Replace any collaborator; `null` means "leave it out".
 */
export interface QueryEngineOverrides {
  llm?: LLMProvider | null;
  embeddings?: EmbeddingProvider | null;
  index?: VectorIndexService | null;
  primary?: SessionStore | null;
  faq?: FaqCatalog | null;
  onDegraded?: (event: StorageDegraded) => void;
  newSessionId?: () => string;
}

export async function createQueryEngine(
  config: PolicyQaConfig,
  overrides: QueryEngineOverrides = {}
): Promise<QueryEngine> {
  const needsProviders = overrides.llm === undefined || overrides.embeddings === undefined;
  const azure = needsProviders
    ? createAzureProviders(
        config.azure,
        {
          temperature: config.generation.temperature,
          maxTokens: config.generation.maxTokens,
          timeoutMs: config.timeouts.generationMs,
        },
        config.timeouts.embeddingMs
      )
    : null;

  const llm = overrides.llm !== undefined ? overrides.llm : azure?.llm ?? null;
  const embeddings = overrides.embeddings !== undefined ? overrides.embeddings : azure?.embeddings ?? null;
  if (!llm && overrides.llm === undefined) {
    logWarning('Generation provider unavailable; questions will get the fallback answer', { reason: azure?.missing.llm });
  }
  if (!embeddings && overrides.embeddings === undefined) {
    logWarning('Embedding provider unavailable; retrieval will be empty', { reason: azure?.missing.embeddings });
  }

  const index = overrides.index !== undefined ? overrides.index : await loadVectorIndex(config);
  const primary = overrides.primary !== undefined ? overrides.primary : await openPrimaryStore(config);
  const faq = overrides.faq !== undefined ? overrides.faq : await loadFaq(config);

  const memory = new SessionMemory({
    primary,
    onDegraded: overrides.onDegraded,
    previewLength: config.context.previewLength,
    storageTimeoutMs: config.timeouts.storageMs,
  });

  return new QueryEngine({
    memory,
    retriever: new Retriever(embeddings, index, {
      topK: config.retrieval.topK,
      scoreThreshold: config.retrieval.scoreThreshold,
      boilerplate: config.retrieval.boilerplate,
      embeddingTimeoutMs: config.timeouts.embeddingMs,
      searchTimeoutMs: config.timeouts.searchMs,
    }),
    synthesizer: new AnswerSynthesizer(llm, { timeoutMs: config.timeouts.generationMs }),
    maxContextTurns: config.context.maxContextTurns,
    faq,
    ...(overrides.newSessionId ? { newSessionId: overrides.newSessionId } : {}),
  });
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export async function openPrimaryStore(config: PolicyQaConfig): Promise<SessionStore | null> {
  switch (config.storage.primary) {
    case 'none':
      return null;
    case 'airtable': {
      const { apiKey, baseId, tableName } = config.airtable;
      if (!apiKey || !baseId) return null;
      return new AirtableSessionStore({ apiKey, baseId, tableName, timeoutMs: config.timeouts.storageMs });
    }
    case 'sqlite':
      try {
        return await createSqliteSessionStore(config.storage.sessionDbPath);
      } catch (error) {
        logWarning('SQLite session store unavailable; sessions stay in memory', {
          path: config.storage.sessionDbPath,
          error: getErrorMessage(error),
        });
        return null;
      }
  }
}

export async function loadVectorIndex(config: PolicyQaConfig): Promise<VectorIndex | null> {
  const index = new VectorIndex();
  try {
    if (config.index.exportPath) {
      index.load(await readVectorExport(config.index.exportPath));
    } else {
      const dbPath = config.index.dbPath;
      if (dbPath !== ':memory:' && !(await fileExists(dbPath))) {
        logWarning('No chunk store found; run `policy-qa import-index <export.json>` first', { path: dbPath });
        return null;
      }
      const store = new ChunkStore(dbPath);
      await store.initialize();
      try {
        index.load(store.loadAll());
      } finally {
        await store.close();
      }
    }
  } catch (error) {
    logWarning('Vector index could not be loaded; retrieval will be empty', { error: getErrorMessage(error) });
    return null;
  }
  logDebug('Vector index loaded', { chunks: index.size(), dimension: index.getDimension() });
  return index;
}

async function loadFaq(config: PolicyQaConfig): Promise<FaqCatalog | null> {
  if (!config.faq.enabled) return null;
  return config.faq.path ? loadFaqCatalog(config.faq.path) : loadFaqCatalog();
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

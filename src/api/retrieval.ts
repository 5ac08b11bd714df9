/**
 * @fileoverview Retriever
 *
 * Embeds the raw question, asks the vector index for the K nearest chunks
 * and keeps those at or above the relevance threshold. An empty filtered set
 * is a valid answer; there is no fallback to unfiltered results.
 */

import { z } from 'zod';
import type { RetrievalResult, ScoredChunk } from '../types.js';
import type { EmbeddingProvider } from '../providers/types.js';
import type { VectorIndexService, VectorSearchHit } from '../storage/types.js';
import { EmbeddingUnavailableError, RetrievalUnavailableError } from '../core/errors.js';
import { TimeoutError, withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';

const searchHitsSchema = z.array(
  z.object({
    chunkId: z.string(),
    text: z.string(),
    metadata: z.object({
      page: z.number().int().nullable(),
      documentId: z.string(),
    }),
    score: z.number().finite(),
  })
);

export interface RetrieverOptions {
  topK: number;
  scoreThreshold: number;
  /** Substrings removed from chunk text before it is used. */
  boilerplate?: string[];
  embeddingTimeoutMs?: number;
  searchTimeoutMs?: number;
}

export class Retriever {
  private readonly boilerplate: string[];

  constructor(
    private readonly embeddings: EmbeddingProvider | null,
    private readonly index: VectorIndexService | null,
    private readonly options: RetrieverOptions
  ) {
    // Longest first so a phrase is not left half-removed by one of its prefixes.
    this.boilerplate = [...(options.boilerplate ?? [])].sort((a, b) => b.length - a.length);
  }

  /**
   * @throws EmbeddingUnavailableError when the question cannot be embedded
   * @throws RetrievalUnavailableError when the index cannot be searched
   */
  async retrieve(queryText: string): Promise<RetrievalResult> {
    const vector = await this.embed(queryText);
    const hits = await this.search(vector);

    const chunks: ScoredChunk[] = hits
      .filter((hit) => hit.score >= this.options.scoreThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, this.options.topK)
      .map((hit) => ({
        chunk: {
          text: cleanChunkText(hit.text, this.boilerplate),
          page: hit.metadata.page,
          documentId: hit.metadata.documentId,
        },
        score: hit.score,
      }));

    logDebug('Retrieval complete', { candidates: hits.length, kept: chunks.length });
    return { query: queryText, chunks };
  }

  private async embed(text: string): Promise<number[]> {
    const provider = this.embeddings;
    if (!provider) {
      throw new EmbeddingUnavailableError('not_configured', 'no embedding provider configured');
    }
    let vector: number[];
    try {
      vector = await withTimeout(provider.embedOne(text), this.options.embeddingTimeoutMs, {
        context: 'embedding query',
      });
    } catch (error) {
      const reason = error instanceof TimeoutError ? 'timeout' : 'network_error';
      throw new EmbeddingUnavailableError(reason, getErrorMessage(error), toError(error));
    }
    if (!Array.isArray(vector) || vector.length === 0 || !vector.every(Number.isFinite)) {
      throw new EmbeddingUnavailableError('invalid_response', 'embedding is empty or not numeric');
    }
    return vector;
  }

  private async search(vector: number[]): Promise<VectorSearchHit[]> {
    const index = this.index;
    if (!index) {
      throw new RetrievalUnavailableError('not_configured', 'no vector index loaded');
    }
    let hits: unknown;
    try {
      hits = await withTimeout(
        index.search(vector, this.options.topK, this.options.scoreThreshold),
        this.options.searchTimeoutMs,
        { context: 'vector search' }
      );
    } catch (error) {
      if (error instanceof RetrievalUnavailableError) throw error;
      const reason = error instanceof TimeoutError ? 'timeout' : 'unavailable';
      throw new RetrievalUnavailableError(reason, getErrorMessage(error), toError(error));
    }
    const parsed = searchHitsSchema.safeParse(hits);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown shape';
      throw new RetrievalUnavailableError('invalid_response', `index returned malformed hits (${where})`);
    }
    return parsed.data;
  }
}

/**
 * Remove boilerplate substrings, trim each line and drop blank lines.
 */
export function cleanChunkText(text: string, boilerplate: readonly string[]): string {
  let cleaned = text;
  for (const phrase of boilerplate) {
    cleaned = cleaned.split(phrase).join('');
  }
  return cleaned
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

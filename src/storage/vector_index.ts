import type { EmbeddedChunk, VectorIndexService, VectorSearchHit } from './types.js';
import { RetrievalUnavailableError } from '../core/errors.js';

interface IndexedChunk {
  id: string;
  text: string;
  page: number | null;
  documentId: string;
  embedding: Float32Array;
}

// ============================================================================
// Brute-force cosine index
// Policy corpora are a few thousand chunks at most; a linear scan is enough.
// ============================================================================

/**
 * In-memory nearest-neighbour index over embedded policy chunks.
 *
 * @example
 * ```typescript
 * const index = new VectorIndex();
 * index.load(await chunkStore.loadAll());
 * const hits = await index.search(queryEmbedding, 5, 0.5);
 * ```
 */
export class VectorIndex implements VectorIndexService {
  private items: IndexedChunk[] = [];
  private dimension: number | null = null;

  /**
   * Replace the index contents. All embeddings must share one dimension.
   */
  load(chunks: EmbeddedChunk[]): void {
    this.items = [];
    this.dimension = null;
    for (const chunk of chunks) this.add(chunk);
  }

  add(chunk: EmbeddedChunk): void {
    if (this.dimension === null) {
      this.dimension = chunk.embedding.length;
    } else if (chunk.embedding.length !== this.dimension) {
      throw new Error(
        `Chunk ${chunk.id} has dimension ${chunk.embedding.length}, index expects ${this.dimension}`
      );
    }
    this.items.push({
      id: chunk.id,
      text: chunk.chunk.text,
      page: chunk.chunk.page,
      documentId: chunk.chunk.documentId,
      embedding: Float32Array.from(chunk.embedding),
    });
  }

  clear(): void {
    this.items = [];
    this.dimension = null;
  }

  size(): number { return this.items.length; }

  getDimension(): number | null { return this.dimension; }

  async search(vector: number[], k: number, threshold: number): Promise<VectorSearchHit[]> {
    if (k <= 0 || this.items.length === 0) return [];
    if (vector.length !== this.dimension) {
      throw new RetrievalUnavailableError(
        'invalid_response',
        `query vector has dimension ${vector.length}, index expects ${this.dimension ?? 'none'}`
      );
    }

    const query = Float32Array.from(vector);
    const hits: VectorSearchHit[] = [];
    for (const item of this.items) {
      const score = cosineSimilarity(query, item.embedding);
      if (score < threshold) continue;
      hits.push({
        chunkId: item.id,
        text: item.text,
        metadata: { page: item.page, documentId: item.documentId },
        score,
      });
    }

    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, k);
  }
}

/**
 * Cosine similarity clamped to [0, 1]; opposed vectors score 0.
 */
export function cosineSimilarity(a: Float32Array, b: Float32Array): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  const similarity = dot / (Math.sqrt(normA) * Math.sqrt(normB));
  return Math.min(1, Math.max(0, similarity));
}

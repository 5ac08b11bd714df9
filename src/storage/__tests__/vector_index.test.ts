/**
 * @fileoverview Tests for the brute-force cosine VectorIndex
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { VectorIndex, cosineSimilarity } from '../vector_index.js';
import type { EmbeddedChunk } from '../types.js';
import { RetrievalUnavailableError } from '../../core/errors.js';

function chunk(id: string, embedding: number[], page: number | null = 1): EmbeddedChunk {
  return { id, chunk: { text: `text of ${id}`, page, documentId: 'handbook.pdf' }, embedding };
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors regardless of magnitude', () => {
    expect(cosineSimilarity(Float32Array.from([1, 2]), Float32Array.from([2, 4]))).toBeCloseTo(1, 6);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity(Float32Array.from([1, 0]), Float32Array.from([0, 1]))).toBe(0);
  });

  it('clamps opposed vectors to 0', () => {
    expect(cosineSimilarity(Float32Array.from([1, 0]), Float32Array.from([-1, 0]))).toBe(0);
  });

  it('returns 0 for zero vectors and mismatched lengths', () => {
    expect(cosineSimilarity(Float32Array.from([0, 0]), Float32Array.from([1, 0]))).toBe(0);
    expect(cosineSimilarity(Float32Array.from([1]), Float32Array.from([1, 0]))).toBe(0);
  });
});

describe('VectorIndex', () => {
  let index: VectorIndex;

  beforeEach(() => {
    index = new VectorIndex();
    index.load([
      chunk('a', [1, 0, 0]),
      chunk('b', [0.8, 0.6, 0]),
      chunk('c', [0, 1, 0]),
      chunk('d', [0.6, 0.8, 0], null),
    ]);
  });

  it('reports size and dimension', () => {
    expect(index.size()).toBe(4);
    expect(index.getDimension()).toBe(3);
  });

  it('returns hits in descending score order', async () => {
    const hits = await index.search([1, 0, 0], 10, 0);
    expect(hits.map((hit) => hit.chunkId)).toEqual(['a', 'b', 'd', 'c']);
    expect(hits[0]?.score).toBeCloseTo(1, 6);
    expect(hits[1]?.score).toBeCloseTo(0.8, 5);
  });

  it('drops hits below the threshold', async () => {
    const hits = await index.search([1, 0, 0], 10, 0.7);
    expect(hits.map((hit) => hit.chunkId)).toEqual(['a', 'b']);
  });

  it('keeps a hit exactly at the threshold', async () => {
    const hits = await index.search([0, 1, 0], 10, 1);
    expect(hits.map((hit) => hit.chunkId)).toEqual(['c']);
  });

  it('caps results at k', async () => {
    const hits = await index.search([1, 0, 0], 2, 0);
    expect(hits).toHaveLength(2);
  });

  it('carries chunk metadata on hits', async () => {
    const [hit] = await index.search([0.6, 0.8, 0], 1, 0);
    expect(hit).toMatchObject({
      chunkId: 'd',
      text: 'text of d',
      metadata: { page: null, documentId: 'handbook.pdf' },
    });
  });

  it('returns nothing for an empty index or k of zero', async () => {
    expect(await new VectorIndex().search([1, 0], 5, 0)).toEqual([]);
    expect(await index.search([1, 0, 0], 0, 0)).toEqual([]);
  });

  it('rejects a query vector of the wrong dimension', async () => {
    await expect(index.search([1, 0], 5, 0)).rejects.toBeInstanceOf(RetrievalUnavailableError);
  });

  it('rejects chunks of a different dimension', () => {
    expect(() => index.add(chunk('e', [1, 0]))).toThrow(/dimension 2, index expects 3/);
  });

  it('clear empties the index', () => {
    index.clear();
    expect(index.size()).toBe(0);
    expect(index.getDimension()).toBeNull();
  });
});

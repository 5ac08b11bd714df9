/**
 * @fileoverview Vector export files
 *
 * An export is a JSON document with three parallel arrays:
 *
 *   { "vectors": number[][], "metadatas": [{ "page": 3, "source": "docs/leave.pdf" }], "texts": string[] }
 *
 * Entry i of each array describes the same chunk. Vectors that are null are
 * skipped; everything else must be well-formed or the whole file is rejected.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';
import { logWarning } from '../telemetry/logger.js';
import type { EmbeddedChunk } from './types.js';

const metadataSchema = z
  .object({
    page: z.number().int().nullable().optional(),
    source: z.string().optional(),
  })
  .passthrough();

const exportSchema = z
  .object({
    vectors: z.array(z.array(z.number()).nullable()),
    metadatas: z.array(metadataSchema),
    texts: z.array(z.string()),
  })
  .refine(
    (data) => data.vectors.length === data.metadatas.length && data.vectors.length === data.texts.length,
    { message: 'vectors, metadatas and texts must have the same length' }
  );

export type VectorExport = z.infer<typeof exportSchema>;

export const UNKNOWN_DOCUMENT = 'unknown';

/**
 * Parse an export document into embedded chunks.
 *
 * @throws ConfigurationError when the document does not match the export format
 */
export function parseVectorExport(payload: unknown, origin = 'vector export'): EmbeddedChunk[] {
  const parsed = exportSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigurationError(origin, `${issue?.message ?? 'invalid export'}${where}`);
  }

  const { vectors, metadatas, texts } = parsed.data;
  const chunks: EmbeddedChunk[] = [];
  let skipped = 0;
  vectors.forEach((vector, index) => {
    const metadata = metadatas[index];
    const text = texts[index];
    if (!vector || vector.length === 0 || text === undefined) {
      skipped += 1;
      return;
    }
    chunks.push({
      id: `chunk-${index}`,
      chunk: {
        text,
        page: metadata?.page ?? null,
        documentId: documentIdFromSource(metadata?.source),
      },
      embedding: vector,
    });
  });
  if (skipped > 0) {
    logWarning('Skipped export entries without a vector', { origin, skipped });
  }
  return chunks;
}

export async function readVectorExport(filePath: string): Promise<EmbeddedChunk[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(filePath, `cannot read vector export (${getErrorMessage(error)})`);
  }
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(filePath, 'vector export is not valid JSON');
  }
  return parseVectorExport(payload, filePath);
}

/**
 * The document id is the file name of the source path.
 */
export function documentIdFromSource(source: string | undefined): string {
  if (!source || source.trim().length === 0) return UNKNOWN_DOCUMENT;
  return path.posix.basename(source.trim().replace(/\\/g, '/'));
}

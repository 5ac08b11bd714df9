/**
 * @fileoverview SQLite chunk store
 *
 * Persistent home of the embedded policy chunks the vector index is loaded
 * from. Embeddings are stored as Float32 BLOBs.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageError } from '../core/errors.js';
import { toError } from '../utils/errors.js';
import type { EmbeddedChunk } from './types.js';

interface ChunkRow {
  id: string;
  document_id: string;
  page: number | null;
  text: string;
  embedding: Buffer;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS policy_chunks (
    id TEXT PRIMARY KEY,
    document_id TEXT NOT NULL,
    page INTEGER,
    text TEXT NOT NULL,
    embedding BLOB NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_policy_chunks_document ON policy_chunks(document_id);
`;

export class ChunkStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    if (this.db) return;
    try {
      if (this.dbPath !== ':memory:') {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(SCHEMA);
      this.db = db;
    } catch (error) {
      throw new StorageError('open', 'primary', false, `cannot open chunk store ${this.dbPath}`, toError(error));
    }
  }

  /**
   * Insert or replace chunks in one transaction. Returns the number written.
   */
  upsertChunks(chunks: EmbeddedChunk[]): number {
    const db = this.ensureDb();
    const insert = db.prepare<[string, string, number | null, string, Buffer]>(
      'INSERT OR REPLACE INTO policy_chunks (id, document_id, page, text, embedding) VALUES (?, ?, ?, ?, ?)'
    );
    const insertMany = db.transaction((batch: EmbeddedChunk[]) => {
      for (const item of batch) {
        insert.run(
          item.id,
          item.chunk.documentId,
          item.chunk.page,
          item.chunk.text,
          Buffer.from(Float32Array.from(item.embedding).buffer)
        );
      }
    });
    insertMany(chunks);
    return chunks.length;
  }

  loadAll(): EmbeddedChunk[] {
    const rows = this.ensureDb()
      .prepare<[], ChunkRow>('SELECT id, document_id, page, text, embedding FROM policy_chunks ORDER BY rowid ASC')
      .all();
    return rows.map((row) => ({
      id: row.id,
      chunk: { text: row.text, page: row.page, documentId: row.document_id },
      embedding: decodeEmbedding(row.embedding),
    }));
  }

  count(): number {
    const row = this.ensureDb()
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM policy_chunks')
      .get();
    return row?.count ?? 0;
  }

  clear(): void {
    this.ensureDb().exec('DELETE FROM policy_chunks');
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private ensureDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('open', 'primary', false, 'chunk store is not initialized');
    }
    return this.db;
  }
}

function decodeEmbedding(blob: Buffer): number[] {
  // Copy first: the Buffer may sit at an offset that is not Float32-aligned.
  const bytes = new Uint8Array(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

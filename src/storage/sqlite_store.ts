/**
 * @fileoverview SQLite-backed session store
 *
 * Persistent primary tier. One row per turn; only role, text and timestamp
 * are kept, source attachments are display-only and are not written here.
 *
 * @packageDocumentation
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Turn, TurnRole } from '../types.js';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { toError } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import type { SessionStore, StoredSessionSummary } from './types.js';

interface TurnRow {
  role: string;
  content: string;
  created_at: string;
}

interface SummaryRow {
  session_id: string;
  turn_count: number;
  last_activity: string;
  first_question: string | null;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS policy_qa_turns (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id TEXT NOT NULL,
    role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
    content TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_policy_qa_turns_session ON policy_qa_turns(session_id, id);
`;

export class SqliteSessionStore implements SessionStore {
  readonly kind = 'sqlite' as const;
  private db: Database.Database | null = null;
  private readonly dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  async initialize(): Promise<void> {
    if (this.db) return;
    try {
      if (this.dbPath !== ':memory:') {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma('busy_timeout = 5000');
      db.exec(SCHEMA);
      this.db = db;
      logDebug('SQLite session store ready', { path: this.dbPath });
    } catch (error) {
      throw new StorageError('open', 'primary', false, `cannot open ${this.dbPath}`, toError(error));
    }
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    this.run('write', (db) => {
      db.prepare<[string, string, string, string]>(
        'INSERT INTO policy_qa_turns (session_id, role, content, created_at) VALUES (?, ?, ?, ?)'
      ).run(sessionId, turn.role, turn.content, turn.createdAt);
    });
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    return this.run('read', (db) => {
      const rows = db.prepare<[string], TurnRow>(
        'SELECT role, content, created_at FROM policy_qa_turns WHERE session_id = ? ORDER BY id ASC'
      ).all(sessionId);
      const turns: Turn[] = [];
      for (const row of rows) {
        const role = parseRole(row.role);
        if (!role) continue;
        turns.push({ role, content: row.content, createdAt: row.created_at });
      }
      return turns;
    });
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.run('delete', (db) => {
      const result = db.prepare<[string]>('DELETE FROM policy_qa_turns WHERE session_id = ?').run(sessionId);
      return result.changes > 0;
    });
  }

  async listSessionSummaries(): Promise<StoredSessionSummary[]> {
    return this.run('list', (db) => {
      const rows = db.prepare<[], SummaryRow>(`
        SELECT
          t.session_id AS session_id,
          COUNT(*) AS turn_count,
          MAX(t.created_at) AS last_activity,
          (
            SELECT u.content FROM policy_qa_turns u
            WHERE u.session_id = t.session_id AND u.role = 'user'
            ORDER BY u.id ASC LIMIT 1
          ) AS first_question
        FROM policy_qa_turns t
        GROUP BY t.session_id
      `).all();
      return rows.map((row) => ({
        sessionId: row.session_id,
        firstQuestion: row.first_question ?? '',
        lastActivityAt: row.last_activity,
        turnCount: row.turn_count,
      }));
    });
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
  }

  private run<T>(operation: StorageOperation, work: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StorageError(operation, 'primary', false, 'store is not initialized');
    }
    try {
      return work(this.db);
    } catch (error) {
      throw new StorageError(operation, 'primary', true, toError(error).message, toError(error));
    }
  }
}

function parseRole(value: string): TurnRole | null {
  return value === 'user' || value === 'assistant' ? value : null;
}

export async function createSqliteSessionStore(dbPath: string): Promise<SqliteSessionStore> {
  const store = new SqliteSessionStore(dbPath);
  await store.initialize();
  return store;
}

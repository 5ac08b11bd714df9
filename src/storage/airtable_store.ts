/**
 * @fileoverview Airtable-backed session store
 *
 * Remote primary tier. Airtable keeps one record per question/answer pair:
 *
 *   Session ID | Question | Answer | Timestamp
 *
 * A user turn is held in process until its assistant turn arrives and the
 * pair is written as one record. While pending it is still returned by
 * listTurns so history reads stay consistent inside the process.
 */

import { z } from 'zod';
import type { Turn } from '../types.js';
import { StorageError, type StorageOperation } from '../core/errors.js';
import { withTimeout } from '../utils/async.js';
import { getErrorMessage, toError } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { summarizeTurns, type SessionStore, type StoredSessionSummary } from './types.js';

export interface AirtableStoreOptions {
  apiKey: string;
  baseId: string;
  tableName: string;
  /** Per-request budget in milliseconds. */
  timeoutMs?: number;
  /** Defaults to https://api.airtable.com/v0 */
  apiUrl?: string;
  fetchImpl?: typeof fetch;
}

const DEFAULT_API_URL = 'https://api.airtable.com/v0';
// Airtable rejects batch deletes of more than ten records.
const DELETE_BATCH_SIZE = 10;

const FIELD = {
  sessionId: 'Session ID',
  question: 'Question',
  answer: 'Answer',
  timestamp: 'Timestamp',
} as const;

const recordSchema = z.object({
  id: z.string(),
  fields: z.object({
    [FIELD.sessionId]: z.string().optional(),
    [FIELD.question]: z.string().optional(),
    [FIELD.answer]: z.string().optional(),
    [FIELD.timestamp]: z.string().optional(),
  }),
});

const listResponseSchema = z.object({
  records: z.array(recordSchema),
  offset: z.string().optional(),
});

type AirtableRecord = z.infer<typeof recordSchema>;

interface PendingQuestion {
  content: string;
  createdAt: string;
}

export class AirtableSessionStore implements SessionStore {
  readonly kind = 'airtable' as const;
  private readonly pending = new Map<string, PendingQuestion>();
  private readonly tableUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: AirtableStoreOptions) {
    const apiUrl = (options.apiUrl ?? DEFAULT_API_URL).replace(/\/$/, '');
    this.tableUrl = `${apiUrl}/${encodeURIComponent(options.baseId)}/${encodeURIComponent(options.tableName)}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async appendTurn(sessionId: string, turn: Turn): Promise<void> {
    if (turn.role === 'user') {
      this.pending.set(sessionId, { content: turn.content, createdAt: turn.createdAt });
      return;
    }
    const question = this.pending.get(sessionId);
    await this.request('write', '', {
      method: 'POST',
      body: JSON.stringify({
        records: [
          {
            fields: {
              [FIELD.sessionId]: sessionId,
              [FIELD.question]: question?.content ?? '',
              [FIELD.answer]: turn.content,
              [FIELD.timestamp]: question?.createdAt ?? turn.createdAt,
            },
          },
        ],
      }),
    });
    this.pending.delete(sessionId);
  }

  async listTurns(sessionId: string): Promise<Turn[]> {
    const records = await this.listRecords('read', {
      filterByFormula: `{${FIELD.sessionId}} = '${escapeFormulaString(sessionId)}'`,
      direction: 'asc',
    });
    const turns = records.flatMap(recordToTurns);
    const question = this.pending.get(sessionId);
    if (question) {
      turns.push({ role: 'user', content: question.content, createdAt: question.createdAt });
    }
    return turns;
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    const hadPending = this.pending.delete(sessionId);
    const records = await this.listRecords('delete', {
      filterByFormula: `{${FIELD.sessionId}} = '${escapeFormulaString(sessionId)}'`,
      direction: 'asc',
    });
    for (let i = 0; i < records.length; i += DELETE_BATCH_SIZE) {
      const batch = records.slice(i, i + DELETE_BATCH_SIZE);
      const query = batch.map((record) => `records[]=${encodeURIComponent(record.id)}`).join('&');
      await this.request('delete', `?${query}`, { method: 'DELETE' });
    }
    logDebug('Airtable session deleted', { sessionId, records: records.length });
    return hadPending || records.length > 0;
  }

  async listSessionSummaries(): Promise<StoredSessionSummary[]> {
    // Newest first; reversing per session gives append order back.
    const records = await this.listRecords('list', { direction: 'desc' });
    const bySession = new Map<string, Turn[]>();
    for (const record of records) {
      const sessionId = record.fields[FIELD.sessionId];
      if (!sessionId) continue;
      const turns = bySession.get(sessionId) ?? [];
      turns.unshift(...recordToTurns(record));
      bySession.set(sessionId, turns);
    }
    for (const [sessionId, question] of this.pending) {
      const turns = bySession.get(sessionId) ?? [];
      turns.push({ role: 'user', content: question.content, createdAt: question.createdAt });
      bySession.set(sessionId, turns);
    }
    const summaries: StoredSessionSummary[] = [];
    for (const [sessionId, turns] of bySession) {
      const summary = summarizeTurns(sessionId, turns);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private async listRecords(
    operation: StorageOperation,
    query: { filterByFormula?: string; direction: 'asc' | 'desc' }
  ): Promise<AirtableRecord[]> {
    const records: AirtableRecord[] = [];
    let offset: string | undefined;
    do {
      const params = new URLSearchParams();
      if (query.filterByFormula) params.set('filterByFormula', query.filterByFormula);
      params.set('sort[0][field]', FIELD.timestamp);
      params.set('sort[0][direction]', query.direction);
      if (offset) params.set('offset', offset);
      const payload = await this.request(operation, `?${params.toString()}`, { method: 'GET' });
      const parsed = listResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new StorageError(operation, 'primary', false, `unexpected Airtable response: ${parsed.error.message}`);
      }
      records.push(...parsed.data.records);
      offset = parsed.data.offset;
    } while (offset);
    return records;
  }

  private async request(operation: StorageOperation, suffix: string, init: RequestInit): Promise<unknown> {
    const url = `${this.tableUrl}${suffix}`;
    let response: Response;
    try {
      response = await withTimeout(
        this.fetchImpl(url, {
          ...init,
          headers: {
            Authorization: `Bearer ${this.options.apiKey}`,
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
        }),
        this.options.timeoutMs,
        { context: `Airtable ${operation}` }
      );
    } catch (error) {
      throw new StorageError(operation, 'primary', true, getErrorMessage(error), toError(error));
    }
    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new StorageError(operation, 'primary', retryable, `Airtable API failed: ${response.status}`);
    }
    try {
      return await response.json();
    } catch (error) {
      throw new StorageError(operation, 'primary', false, 'Airtable returned invalid JSON', toError(error));
    }
  }
}

function recordToTurns(record: AirtableRecord): Turn[] {
  const fields = record.fields;
  const createdAt = fields[FIELD.timestamp] ?? '';
  // Every record is one question/answer pair. Airtable omits empty fields,
  // so a missing answer still yields an (empty) assistant turn.
  return [
    { role: 'user', content: fields[FIELD.question] ?? '', createdAt },
    { role: 'assistant', content: fields[FIELD.answer] ?? '', createdAt },
  ];
}

function escapeFormulaString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

import { describe, it, expect, beforeEach } from 'vitest';
import { AirtableSessionStore } from '../airtable_store.js';
import { StorageError } from '../../core/errors.js';
import { FakeAirtableTable } from './fake_airtable.js';

describe('AirtableSessionStore', () => {
  let table: FakeAirtableTable;
  let store: AirtableSessionStore;

  beforeEach(() => {
    table = new FakeAirtableTable();
    store = new AirtableSessionStore({
      apiKey: 'test-secret',
      baseId: 'appTestBase',
      tableName: 'Chat History',
      apiUrl: 'https://airtable.test/v0',
      fetchImpl: table.fetch,
    });
  });

  it('writes one record per question and answer pair', async () => {
    await store.appendTurn('s1', { role: 'user', content: 'Can I work remotely?', createdAt: '2026-03-01T09:00:00.000Z' });
    expect(table.requests).toHaveLength(0);

    await store.appendTurn('s1', { role: 'assistant', content: 'Two days a week.', createdAt: '2026-03-01T09:00:03.000Z' });

    const [post] = table.requests;
    expect(post?.method).toBe('POST');
    expect(post?.url.pathname).toBe('/v0/appTestBase/Chat%20History');
    expect(post?.authorization).toBe('Bearer test-secret');
    expect(post?.body).toEqual({
      records: [
        {
          fields: {
            'Session ID': 's1',
            Question: 'Can I work remotely?',
            Answer: 'Two days a week.',
            Timestamp: '2026-03-01T09:00:00.000Z',
          },
        },
      ],
    });
  });

  it('lists turns across pages in timestamp order with a pending question last', async () => {
    table.records.push(
      { id: 'r2', fields: { 'Session ID': 's1', Question: 'q2', Answer: 'a2', Timestamp: '2026-03-01T09:02:00.000Z' } },
      { id: 'r1', fields: { 'Session ID': 's1', Question: 'q1', Answer: 'a1', Timestamp: '2026-03-01T09:01:00.000Z' } },
      { id: 'r3', fields: { 'Session ID': 's1', Question: 'q3', Answer: 'a3', Timestamp: '2026-03-01T09:03:00.000Z' } },
      { id: 'r9', fields: { 'Session ID': 'other', Question: 'x', Answer: 'y', Timestamp: '2026-03-01T09:00:00.000Z' } }
    );
    await store.appendTurn('s1', { role: 'user', content: 'q4', createdAt: '2026-03-01T09:04:00.000Z' });

    const turns = await store.listTurns('s1');

    expect(turns.map((turn) => `${turn.role}:${turn.content}`)).toEqual([
      'user:q1', 'assistant:a1',
      'user:q2', 'assistant:a2',
      'user:q3', 'assistant:a3',
      'user:q4',
    ]);
    expect(table.requests.filter((request) => request.method === 'GET')).toHaveLength(2);
  });

  it('reads a record without an answer field as an empty assistant turn', async () => {
    table.records.push(
      { id: 'r1', fields: { 'Session ID': 's1', Question: 'q1', Timestamp: '2026-03-01T09:01:00.000Z' } },
      { id: 'r2', fields: { 'Session ID': 's1', Question: 'q2', Answer: 'a2', Timestamp: '2026-03-01T09:02:00.000Z' } }
    );

    const turns = await store.listTurns('s1');

    expect(turns.map((turn) => `${turn.role}:${turn.content}`)).toEqual([
      'user:q1', 'assistant:',
      'user:q2', 'assistant:a2',
    ]);
  });

  it('escapes quotes in the session filter', async () => {
    await store.listTurns("it's");
    expect(table.requests[0]?.url.searchParams.get('filterByFormula')).toBe("{Session ID} = 'it\\'s'");
  });

  it('deletes records in batches of ten', async () => {
    for (let i = 0; i < 12; i++) {
      const minute = String(i).padStart(2, '0');
      table.records.push({
        id: `r${i}`,
        fields: { 'Session ID': 's1', Question: `q${i}`, Answer: `a${i}`, Timestamp: `2026-03-01T09:${minute}:00.000Z` },
      });
    }

    expect(await store.deleteSession('s1')).toBe(true);

    const deletes = table.requests.filter((request) => request.method === 'DELETE');
    expect(deletes.map((request) => request.url.searchParams.getAll('records[]').length)).toEqual([10, 2]);
    expect(table.records).toEqual([]);
  });

  it('reports false when deleting an unknown session', async () => {
    expect(await store.deleteSession('missing')).toBe(false);
  });

  it('counts a pending question as something to delete', async () => {
    await store.appendTurn('s1', { role: 'user', content: 'q', createdAt: '2026-03-01T09:00:00.000Z' });
    expect(await store.deleteSession('s1')).toBe(true);
    expect(await store.listTurns('s1')).toEqual([]);
  });

  it('summarizes sessions from records and pending questions', async () => {
    table.records.push(
      { id: 'r1', fields: { 'Session ID': 's1', Question: 'first', Answer: 'a', Timestamp: '2026-03-01T09:01:00.000Z' } },
      { id: 'r2', fields: { 'Session ID': 's1', Question: 'second', Answer: 'b', Timestamp: '2026-03-01T09:05:00.000Z' } }
    );
    await store.appendTurn('s2', { role: 'user', content: 'pending only', createdAt: '2026-03-01T10:00:00.000Z' });

    const summaries = await store.listSessionSummaries();

    expect(summaries).toEqual([
      { sessionId: 's1', firstQuestion: 'first', lastActivityAt: '2026-03-01T09:05:00.000Z', turnCount: 4 },
      { sessionId: 's2', firstQuestion: 'pending only', lastActivityAt: '2026-03-01T10:00:00.000Z', turnCount: 1 },
    ]);
  });

  it('raises a retryable StorageError on server errors', async () => {
    table.failWith = 503;
    const failure = await store.listTurns('s1').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(StorageError);
    expect(failure).toMatchObject({ operation: 'read', retryable: true });
  });

  it('raises a non-retryable StorageError on client errors', async () => {
    table.failWith = 422;
    await store.appendTurn('s1', { role: 'user', content: 'q', createdAt: '2026-03-01T09:00:00.000Z' });
    const failure = await store
      .appendTurn('s1', { role: 'assistant', content: 'a', createdAt: '2026-03-01T09:00:01.000Z' })
      .catch((error: unknown) => error);

    expect(failure).toMatchObject({ operation: 'write', retryable: false });
  });
});

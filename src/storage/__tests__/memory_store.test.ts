import { describe, it, expect } from 'vitest';
import { MemorySessionStore } from '../memory_store.js';
import type { Turn } from '../../types.js';

const userTurn: Turn = { role: 'user', content: 'How many sick days?', createdAt: '2026-03-01T10:00:00.000Z' };
const assistantTurn: Turn = {
  role: 'assistant',
  content: 'Ten per year.',
  sources: [{ text: 'Employees receive ten sick days.', page: 4, documentId: 'leave.pdf' }],
  createdAt: '2026-03-01T10:00:01.000Z',
};

describe('MemorySessionStore', () => {
  it('returns turns in append order with sources intact', async () => {
    const store = new MemorySessionStore();
    await store.appendTurn('s1', userTurn);
    await store.appendTurn('s1', assistantTurn);

    expect(await store.listTurns('s1')).toEqual([userTurn, assistantTurn]);
  });

  it('hands out copies that cannot change stored turns', async () => {
    const store = new MemorySessionStore();
    await store.appendTurn('s1', assistantTurn);

    const [listed] = await store.listTurns('s1');
    listed?.sources?.push({ text: 'extra', page: null, documentId: 'x' });

    const [again] = await store.listTurns('s1');
    expect(again?.sources).toHaveLength(1);
  });

  it('returns an empty list for an unknown session', async () => {
    expect(await new MemorySessionStore().listTurns('missing')).toEqual([]);
  });

  it('deletes a session and reports whether it existed', async () => {
    const store = new MemorySessionStore();
    await store.appendTurn('s1', userTurn);

    expect(await store.deleteSession('s1')).toBe(true);
    expect(await store.deleteSession('s1')).toBe(false);
    expect(await store.listTurns('s1')).toEqual([]);
  });

  it('summarizes sessions by first question and last activity', async () => {
    const store = new MemorySessionStore();
    await store.appendTurn('s1', userTurn);
    await store.appendTurn('s1', assistantTurn);

    expect(await store.listSessionSummaries()).toEqual([
      {
        sessionId: 's1',
        firstQuestion: 'How many sick days?',
        lastActivityAt: '2026-03-01T10:00:01.000Z',
        turnCount: 2,
      },
    ]);
  });

  it('seeds only sessions it does not hold yet', async () => {
    const store = new MemorySessionStore();
    expect(await store.seedSession('s1', [userTurn])).toBe(true);
    expect(await store.seedSession('s1', [assistantTurn])).toBe(false);
    expect(await store.seedSession('s2', [])).toBe(false);
    expect(store.hasSession('s1')).toBe(true);
    expect(store.hasSession('s2')).toBe(false);
  });
});

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { askCommand, describeSource } from '../ask.js';
import { sessionsCommand } from '../sessions.js';
import { historyCommand } from '../history.js';
import { deleteCommand } from '../delete.js';
import { importIndexCommand } from '../import_index.js';
import { checkProvidersCommand } from '../check_providers.js';
import { resolveConfig } from '../../../config/index.js';
import { MemorySessionStore } from '../../../storage/memory_store.js';
import { ChunkStore } from '../../../storage/chunk_store.js';
import { APOLOGY_MESSAGE } from '../../../api/query_engine.js';
import { KeywordEmbeddings, ScriptedLLM, indexOf } from '../../../api/__tests__/fakes.js';

const config = resolveConfig({ storage: { primary: 'none' }, faq: { enabled: false } });

function printed(): string[] {
  return vi.mocked(console.log).mock.calls.map((call) => call.map(String).join(' '));
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

async function seededStore(): Promise<MemorySessionStore> {
  const store = new MemorySessionStore();
  await store.appendTurn('s1', { role: 'user', content: 'What is the vacation policy?', createdAt: '2026-03-01T09:00:00.000Z' });
  await store.appendTurn('s1', { role: 'assistant', content: 'Fifteen days.', createdAt: '2026-03-01T09:00:01.000Z' });
  return store;
}

describe('askCommand', () => {
  const embeddings = new KeywordEmbeddings(['vacation']);
  const index = indexOf(embeddings, [{ text: 'Vacation is 15 days.', page: 3, documentId: 'leave.pdf' }]);

  it('prints the answer, its sources and the session id', async () => {
    const result = await askCommand({
      config,
      args: ['What', 'is', 'the', 'vacation', 'policy?'],
      overrides: { llm: new ScriptedLLM(), embeddings, index, primary: null, faq: null, newSessionId: () => 'session-a' },
    });

    expect(result.answer).toBe('Scripted answer.');
    expect(printed()).toEqual([
      'Scripted answer.',
      '\nSources:',
      '  1. leave.pdf - page 3',
      '\nSession: session-a (not persisted)',
    ]);
  });

  it('prints the result as JSON', async () => {
    await askCommand({
      config,
      args: ['--json', 'hello'],
      overrides: { llm: null, embeddings: null, index: null, primary: null, faq: null, newSessionId: () => 'session-b' },
    });

    const output: unknown = JSON.parse(printed()[0] ?? '');
    expect(output).toMatchObject({ sessionId: 'session-b', answer: APOLOGY_MESSAGE, status: 'failed' });
  });

  it('notes when the documents could not be searched', async () => {
    await askCommand({
      config,
      args: ['vacation?', '--session', 'session-c'],
      overrides: { llm: new ScriptedLLM(), embeddings: null, index, primary: null, faq: null },
    });

    expect(printed()).toContain('\nNote: policy documents could not be searched; the answer is not grounded in them.');
    expect(printed()).toContain('\nSession: session-c (not persisted)');
  });

  it('requires a question', async () => {
    await expect(askCommand({ config, args: [] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });

  it('reports unknown flags as usage errors', async () => {
    await expect(askCommand({ config, args: ['q', '--verbose'] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });
});

describe('describeSource', () => {
  it('shows unknown for a missing page', () => {
    expect(describeSource({ text: 't', page: null, documentId: 'handbook.pdf' })).toBe('handbook.pdf - page unknown');
  });
});

describe('session commands', () => {
  it('lists sessions as JSON', async () => {
    const primary = await seededStore();

    const sessions = await sessionsCommand({ config, args: ['--json'], overrides: { primary } });

    expect(sessions).toEqual([
      { sessionId: 's1', preview: 'What is the vacation policy?', lastActivityAt: '2026-03-01T09:00:01.000Z', origin: 'primary' },
    ]);
    expect(JSON.parse(printed()[0] ?? '')).toEqual(sessions);
  });

  it('says so when there are no sessions', async () => {
    await sessionsCommand({ config, args: [], overrides: { primary: null } });
    expect(printed()).toEqual(['No sessions yet. Start one with: policy-qa ask "<question>"']);
  });

  it('prints the turns of a session', async () => {
    const primary = await seededStore();

    await historyCommand({ config, args: ['s1'], overrides: { primary } });

    expect(printed()).toEqual(['You: What is the vacation policy?', '', 'Assistant: Fifteen days.', '']);
  });

  it('reports an unknown session', async () => {
    await expect(historyCommand({ config, args: ['missing'], overrides: { primary: null } })).rejects.toMatchObject({
      code: 'SESSION_NOT_FOUND',
    });
  });

  it('deletes a session once', async () => {
    const primary = await seededStore();

    expect(await deleteCommand({ config, args: ['s1'], overrides: { primary } })).toBe(true);
    expect(await deleteCommand({ config, args: ['s1'], overrides: { primary } })).toBe(false);
    expect(printed()).toEqual(['Deleted session s1', 'No session s1 found; nothing to delete']);
  });

  it('requires a session id', async () => {
    await expect(deleteCommand({ config, args: [] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
    await expect(historyCommand({ config, args: [] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });
});

describe('importIndexCommand', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-qa-import-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeExport(count: number): Promise<string> {
    const file = path.join(dir, 'export.json');
    await fs.writeFile(
      file,
      JSON.stringify({
        vectors: Array.from({ length: count }, (_, i) => [1, i]),
        metadatas: Array.from({ length: count }, (_, i) => ({ page: i + 1, source: i % 2 === 0 ? 'a.pdf' : 'b.pdf' })),
        texts: Array.from({ length: count }, (_, i) => `chunk ${i}`),
      })
    );
    return file;
  }

  it('writes every chunk of the export to the chunk store', async () => {
    const file = await writeExport(250);
    const dbPath = path.join(dir, 'index.db');

    const summary = await importIndexCommand({ config, args: [file, '--db', dbPath, '--json'] });

    expect(summary).toEqual({ file, dbPath, imported: 250, total: 250, documents: 2 });
    const store = new ChunkStore(dbPath);
    await store.initialize();
    expect(store.count()).toBe(250);
    await store.close();
  });

  it('replaces existing chunks when asked to', async () => {
    const dbPath = path.join(dir, 'index.db');
    await importIndexCommand({ config, args: [await writeExport(5), '--db', dbPath, '--json'] });

    const summary = await importIndexCommand({ config, args: [await writeExport(2), '--db', dbPath, '--replace'] });

    expect(summary.total).toBe(2);
    expect(printed()).toContain('Import complete');
  });

  it('requires an export file', async () => {
    await expect(importIndexCommand({ config, args: [] })).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
  });
});

describe('checkProvidersCommand', () => {
  it('reports missing settings without contacting anything', async () => {
    const report = await checkProvidersCommand({ config, args: ['--json'], overrides: { index: null } });

    expect(report).toEqual({
      generation: {
        available: false,
        detail: 'missing AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_CHAT_DEPLOYMENT',
      },
      embeddings: {
        available: false,
        detail: 'missing AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_EMBEDDING_DEPLOYMENT',
      },
      index: { available: false, detail: 'no chunks loaded' },
      primaryStore: { available: false, detail: 'disabled; sessions are kept in memory only' },
    });
  });

  it('reports a loaded index', async () => {
    const embeddings = new KeywordEmbeddings(['x']);
    const index = indexOf(embeddings, [{ text: 'x', page: 1, documentId: 'd.pdf' }]);

    const report = await checkProvidersCommand({ config, args: [], overrides: { index } });

    expect(report.index).toEqual({ available: true, detail: '1 chunks' });
    expect(printed()[0]).toBe('Provider status');
  });
});

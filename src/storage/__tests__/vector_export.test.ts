import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { documentIdFromSource, parseVectorExport, readVectorExport } from '../vector_export.js';
import { ConfigurationError } from '../../core/errors.js';

describe('parseVectorExport', () => {
  it('turns parallel arrays into embedded chunks', () => {
    const chunks = parseVectorExport({
      vectors: [[0.1, 0.2], [0.3, 0.4]],
      metadatas: [{ page: 3, source: 'docs/policies/leave.pdf' }, { source: 'handbook.pdf' }],
      texts: ['Leave text', 'Handbook text'],
    });

    expect(chunks).toEqual([
      { id: 'chunk-0', chunk: { text: 'Leave text', page: 3, documentId: 'leave.pdf' }, embedding: [0.1, 0.2] },
      { id: 'chunk-1', chunk: { text: 'Handbook text', page: null, documentId: 'handbook.pdf' }, embedding: [0.3, 0.4] },
    ]);
  });

  it('skips entries without a vector and keeps their positions in ids', () => {
    const chunks = parseVectorExport({
      vectors: [null, [], [1, 0]],
      metadatas: [{}, {}, {}],
      texts: ['a', 'b', 'c'],
    });

    expect(chunks.map((item) => item.id)).toEqual(['chunk-2']);
    expect(chunks[0]?.chunk.documentId).toBe('unknown');
  });

  it('rejects arrays of different lengths', () => {
    expect(() =>
      parseVectorExport({ vectors: [[1]], metadatas: [], texts: ['a'] }, 'export.json')
    ).toThrow('Invalid configuration for export.json: vectors, metadatas and texts must have the same length');
  });

  it('rejects a document without the expected arrays', () => {
    expect(() => parseVectorExport({ vectors: [] })).toThrow(ConfigurationError);
  });
});

describe('documentIdFromSource', () => {
  it('uses the file name of posix and windows paths', () => {
    expect(documentIdFromSource('/data/policies/remote_work.pdf')).toBe('remote_work.pdf');
    expect(documentIdFromSource('C:\\policies\\benefits.pdf')).toBe('benefits.pdf');
  });

  it('falls back to unknown for a missing source', () => {
    expect(documentIdFromSource(undefined)).toBe('unknown');
    expect(documentIdFromSource('  ')).toBe('unknown');
  });
});

describe('readVectorExport', () => {
  let dir: string | null = null;

  afterEach(async () => {
    if (dir) await fs.rm(dir, { recursive: true, force: true });
    dir = null;
  });

  it('reads an export file', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-qa-export-'));
    const file = path.join(dir, 'export.json');
    await fs.writeFile(file, JSON.stringify({ vectors: [[1, 0]], metadatas: [{ page: 1 }], texts: ['t'] }));

    const chunks = await readVectorExport(file);
    expect(chunks).toHaveLength(1);
  });

  it('reports invalid JSON as a configuration error', async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-qa-export-'));
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '{ not json');

    await expect(readVectorExport(file)).rejects.toThrow('vector export is not valid JSON');
  });

  it('reports a missing file as a configuration error', async () => {
    await expect(readVectorExport(path.join(os.tmpdir(), 'policy-qa-missing', 'none.json'))).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

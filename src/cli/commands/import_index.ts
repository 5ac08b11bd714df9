/**
 * @fileoverview Import-index command - load a vector export into the chunk store
 */

import { parseArgs } from 'node:util';
import { ChunkStore } from '../../storage/chunk_store.js';
import { readVectorExport } from '../../storage/vector_export.js';
import { createError } from '../errors.js';
import { createProgressBar, printKeyValue } from '../progress.js';
import { parseCommandArgs, type CommandContext } from './types.js';

export const IMPORT_BATCH_SIZE = 100;

export interface ImportSummary {
  file: string;
  dbPath: string;
  imported: number;
  total: number;
  documents: number;
}

export async function importIndexCommand(options: CommandContext): Promise<ImportSummary> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        db: { type: 'string' },
        replace: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const file = positionals[0];
  if (!file) {
    throw createError('INVALID_ARGUMENT', 'An export file is required. Usage: policy-qa import-index <export.json>');
  }
  const dbPath = values.db ?? options.config.index.dbPath;

  const chunks = await readVectorExport(file);
  const store = new ChunkStore(dbPath);
  await store.initialize();

  let imported = 0;
  try {
    if (values.replace) store.clear();
    const progress = values.json || chunks.length === 0 ? null : createProgressBar({ total: chunks.length });
    try {
      for (let start = 0; start < chunks.length; start += IMPORT_BATCH_SIZE) {
        const batch = chunks.slice(start, start + IMPORT_BATCH_SIZE);
        imported += store.upsertChunks(batch);
        progress?.increment(batch.length, { task: `batch ${start / IMPORT_BATCH_SIZE + 1}` });
      }
    } finally {
      progress?.stop();
    }
    const summary: ImportSummary = {
      file,
      dbPath,
      imported,
      total: store.count(),
      documents: new Set(chunks.map((item) => item.chunk.documentId)).size,
    };

    if (values.json) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      console.log('Import complete');
      printKeyValue([
        { key: 'Chunks imported', value: summary.imported },
        { key: 'Documents', value: summary.documents },
        { key: 'Chunks in store', value: summary.total },
        { key: 'Chunk store', value: summary.dbPath },
      ]);
    }
    return summary;
  } finally {
    await store.close();
  }
}

/**
 * @fileoverview Ask command - answer one question in a session
 */

import { parseArgs } from 'node:util';
import { createQueryEngine } from '../../api/engine_factory.js';
import type { AskResult } from '../../api/query_engine.js';
import type { SourceChunk } from '../../types.js';
import { createError } from '../errors.js';
import { createSpinner } from '../progress.js';
import { parseCommandArgs, type CommandContext } from './types.js';

export async function askCommand(options: CommandContext): Promise<AskResult> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: {
        session: { type: 'string', short: 's' },
        new: { type: 'boolean', default: false },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const question = positionals.join(' ').trim();
  if (!question) {
    throw createError('INVALID_ARGUMENT', 'A question is required. Usage: policy-qa ask "<question>"');
  }

  const engine = await createQueryEngine(options.config, options.overrides);
  const spinner = values.json ? null : createSpinner('Looking through policy documents...');
  let result: AskResult;
  try {
    result = await engine.ask(question, { sessionId: values.session, newSession: values.new });
    spinner?.stop();
  } catch (error) {
    spinner?.fail('Could not answer the question');
    throw error;
  } finally {
    await engine.close();
  }

  if (values.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  console.log(result.answer);
  if (result.sources.length > 0) {
    console.log('\nSources:');
    result.sources.forEach((source, i) => console.log(`  ${i + 1}. ${describeSource(source)}`));
  }
  if (result.retrievalDegraded) {
    console.log('\nNote: policy documents could not be searched; the answer is not grounded in them.');
  }
  console.log(`\nSession: ${result.sessionId}${result.storage === 'local' ? ' (not persisted)' : ''}`);
  return result;
}

export function describeSource(source: SourceChunk): string {
  return `${source.documentId} - page ${source.page ?? 'unknown'}`;
}

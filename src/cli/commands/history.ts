/**
 * @fileoverview History command - print the turns of a session
 */

import { parseArgs } from 'node:util';
import { createQueryEngine } from '../../api/engine_factory.js';
import type { Turn } from '../../types.js';
import { createError } from '../errors.js';
import { describeSource } from './ask.js';
import { parseCommandArgs, SESSION_ONLY, type CommandContext } from './types.js';

export async function historyCommand(options: CommandContext): Promise<Turn[]> {
  const { values, positionals } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: { json: { type: 'boolean', default: false } },
      allowPositionals: true,
      strict: true,
    })
  );

  const sessionId = positionals[0]?.trim();
  if (!sessionId) {
    throw createError('INVALID_ARGUMENT', 'A session id is required. Usage: policy-qa history <sessionId>');
  }

  const engine = await createQueryEngine(options.config, { ...SESSION_ONLY, ...options.overrides });
  let turns: Turn[];
  try {
    turns = await engine.history(sessionId);
  } finally {
    await engine.close();
  }

  if (turns.length === 0) {
    throw createError('SESSION_NOT_FOUND', `No turns found for session ${sessionId}`, { sessionId });
  }
  if (values.json) {
    console.log(JSON.stringify(turns, null, 2));
    return turns;
  }

  for (const turn of turns) {
    console.log(`${turn.role === 'user' ? 'You' : 'Assistant'}: ${turn.content}`);
    for (const source of turn.sources ?? []) {
      console.log(`    source: ${describeSource(source)}`);
    }
    console.log();
  }
  return turns;
}

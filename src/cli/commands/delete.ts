/**
 * @fileoverview Delete command - remove a session from every store
 */

import { parseArgs } from 'node:util';
import { createQueryEngine } from '../../api/engine_factory.js';
import { createError } from '../errors.js';
import { parseCommandArgs, SESSION_ONLY, type CommandContext } from './types.js';

export async function deleteCommand(options: CommandContext): Promise<boolean> {
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
    throw createError('INVALID_ARGUMENT', 'A session id is required. Usage: policy-qa delete <sessionId>');
  }

  const engine = await createQueryEngine(options.config, { ...SESSION_ONLY, ...options.overrides });
  try {
    const removed = await engine.deleteSession(sessionId);
    if (values.json) {
      console.log(JSON.stringify({ sessionId, deleted: removed }, null, 2));
    } else {
      console.log(removed ? `Deleted session ${sessionId}` : `No session ${sessionId} found; nothing to delete`);
    }
    return removed;
  } finally {
    await engine.close();
  }
}

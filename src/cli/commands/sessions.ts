/**
 * @fileoverview Sessions command - list conversation sessions
 */

import { parseArgs } from 'node:util';
import { createQueryEngine } from '../../api/engine_factory.js';
import type { SessionSummary } from '../../types.js';
import { formatTimestamp, printTable } from '../progress.js';
import { parseCommandArgs, SESSION_ONLY, type CommandContext } from './types.js';

export async function sessionsCommand(options: CommandContext): Promise<SessionSummary[]> {
  const { values } = parseCommandArgs(() =>
    parseArgs({
      args: options.args,
      options: { json: { type: 'boolean', default: false } },
      allowPositionals: false,
      strict: true,
    })
  );

  const engine = await createQueryEngine(options.config, { ...SESSION_ONLY, ...options.overrides });
  let sessions: SessionSummary[];
  try {
    sessions = await engine.listSessions();
  } finally {
    await engine.close();
  }

  if (values.json) {
    console.log(JSON.stringify(sessions, null, 2));
    return sessions;
  }
  if (sessions.length === 0) {
    console.log('No sessions yet. Start one with: policy-qa ask "<question>"');
    return sessions;
  }
  printTable(
    ['Session', 'Last activity', 'Store', 'First question'],
    sessions.map((session) => [
      session.sessionId,
      formatTimestamp(session.lastActivityAt),
      session.origin,
      session.preview,
    ])
  );
  return sessions;
}

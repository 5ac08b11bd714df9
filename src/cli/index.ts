#!/usr/bin/env node
/**
 * @fileoverview policy-qa CLI
 *
 * Commands:
 *   policy-qa ask "<question>"     - Answer a question in a session
 *   policy-qa sessions             - List sessions
 *   policy-qa history <sessionId>  - Show the turns of a session
 *   policy-qa delete <sessionId>   - Delete a session
 *   policy-qa import-index <file>  - Import a vector export into the chunk store
 *   policy-qa check-providers      - Show provider and storage status
 *
 * @packageDocumentation
 */

import { run } from './dispatch.js';
import { formatError, formatErrorJson, getExitCode } from './errors.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  try {
    await run(args);
  } catch (error) {
    console.error(args.includes('--json') ? formatErrorJson(error) : formatError(error));
    process.exitCode = getExitCode(error);
  }
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = 1;
});

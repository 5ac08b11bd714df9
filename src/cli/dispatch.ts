/**
 * @fileoverview Command dispatch for the policy-qa CLI
 */

import { loadConfig } from '../config/index.js';
import { setLogLevel } from '../telemetry/logger.js';
import { VERSION } from '../index.js';
import { showHelp } from './help.js';
import { createError } from './errors.js';
import { askCommand } from './commands/ask.js';
import { sessionsCommand } from './commands/sessions.js';
import { historyCommand } from './commands/history.js';
import { deleteCommand } from './commands/delete.js';
import { importIndexCommand } from './commands/import_index.js';
import { checkProvidersCommand } from './commands/check_providers.js';
import type { QueryEngineOverrides } from '../api/engine_factory.js';
import type { CommandContext } from './commands/types.js';

type CommandHandler = (context: CommandContext) => Promise<unknown>;

const COMMANDS: Record<string, CommandHandler> = {
  'ask': askCommand,
  'sessions': sessionsCommand,
  'history': historyCommand,
  'delete': deleteCommand,
  'import-index': importIndexCommand,
  'check-providers': checkProvidersCommand,
};

export interface GlobalOptions {
  command: string | undefined;
  commandArgs: string[];
  configFile: string | undefined;
  help: boolean;
  version: boolean;
}

/**
 * Split global options from the command and its own arguments. Command
 * options are left in place for the command's strict parser.
 */
export function parseGlobalOptions(args: string[]): GlobalOptions {
  const rest: string[] = [];
  let configFile: string | undefined;
  let help = false;
  let version = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--config' || arg === '-c') {
      configFile = args[i + 1];
      if (!configFile) throw createError('INVALID_ARGUMENT', `${arg} needs a file path`);
      i++;
    } else if (arg.startsWith('--config=')) {
      configFile = arg.slice('--config='.length);
    } else if (arg === '--help' || arg === '-h') {
      help = true;
    } else if (arg === '--version' || arg === '-v') {
      version = true;
    } else {
      rest.push(arg);
    }
  }

  return {
    command: rest[0],
    commandArgs: rest.slice(1),
    configFile,
    help,
    version,
  };
}

export async function run(args: string[], overrides?: QueryEngineOverrides): Promise<void> {
  const options = parseGlobalOptions(args);

  if (options.version) {
    console.log(`policy-qa ${VERSION}`);
    return;
  }

  const { command, commandArgs } = options;
  if (options.help || !command || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
  }

  const config = await loadConfig(options.configFile ? { file: options.configFile } : {});
  setLogLevel(config.logLevel);
  await handler(overrides ? { config, args: commandArgs, overrides } : { config, args: commandArgs });
}


type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

let minimumLevel: LogLevel | null = null;

function resolveMinimumLevel(): LogLevel {
  if (minimumLevel) return minimumLevel;
  const fromEnv = process.env.POLICY_QA_LOG_LEVEL?.trim().toLowerCase() ?? '';
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Override the level read from POLICY_QA_LOG_LEVEL. Pass null to go back to the environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return resolveMinimumLevel();
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_RANK[level] < LEVEL_RANK[resolveMinimumLevel()]) return;
  // The CLI prints answers and --json payloads on stdout; logs always go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[policy-qa] ${message}`, context);
    return;
  }
  logger(`[policy-qa] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);

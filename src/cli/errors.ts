/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isPolicyQaError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIG_INVALID'
  | 'SESSION_NOT_FOUND'
  | 'PROVIDER_UNAVAILABLE'
  | 'INDEX_FAILED'
  | 'STORAGE_ERROR'
  | 'QUERY_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `policy-qa help <command>` for usage information.',
  CONFIG_INVALID: 'Check the config file and the POLICY_QA_* / AZURE_OPENAI_* / AIRTABLE_* environment variables.',
  SESSION_NOT_FOUND: 'Run `policy-qa sessions` to list known sessions.',
  PROVIDER_UNAVAILABLE: 'Run `policy-qa check-providers` to see which settings are missing.',
  INDEX_FAILED: 'Check that the file is a vector export with vectors, metadatas and texts arrays of equal length.',
  STORAGE_ERROR: 'Check that the database path is writable, or set POLICY_QA_PRIMARY_STORE=none.',
  QUERY_FAILED: 'Run `policy-qa check-providers` and try the question again.',
};

/** Maps library error codes to the CLI's. */
const LIBRARY_CODES: Record<string, CliErrorCode> = {
  CONFIGURATION_ERROR: 'CONFIG_INVALID',
  QUERY_INVALID: 'INVALID_ARGUMENT',
  STORAGE_ERROR: 'STORAGE_ERROR',
  EMBEDDING_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  GENERATION_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  RETRIEVAL_UNAVAILABLE: 'INDEX_FAILED',
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Normalize anything thrown by a command into a CliError.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (isPolicyQaError(error)) {
    const code = LIBRARY_CODES[error.code] ?? 'QUERY_FAILED';
    return createError(code, error.message, { libraryCode: error.code });
  }
  return new CliError(getErrorMessage(error), 'QUERY_FAILED');
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const head = `Error [${cliError.code}]: ${cliError.message}`;
  return cliError.suggestion ? `${head}\n\nSuggestion: ${cliError.suggestion}` : head;
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify(
    {
      error: {
        code: cliError.code,
        message: cliError.message,
        ...(cliError.suggestion ? { suggestion: cliError.suggestion } : {}),
        ...(cliError.details ? { details: cliError.details } : {}),
      },
    },
    null,
    2,
  );
}

export function getExitCode(error: unknown): number {
  return toCliError(error).code === 'INVALID_ARGUMENT' ? 2 : 1;
}

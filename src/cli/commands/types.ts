import type { PolicyQaConfig } from '../../config/index.js';
import type { QueryEngineOverrides } from '../../api/engine_factory.js';
import { createError } from '../errors.js';
import { getErrorMessage } from '../../utils/errors.js';

/**
 * What every command receives from the dispatcher.
 */
export interface CommandContext {
  config: PolicyQaConfig;
  /** Arguments after the command name, global options removed. */
  args: string[];
  /** Collaborator replacements, for tests. */
  overrides?: QueryEngineOverrides;
}

/**
 * Run a parseArgs call and report bad flags as INVALID_ARGUMENT.
 */
export function parseCommandArgs<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

/**
 * Collaborators that session commands never use; leaving them out skips
 * loading the index and building providers.
 */
export const SESSION_ONLY: QueryEngineOverrides = {
  llm: null,
  embeddings: null,
  index: null,
  faq: null,
};

/**
 * @fileoverview policy-qa error hierarchy
 *
 * Every failure that crosses a component boundary is one of these typed
 * errors. The query engine decides per code whether a failure is recovered
 * locally (retrieval), mapped to the fixed apology (generation), or absorbed
 * into a storage tier downgrade (storage).
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PolicyQaError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// PROVIDER ERRORS
// ============================================================================

export type ProviderErrorReason =
  | 'not_configured'
  | 'timeout'
  | 'network_error'
  | 'invalid_response'
  | 'unavailable';

/**
 * The embedding service could not be reached or returned a malformed vector.
 */
export class EmbeddingUnavailableError extends PolicyQaError {
  readonly code = 'EMBEDDING_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly reason: ProviderErrorReason,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Embedding ${reason}: ${message}`);
    this.name = 'EmbeddingUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason, cause: this.cause?.message },
    };
  }
}

/**
 * The vector index could not be reached, returned a malformed response, or
 * synthesis was asked to run on top of a failed retrieval in strict mode.
 */
export class RetrievalUnavailableError extends PolicyQaError {
  readonly code = 'RETRIEVAL_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly reason: ProviderErrorReason,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Retrieval ${reason}: ${message}`);
    this.name = 'RetrievalUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason, cause: this.cause?.message },
    };
  }
}

/**
 * Generation is not retried: a failed completion still costs quota.
 */
export class GenerationUnavailableError extends PolicyQaError {
  readonly code = 'GENERATION_UNAVAILABLE';
  readonly retryable = false;

  constructor(
    readonly reason: ProviderErrorReason,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Generation ${reason}: ${message}`);
    this.name = 'GenerationUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { reason: this.reason, cause: this.cause?.message },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'read' | 'write' | 'delete' | 'list' | 'open';
export type StorageTier = 'primary' | 'local';

export class StorageError extends PolicyQaError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly tier: StorageTier,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} on ${tier} store failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        tier: this.tier,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION / INPUT ERRORS
// ============================================================================

export class ConfigurationError extends PolicyQaError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`Invalid configuration for ${field}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { field: this.field } };
  }
}

export class QueryValidationError extends PolicyQaError {
  readonly code = 'QUERY_INVALID';
  readonly retryable = false;

  constructor(message: string) {
    super(message);
    this.name = 'QueryValidationError';
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isPolicyQaError(error: unknown): error is PolicyQaError {
  return error instanceof PolicyQaError;
}

/**
 * Retrieval-path failures that the engine recovers from with an empty result.
 */
export function isRetrievalFailure(
  error: unknown,
): error is EmbeddingUnavailableError | RetrievalUnavailableError {
  return error instanceof EmbeddingUnavailableError || error instanceof RetrievalUnavailableError;
}

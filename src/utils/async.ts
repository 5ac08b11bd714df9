/**
 * @fileoverview Timeouts for external calls
 *
 * Embedding, vector search, generation and primary store requests each run
 * under their own budget from `config.timeouts`. A missed budget surfaces as
 * a TimeoutError, which callers map to the `timeout` reason of their own
 * error type.
 *
 * @packageDocumentation
 */

export interface WithTimeoutOptions {
  /** What was being waited on, e.g. "answer generation". */
  context?: string;
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;
  readonly context?: string;

  constructor(timeoutMs: number, context?: string) {
    super(context ? `${context} did not finish within ${timeoutMs}ms` : `Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.context = context;
  }
}

/**
 * Settle with `promise`, or reject with TimeoutError once `timeoutMs` passes.
 * A missing, zero, negative or non-finite budget waits without limit.
 *
 * The underlying call is not cancelled; a late result is ignored.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs?: number,
  options: WithTimeoutOptions = {}
): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, options.context)), timeoutMs);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

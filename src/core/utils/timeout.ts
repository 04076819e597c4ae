/**
 * Raised when a read query exceeds its time budget
 */
export class QueryTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'QueryTimeoutError';
  }
}

/**
 * Raised when the store fails a read for any reason other than a timeout
 */
export class StorageUnavailableError extends Error {
  constructor(
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(`${operation} failed: ${cause?.message ?? 'storage unavailable'}`);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Race a promise against a timer. The timer is always cleared.
 */
export async function withTimeout<T>(
  operation: string,
  promise: Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new QueryTimeoutError(operation, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

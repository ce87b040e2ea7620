/**
 * Timeout protection for slow collaborators (the embedding provider).
 * Timeouts are clamped so a misconfigured value can neither fire instantly
 * nor block a writer queue for minutes.
 */

/** Maximum timeout in milliseconds */
export const MAX_TIMEOUT = 60000;

/** Minimum timeout to prevent instant failures */
export const MIN_TIMEOUT = 100;

/**
 * Clamp a requested timeout to [MIN_TIMEOUT, MAX_TIMEOUT]
 *
 * @example
 * getEffectiveTimeout(10)      // 100
 * getEffectiveTimeout(120000)  // 60000
 */
export function getEffectiveTimeout(requested: number): number {
  return Math.max(MIN_TIMEOUT, Math.min(requested, MAX_TIMEOUT));
}

/**
 * Race a promise (or thunk) against a timer.
 *
 * @param operation - Description for error messages
 * @throws {TimeoutError} If the operation exceeds the timeout
 *
 * @example
 * const vector = await withTimeout(() => provider.embed(text), 5000, 'Embedding');
 */
export async function withTimeout<T>(
  promiseOrFn: Promise<T> | (() => T | Promise<T>),
  timeoutMs: number,
  operation: string = 'Operation'
): Promise<T> {
  const effectiveTimeout = getEffectiveTimeout(timeoutMs);

  const promise: Promise<T> = typeof promiseOrFn === 'function'
    ? Promise.resolve().then(() => promiseOrFn())
    : promiseOrFn;

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(`${operation} timed out after ${effectiveTimeout}ms`, effectiveTimeout));
    }, effectiveTimeout);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) clearTimeout(timeoutId);
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly code = 'TIMEOUT_ERROR';

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

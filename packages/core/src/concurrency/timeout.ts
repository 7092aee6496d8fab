export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Race `promise` against a timer and, when given, an abort signal.
 * A missing or non-positive timeout disables the timer.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number | undefined,
  makeTimeoutError: () => Error = () => new TimeoutError('Operation timed out'),
  signal?: AbortSignal
): Promise<T> {
  const useTimer = timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0;
  if (!useTimer && !signal) return promise;

  if (signal?.aborted) {
    // The caller gave up; the original promise may still settle later.
    void promise.catch(() => undefined);
    throw new AbortedError();
  }

  let timeout: NodeJS.Timeout | null = null;
  let onAbort: (() => void) | null = null;

  const guard = new Promise<T>((_resolve, reject) => {
    if (useTimer) {
      timeout = setTimeout(() => reject(makeTimeoutError()), timeoutMs);
    }
    if (signal) {
      onAbort = () => reject(new AbortedError());
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, guard]);
  } finally {
    if (timeout) clearTimeout(timeout);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

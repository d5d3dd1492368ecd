export type TimedOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: unknown }
  | { status: 'timeout' };

/**
 * Races a promise against a timer and never rejects. The timer is always
 * cleared, and a rejection arriving after the timeout is absorbed into the
 * discarded branch instead of surfacing as an unhandled rejection.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<TimedOutcome<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<TimedOutcome<T>>((resolve) => {
    timer = setTimeout(() => resolve({ status: 'timeout' }), timeoutMs);
  });
  const settled = promise.then(
    (value): TimedOutcome<T> => ({ status: 'fulfilled', value }),
    (error: unknown): TimedOutcome<T> => ({ status: 'rejected', error }),
  );
  try {
    return await Promise.race([settled, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export type SettleOutcome<T> =
  | { kind: 'value'; value: T }
  | { kind: 'timeout' }
  | { kind: 'error'; error: unknown };

/**
 * Races a promise against a timer. The timer is always cleared; the original
 * promise keeps running after a timeout and callers decide what to do with a
 * late result.
 */
export async function settleWithin<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<SettleOutcome<T>> {
  let timeoutHandle: NodeJS.Timeout | null = null;
  const settled = promise.then(
    (value): SettleOutcome<T> => ({ kind: 'value', value }),
    (error: unknown): SettleOutcome<T> => ({ kind: 'error', error }),
  );
  const timeout = new Promise<SettleOutcome<T>>((resolve) => {
    timeoutHandle = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs);
  });

  return Promise.race([settled, timeout]).finally(() => {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  });
}

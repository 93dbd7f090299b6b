/**
 * Settle with `work`, unless `signal` aborts first; then reject with `toError(signal.reason)`.
 * The losing promise keeps running but its outcome is ignored.
 */
export function raceWithAbort<T>(
  work: Promise<T>,
  signal: AbortSignal | undefined,
  toError: (reason: unknown) => Error,
): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) {
    // Observe the abandoned promise so its rejection is not reported as unhandled.
    void work.catch(() => undefined);
    return Promise.reject(toError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

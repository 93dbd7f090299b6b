import { Logger } from '@nestjs/common';

export type RetryOptions = {
  label: string;
  logger?: Logger;
  attempts?: number;
  delayMs?: number;
  signal?: AbortSignal;
  /** Return false to fail fast (e.g. HTTP 401/404 are not worth retrying). */
  retryable?: (err: unknown) => boolean;
};

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const delayMs = options.delayMs ?? 1_000;
  const { label, logger, signal } = options;

  let lastErr: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (signal?.aborted) throw err;
      const canRetry = options.retryable ? options.retryable(err) : true;

      if (canRetry && attempt < attempts) {
        const waitMs = delayMs * attempt;
        logger?.warn(
          `${label}: failed (attempt ${attempt}/${attempts}), retrying in ${waitMs}ms: ${errToMessage(err)}`,
        );
        await sleep(waitMs, signal);
        continue;
      }

      if (canRetry) {
        logger?.warn(
          `${label}: failed after ${attempts} attempts: ${errToMessage(err)}`,
        );
      }
      throw err;
    }
  }

  // Unreachable, but keeps TS happy.
  throw lastErr instanceof Error ? lastErr : new Error(errToMessage(lastErr));
}

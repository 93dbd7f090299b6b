import type { Logger } from '@nestjs/common';
import { redactSecrets, sanitizeUrlForLogs } from '../security/redact';

const BODY_EXCERPT_LEN = 200;

/** Non-2xx answer from an upstream service. */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpStatusError';
  }
}

export type FetchTextParams = {
  /** Prefix for log lines and error messages, e.g. `Emby`. */
  service: string;
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  logger: Logger;
  /** Secret values to scrub from error text in addition to the usual token patterns. */
  secrets?: string[];
};

function causeMessage(err: unknown): string {
  if (!(err instanceof Error) || !('cause' in err)) return '';
  const cause = err.cause;
  if (cause instanceof Error) return cause.message;
  if (typeof cause === 'string') return cause;
  return '';
}

/** 5xx, 429 and transport failures are worth another attempt; other HTTP errors and bad JSON are not. */
export function isTransientHttpError(err: unknown): boolean {
  if (err instanceof HttpStatusError) return err.status >= 500 || err.status === 429;
  return !(err instanceof SyntaxError);
}

/**
 * GET `url` and return the body text. The request is aborted after `timeoutMs`, or as
 * soon as `signal` fires.
 */
export async function fetchText(params: FetchTextParams): Promise<string> {
  const { service, url, timeoutMs, signal, logger } = params;
  const secrets = params.secrets ?? [];
  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new Error(`timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  const forwardAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) forwardAbort();
  else signal?.addEventListener('abort', forwardAbort, { once: true });

  const safeUrl = redactSecrets(sanitizeUrlForLogs(url), secrets);
  const startedAt = Date.now();

  try {
    const res = await fetch(url, {
      method: 'GET',
      headers: params.headers,
      signal: controller.signal,
    });
    const text = await res.text();
    const ms = Date.now() - startedAt;

    if (!res.ok) {
      const excerpt = redactSecrets(text.slice(0, BODY_EXCERPT_LEN), secrets).trim();
      logger.warn(`${service} HTTP GET ${safeUrl} -> ${res.status} (${ms}ms)`);
      throw new HttpStatusError(
        res.status,
        `${service} request failed: HTTP ${res.status} ${excerpt}`.trim(),
      );
    }

    logger.debug(`${service} HTTP GET ${safeUrl} -> ${res.status} (${ms}ms)`);
    return text;
  } catch (err) {
    if (err instanceof HttpStatusError) throw err;
    const ms = Date.now() - startedAt;
    const reason = controller.signal.aborted && controller.signal.reason instanceof Error
      ? controller.signal.reason.message
      : err instanceof Error
        ? err.message
        : String(err);
    const cause = causeMessage(err);
    const message = redactSecrets(
      `${service} request failed: ${reason}${cause ? ` (cause: ${cause})` : ''}`,
      secrets,
    );
    logger.warn(`${service} HTTP GET ${safeUrl} -> FAILED (${ms}ms): ${message}`);
    throw new Error(message);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', forwardAbort);
  }
}

/** Like `fetchText`, parsed as JSON. Invalid JSON is reported as a SyntaxError. */
export async function fetchJson(params: FetchTextParams): Promise<unknown> {
  const text = await fetchText({
    ...params,
    headers: { Accept: 'application/json', ...params.headers },
  });
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

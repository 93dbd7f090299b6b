import {
  BadGatewayException,
  GatewayTimeoutException,
  InternalServerErrorException,
  PayloadTooLargeException,
} from '@nestjs/common';

export type NewsletterErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'LOOKUP_FAILED'
  | 'PATH_TRAVERSAL'
  | 'TEMPLATE_NOT_FOUND'
  | 'CONTEXT_TOO_LARGE'
  | 'RUN_TIMED_OUT'
  | 'CONFIGURATION_INVALID';

/**
 * The media server could not be reached (after the transport retry policy gave up).
 * Fatal to the run: there is no digest without source data.
 */
export class SourceUnavailableError extends BadGatewayException {
  readonly code: NewsletterErrorCode = 'SOURCE_UNAVAILABLE';

  constructor(message: string) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/** Per-item enrichment failure. Absorbed by the enricher, never fatal. */
export class LookupFailedError extends BadGatewayException {
  readonly code: NewsletterErrorCode = 'LOOKUP_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'LookupFailedError';
  }
}

export class PathTraversalError extends InternalServerErrorException {
  readonly code: NewsletterErrorCode = 'PATH_TRAVERSAL';

  constructor(readonly requestedPath: string) {
    super(`Template path escapes the template root: ${requestedPath}`);
    this.name = 'PathTraversalError';
  }
}

export class TemplateNotFoundError extends InternalServerErrorException {
  readonly code: NewsletterErrorCode = 'TEMPLATE_NOT_FOUND';

  constructor(readonly templateName: string) {
    super(`Template not found: ${templateName}`);
    this.name = 'TemplateNotFoundError';
  }
}

export class ContextTooLargeError extends PayloadTooLargeException {
  readonly code: NewsletterErrorCode = 'CONTEXT_TOO_LARGE';

  constructor(
    readonly actualBytes: number,
    readonly maxBytes: number,
  ) {
    super(
      `Template context is ${actualBytes} bytes, above the ${maxBytes} byte ceiling`,
    );
    this.name = 'ContextTooLargeError';
  }
}

export class RunTimedOutError extends GatewayTimeoutException {
  readonly code: NewsletterErrorCode = 'RUN_TIMED_OUT';

  constructor(readonly timeoutMs: number) {
    super(`Newsletter run exceeded its ${timeoutMs}ms budget`);
    this.name = 'RunTimedOutError';
  }
}

export class ConfigurationError extends InternalServerErrorException {
  readonly code: NewsletterErrorCode = 'CONFIGURATION_INVALID';

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}

export function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

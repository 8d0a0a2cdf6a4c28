import type { FailureCause, FailureReason } from './types';

/**
 * Raised by a transport when the per-attempt timeout fires before a response
 * arrives. Classified as retryable.
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Raised by a transport when the connection could not be established or was
 * dropped (DNS failure, refused, reset). Classified as retryable.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Base class for every error surfaced by the request executor.
 */
export class RequestError extends Error {
  readonly url: string;
  readonly attempts: number;

  constructor(message: string, options: { url: string; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'RequestError';
    this.url = options.url;
    this.attempts = options.attempts;
  }
}

export class FatalRequestError extends RequestError {
  readonly reason: FailureReason;
  readonly status?: number;
  readonly responseBody?: string;

  constructor(message: string, options: { url: string; attempts: number; failure: FailureCause }) {
    super(message, { url: options.url, attempts: options.attempts, cause: options.failure.error });
    this.name = 'FatalRequestError';
    this.reason = options.failure.reason;
    this.status = options.failure.status;
    this.responseBody = options.failure.bodySnippet;
  }
}

/**
 * A 2xx response whose body is not a JSON page of the expected shape.
 */
export class MalformedResponseError extends FatalRequestError {
  constructor(message: string, options: { url: string; attempts: number; failure: FailureCause }) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

export class ExhaustedRetriesError extends RequestError {
  readonly lastFailure: FailureCause;

  constructor(message: string, options: { url: string; attempts: number; lastFailure: FailureCause }) {
    super(message, { url: options.url, attempts: options.attempts, cause: options.lastFailure.error });
    this.name = 'ExhaustedRetriesError';
    this.lastFailure = options.lastFailure;
  }
}

export class RequestCancelledError extends RequestError {
  constructor(options: { url: string; attempts: number; cause?: unknown }) {
    super(`Request to ${options.url} was cancelled`, options);
    this.name = 'RequestCancelledError';
  }
}

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * An opaque record returned by a list endpoint. The engine never interprets
 * record fields beyond the cursor field handed to the watermark tracker.
 */
export type ApiRecord = Record<string, unknown>;

export interface PageResult<TRecord extends ApiRecord = ApiRecord> {
  records: TRecord[];
  /** Absolute URL of the next page, or null on the last page. */
  next: string | null;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Transport request structure.
 */
export interface TransportRequest {
  method: 'GET';
  url: string;
  headers: HttpHeaders;
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: ArrayBuffer;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * One completed HTTP exchange as seen by the retry classifier: either the
 * server answered with a status, or the request raised a fault before a
 * response arrived.
 */
export type HttpExchange =
  | { kind: 'response'; status: number; headers: HttpHeaders; bodyText: string }
  | { kind: 'fault'; error: unknown };

export type FailureReason = 'timeout' | 'connection' | 'status' | 'malformed' | 'unexpected';

export interface FailureCause {
  reason: FailureReason;
  message: string;
  status?: number;
  /** First characters of the response body, kept for diagnostics. */
  bodySnippet?: string;
  error?: unknown;
}

export type AttemptOutcome<TRecord extends ApiRecord = ApiRecord> =
  | { kind: 'success'; page: PageResult<TRecord> }
  | { kind: 'retryable'; cause: FailureCause }
  | { kind: 'fatal'; cause: FailureCause };

export interface BackoffPolicy {
  /** Wait before the retry that follows the given (1-based) failed attempt. */
  delay(attempt: number): number;
}

export interface RateLimiter {
  /** Resolves when the next request may start; rejects if `signal` aborts while waiting. */
  throttle(signal?: AbortSignal): Promise<void>;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface ExecutorConfig {
  /** Maximum attempts per logical request, including the first (default: 6). */
  maxAttempts?: number;
  /** Per-attempt timeout in milliseconds (default: 60_000). */
  timeoutMs?: number;
  /** Base of the exponential backoff in milliseconds (default: 1_500). Ignored when `backoff` is set. */
  backoffBaseMs?: number;
  backoff?: BackoffPolicy;
  headers?: HttpHeaders;
  transport?: HttpTransport;
  sleep?: SleepFn;
  logger?: Logger;
  rateLimiter?: RateLimiter;
  /** Checked before every attempt and every backoff wait. */
  signal?: AbortSignal;
}

export interface ResolvedExecutorConfig {
  maxAttempts: number;
  timeoutMs: number;
  backoff: BackoffPolicy;
  headers: HttpHeaders;
  transport: HttpTransport;
  sleep: SleepFn;
  logger: Logger;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
}

export interface PaginationSummary {
  pageCount: number;
  recordCount: number;
}

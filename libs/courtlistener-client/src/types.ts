import type {
  ApiRecord,
  BackoffPolicy,
  HttpTransport,
  Logger,
  RateLimiter,
  SleepFn,
} from '@courtsync/resilient-fetch';

/**
 * CourtListener Client Types
 */

// ============================================================================
// Core Client Configuration
// ============================================================================

export interface CourtListenerClientConfig {
  /** API root, e.g. `https://www.courtlistener.com/api/rest/v3`. */
  baseUrl?: string;
  userAgent?: string;
  /** Sent as `Authorization: Token <token>` when present. */
  token?: string;
  maxAttempts?: number;
  timeoutMs?: number;
  backoffBaseMs?: number;
  backoff?: BackoffPolicy;
  /** Requests per second; unlimited when unset. */
  maxRequestsPerSecond?: number;
  rateLimiter?: RateLimiter;
  logger?: Logger;
  transport?: HttpTransport;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

// ============================================================================
// Query Types
// ============================================================================

export type FilterValue = string | number | boolean | undefined;

/**
 * Filters accepted by list endpoints. Keys are sent verbatim as query
 * parameters; undefined values are dropped.
 */
export type QueryFilters = Record<string, FilterValue>;

export interface OpinionFilters extends QueryFilters {
  /** Inclusive lower bound on `date_filed`, `YYYY-MM-DD`. */
  date_filed_min?: string;
  date_filed_max?: string;
  /** e.g. `date_filed` or `-date_filed`. */
  order_by?: string;
}

// ============================================================================
// Records
// ============================================================================

/**
 * An opinion as returned by `/opinions/`. Only the fields the sync tooling
 * reads are named; the server sends many more.
 */
export interface Opinion extends ApiRecord {
  id?: unknown;
  absolute_url?: unknown;
  date_filed?: unknown;
  plain_text?: unknown;
}

import {
  IntervalRateLimiter,
  ResilientRequestExecutor,
  noopLogger,
  paginateRecords,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMER_DELAY_MS,
} from '@courtsync/resilient-fetch';
import type { ApiRecord, HttpHeaders, Logger, PaginationSummary, RateLimiter } from '@courtsync/resilient-fetch';
import type { CourtListenerClientConfig, Opinion, OpinionFilters, QueryFilters } from './types';

export const DEFAULT_BASE_URL = 'https://www.courtlistener.com/api/rest/v3';
export const DEFAULT_USER_AGENT = 'CourtListenerDemo/1.0 (set COURTLISTENER_UA with name/email)';

/**
 * CourtListener API Client
 *
 * Streams records from the paginated REST endpoints. Every page request goes
 * through a {@link ResilientRequestExecutor}, so throttling and server errors
 * are retried with exponential backoff while 4xx responses fail fast.
 */
export class CourtListenerClient {
  readonly baseUrl: string;
  private readonly executor: ResilientRequestExecutor;
  private readonly logger: Logger;

  constructor(config: CourtListenerClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.logger = config.logger ?? noopLogger;
    this.executor = new ResilientRequestExecutor({
      maxAttempts: config.maxAttempts,
      timeoutMs: config.timeoutMs,
      backoffBaseMs: config.backoffBaseMs,
      backoff: config.backoff,
      headers: buildHeaders(config),
      transport: config.transport,
      sleep: config.sleep,
      logger: this.logger,
      rateLimiter: resolveRateLimiter(config),
      signal: config.signal,
    });
  }

  get maxAttempts(): number {
    return this.executor.maxAttempts;
  }

  get timeoutMs(): number {
    return this.executor.timeoutMs;
  }

  /**
   * Stream every record of a list endpoint, following `next` links.
   *
   * @param endpoint - Path below the base URL (e.g. `/opinions/`)
   * @param filters - Query filters, applied to the first request only
   */
  fetchPaginated(endpoint: string, filters?: QueryFilters): AsyncGenerator<ApiRecord, PaginationSummary, void> {
    return paginateRecords({
      executor: this.executor,
      url: this.endpointUrl(endpoint),
      query: filters,
      logger: this.logger,
    });
  }

  opinions(filters?: OpinionFilters): AsyncGenerator<Opinion, PaginationSummary, void> {
    return this.fetchPaginated('/opinions/', filters);
  }

  endpointUrl(endpoint: string): string {
    return `${this.baseUrl}/${endpoint.replace(/^\/+/, '')}`;
  }
}

function buildHeaders(config: CourtListenerClientConfig): HttpHeaders {
  const headers: HttpHeaders = {
    'User-Agent': config.userAgent || DEFAULT_USER_AGENT,
    Accept: 'application/json',
  };
  if (config.token) {
    headers.Authorization = `Token ${config.token}`;
  }
  return headers;
}

function resolveRateLimiter(config: CourtListenerClientConfig): RateLimiter | undefined {
  if (config.rateLimiter) {
    return config.rateLimiter;
  }
  return config.maxRequestsPerSecond ? new IntervalRateLimiter(config.maxRequestsPerSecond) : undefined;
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a client configured from the environment.
 *
 * Time settings are read in seconds (`COURTLISTENER_TIMEOUT`,
 * `COURTLISTENER_BACKOFF_FACTOR`) and converted to milliseconds. Values that
 * do not parse to a positive number, or a timeout longer than a Node timer
 * can hold, fall back to the defaults.
 */
export function createCourtListenerClient(
  configOverrides?: Partial<CourtListenerClientConfig>,
  env: NodeJS.ProcessEnv = process.env,
): CourtListenerClient {
  const timeoutSeconds = parsePositiveNumber(env.COURTLISTENER_TIMEOUT, MAX_TIMER_DELAY_MS / 1000);
  const backoffSeconds = parsePositiveNumber(env.COURTLISTENER_BACKOFF_FACTOR);
  const maxAttempts = parsePositiveNumber(env.COURTLISTENER_MAX_RETRIES);

  return new CourtListenerClient({
    baseUrl: env.COURTLISTENER_API_BASE || DEFAULT_BASE_URL,
    userAgent: env.COURTLISTENER_UA || DEFAULT_USER_AGENT,
    token: env.COURTLISTENER_TOKEN || undefined,
    maxAttempts: maxAttempts !== undefined && Number.isInteger(maxAttempts) ? maxAttempts : DEFAULT_MAX_ATTEMPTS,
    timeoutMs: timeoutSeconds !== undefined ? Math.min(timeoutSeconds * 1000, MAX_TIMER_DELAY_MS) : DEFAULT_TIMEOUT_MS,
    backoffBaseMs: backoffSeconds !== undefined ? backoffSeconds * 1000 : DEFAULT_BACKOFF_BASE_MS,
    maxRequestsPerSecond: parsePositiveNumber(env.COURTLISTENER_MAX_RPS),
    ...configOverrides,
  });
}

function parsePositiveNumber(value: string | undefined, max = Number.MAX_SAFE_INTEGER): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 && parsed <= max ? parsed : undefined;
}

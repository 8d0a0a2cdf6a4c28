import { setTimeout as delay } from 'timers/promises';
import { createBackoffPolicy } from './backoff';
import { classifyExchange } from './classifier';
import {
  ExhaustedRetriesError,
  FatalRequestError,
  MalformedResponseError,
  RequestCancelledError,
  TimeoutError,
} from './errors';
import { noopLogger } from './logger';
import { fetchTransport } from './transport/fetchTransport';
import type {
  ExecutorConfig,
  FailureCause,
  HttpExchange,
  PageResult,
  QueryParams,
  ResolvedExecutorConfig,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 6;
export const DEFAULT_TIMEOUT_MS = 60_000;
/** Largest delay Node timers honour; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Applies defaults to an executor configuration and validates the numeric
 * settings.
 */
export function resolveExecutorConfig(config: ExecutorConfig = {}): ResolvedExecutorConfig {
  const maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  if (!(timeoutMs > 0) || timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`timeoutMs must be in (0, ${MAX_TIMER_DELAY_MS}], got ${timeoutMs}`);
  }

  const signal = config.signal;

  return {
    maxAttempts,
    timeoutMs,
    backoff: config.backoff ?? createBackoffPolicy({ baseDelayMs: config.backoffBaseMs }),
    headers: { ...config.headers },
    transport: config.transport ?? fetchTransport,
    sleep: config.sleep ?? ((ms: number) => delay(ms, undefined, { signal })),
    logger: config.logger ?? noopLogger,
    rateLimiter: config.rateLimiter,
    signal,
  };
}

/**
 * Issues one logical GET per call, retrying transient failures with
 * exponential backoff until a decodable page arrives or the attempt budget is
 * spent. Holds no state between calls.
 *
 * @example
 * ```typescript
 * const executor = new ResilientRequestExecutor({ maxAttempts: 3, logger: new ConsoleLogger() });
 * const page = await executor.execute('https://api.example.com/items/', { since: '2024-01-01' });
 * console.log(page.records.length, page.next);
 * ```
 */
export class ResilientRequestExecutor {
  private readonly config: ResolvedExecutorConfig;

  constructor(config: ExecutorConfig = {}) {
    this.config = resolveExecutorConfig(config);
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  async execute(url: string, query?: QueryParams): Promise<PageResult> {
    const { maxAttempts, backoff, logger, signal } = this.config;
    const requestUrl = this.buildUrl(url, query);

    for (let attempt = 1; ; attempt += 1) {
      this.throwIfCancelled(requestUrl, attempt - 1);
      if (this.config.rateLimiter) {
        try {
          await this.config.rateLimiter.throttle(signal);
        } catch (error) {
          if (signal?.aborted) {
            throw this.cancelled(requestUrl, attempt - 1, error);
          }
          throw error;
        }
        this.throwIfCancelled(requestUrl, attempt - 1);
      }

      const startedAt = Date.now();
      logger.debug('http.request.attempt', { url: requestUrl, attempt, maxAttempts });

      const exchange = await this.performAttempt(requestUrl);
      if (exchange.kind === 'fault' && signal?.aborted) {
        throw this.cancelled(requestUrl, attempt, exchange.error);
      }

      const outcome = classifyExchange(exchange);

      if (outcome.kind === 'success') {
        logger.info('http.request.success', {
          url: requestUrl,
          attempt,
          status: exchange.kind === 'response' ? exchange.status : undefined,
          records: outcome.page.records.length,
          hasNext: outcome.page.next !== null,
          durationMs: Date.now() - startedAt,
        });
        return outcome.page;
      }

      if (outcome.kind === 'fatal') {
        logger.error('http.request.failed', {
          ...this.failureMeta(requestUrl, attempt, outcome.cause),
          retryable: false,
        });
        throw this.fatal(requestUrl, attempt, outcome.cause);
      }

      if (attempt >= maxAttempts) {
        logger.error('http.request.failed', {
          ...this.failureMeta(requestUrl, attempt, outcome.cause),
          retryable: true,
          exhausted: true,
        });
        throw new ExhaustedRetriesError(`Failed after ${attempt} attempts to GET ${requestUrl}`, {
          url: requestUrl,
          attempts: attempt,
          lastFailure: outcome.cause,
        });
      }

      const delayMs = Math.min(backoff.delay(attempt), MAX_TIMER_DELAY_MS);
      logger.warn('http.request.retry', {
        ...this.failureMeta(requestUrl, attempt, outcome.cause),
        delayMs,
      });

      this.throwIfCancelled(requestUrl, attempt);
      try {
        await this.config.sleep(delayMs);
      } catch (error) {
        if (signal?.aborted) {
          throw this.cancelled(requestUrl, attempt, error);
        }
        throw error;
      }
    }
  }

  private async performAttempt(url: string): Promise<HttpExchange> {
    const { transport, timeoutMs, headers, signal } = this.config;
    const controller = new AbortController();
    const abortHandler = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', abortHandler);

    let didTimeout = false;
    const timeoutHandle = setTimeout(() => {
      didTimeout = true;
      controller.abort();
    }, timeoutMs);

    try {
      const raw = await transport({ method: 'GET', url, headers: { ...headers } }, controller.signal);
      const bodyText = new TextDecoder().decode(raw.body);
      return { kind: 'response', status: raw.status, headers: raw.headers, bodyText };
    } catch (error) {
      if (didTimeout) {
        return { kind: 'fault', error: new TimeoutError(`Request timed out after ${timeoutMs}ms`) };
      }
      return { kind: 'fault', error };
    } finally {
      clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', abortHandler);
    }
  }

  private buildUrl(url: string, query?: QueryParams): string {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      throw new FatalRequestError(`Invalid request URL: ${url}`, {
        url,
        attempts: 0,
        failure: { reason: 'unexpected', message: 'Invalid request URL', error },
      });
    }

    for (const [key, value] of Object.entries(query ?? {})) {
      if (value === undefined) continue;
      parsed.searchParams.set(key, String(value));
    }
    return parsed.toString();
  }

  private throwIfCancelled(url: string, attempts: number): void {
    const { signal } = this.config;
    if (signal?.aborted) {
      throw this.cancelled(url, attempts, signal.reason);
    }
  }

  private cancelled(url: string, attempts: number, cause: unknown): RequestCancelledError {
    this.config.logger.warn('http.request.cancelled', { url, attempts });
    return new RequestCancelledError({ url, attempts, cause });
  }

  private fatal(url: string, attempt: number, failure: FailureCause): FatalRequestError {
    const options = { url, attempts: attempt, failure };
    if (failure.reason === 'malformed') {
      return new MalformedResponseError(`Malformed response from ${url}: ${failure.message}`, options);
    }
    return new FatalRequestError(`Non-retryable failure for ${url}: ${failure.message}`, options);
  }

  private failureMeta(url: string, attempt: number, failure: FailureCause): Record<string, unknown> {
    return {
      url,
      attempt,
      maxAttempts: this.config.maxAttempts,
      reason: failure.reason,
      status: failure.status,
      error: failure.message,
      body: failure.reason === 'status' || failure.reason === 'malformed' ? failure.bodySnippet : undefined,
    };
  }
}

import { beforeEach, describe, expect, it, vi } from 'vitest';
import { MAX_TIMER_DELAY_MS, ResilientRequestExecutor, resolveExecutorConfig } from '../executor';
import {
  ConnectionError,
  ExhaustedRetriesError,
  FatalRequestError,
  MalformedResponseError,
  RequestCancelledError,
} from '../errors';
import type { ExecutorConfig, Logger, RawHttpResponse, TransportRequest } from '../types';

const raw = async (status: number, body: unknown): Promise<RawHttpResponse> => ({
  status,
  headers: { 'content-type': 'application/json' },
  body: await new Response(typeof body === 'string' ? body : JSON.stringify(body)).arrayBuffer(),
});

const page = (records: Array<Record<string, unknown>>, next: string | null = null) => raw(200, { results: records, next });

const URL_BASE = 'https://api.test/v3/items/';

describe('ResilientRequestExecutor', () => {
  let logger: Logger;
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    sleep = vi.fn(async (_ms: number) => undefined);
  });

  const createExecutor = (transport: ExecutorConfig['transport'], overrides: ExecutorConfig = {}) =>
    new ResilientRequestExecutor({
      transport,
      logger,
      sleep,
      backoffBaseMs: 1500,
      ...overrides,
    });

  it('returns the first successful page without sleeping', async () => {
    const transport = vi.fn(async () => page([{ id: 1 }], 'https://api.test/v3/items/?page=2'));
    const executor = createExecutor(transport);

    const result = await executor.execute(URL_BASE);

    expect(result).toEqual({ records: [{ id: 1 }], next: 'https://api.test/v3/items/?page=2' });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sends configured headers and appends defined query params', async () => {
    const transport = vi.fn(async (_req: TransportRequest, _signal: AbortSignal) => page([]));
    const executor = createExecutor(transport, {
      headers: { 'User-Agent': 'courtsync-test/1.0', Authorization: 'Token test-token' },
    });

    await executor.execute(URL_BASE, { date_filed_min: '2024-01-01', order_by: undefined, page_size: 20 });

    const [request] = transport.mock.calls[0];
    expect(request).toEqual({
      method: 'GET',
      url: 'https://api.test/v3/items/?date_filed_min=2024-01-01&page_size=20',
      headers: { 'User-Agent': 'courtsync-test/1.0', Authorization: 'Token test-token' },
    });
  });

  it('retries transient failures and succeeds on attempt k', async () => {
    const transport = vi
      .fn()
      .mockImplementationOnce(() => raw(429, 'slow down'))
      .mockImplementationOnce(() => raw(503, 'unavailable'))
      .mockImplementationOnce(() => Promise.reject(new ConnectionError('Connection failed: reset')))
      .mockImplementationOnce(() => page([{ id: 7 }]));
    const executor = createExecutor(transport);

    const result = await executor.execute(URL_BASE);

    expect(result.records).toEqual([{ id: 7 }]);
    expect(transport).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1500, 3000, 6000]);
  });

  it('gives up after maxAttempts with ExhaustedRetriesError', async () => {
    const transport = vi.fn(async () => raw(500, 'boom'));
    const executor = createExecutor(transport, { maxAttempts: 4 });

    const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    expect(error).toMatchObject({
      attempts: 4,
      url: URL_BASE,
      lastFailure: { reason: 'status', status: 500 },
    });
    expect(transport).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1500, 3000, 6000]);
  });

  it('uses six attempts by default', async () => {
    const transport = vi.fn(async () => raw(502, ''));
    const executor = createExecutor(transport);

    await expect(executor.execute(URL_BASE)).rejects.toBeInstanceOf(ExhaustedRetriesError);
    expect(transport).toHaveBeenCalledTimes(6);
    expect(sleep).toHaveBeenCalledTimes(5);
  });

  it('fails immediately on a 403 without retrying', async () => {
    const transport = vi.fn(async () => raw(403, { detail: 'Invalid token.' }));
    const executor = createExecutor(transport);

    const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FatalRequestError);
    expect(error).toMatchObject({
      status: 403,
      attempts: 1,
      reason: 'status',
      responseBody: '{"detail":"Invalid token."}',
    });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops at the attempt that fails fatally', async () => {
    const transport = vi
      .fn()
      .mockImplementationOnce(() => raw(502, ''))
      .mockImplementationOnce(() => raw(504, ''))
      .mockImplementationOnce(() => raw(404, 'missing'))
      .mockImplementation(() => page([]));
    const executor = createExecutor(transport);

    const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FatalRequestError);
    expect(error).toMatchObject({ attempts: 3, status: 404 });
    expect(transport).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('does not retry a success status with an undecodable body', async () => {
    const transport = vi.fn(async () => raw(200, 'not json at all'));
    const executor = createExecutor(transport);

    const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error).toBeInstanceOf(FatalRequestError);
    expect(error).toMatchObject({ reason: 'malformed', responseBody: 'not json at all' });
    expect(transport).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not retry unexpected transport errors', async () => {
    const transport = vi.fn(async () => {
      throw new Error('certificate has expired');
    });
    const executor = createExecutor(transport);

    await expect(executor.execute(URL_BASE)).rejects.toMatchObject({
      name: 'FatalRequestError',
      reason: 'unexpected',
    });
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('turns a request that outlives the timeout into a retryable timeout', async () => {
    const transport = vi.fn(
      (_req: TransportRequest, signal: AbortSignal) =>
        new Promise<RawHttpResponse>((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
    );
    const executor = createExecutor(transport, { timeoutMs: 5, maxAttempts: 2 });

    const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    expect(error).toMatchObject({ attempts: 2, lastFailure: { reason: 'timeout' } });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('caps backoff waits at the longest delay a timer can hold', async () => {
    const transport = vi.fn(async () => raw(503, ''));
    const executor = createExecutor(transport, { maxAttempts: 24 });

    await expect(executor.execute(URL_BASE)).rejects.toBeInstanceOf(ExhaustedRetriesError);

    const delays = sleep.mock.calls.map(([ms]) => ms);
    expect(delays).toHaveLength(23);
    expect(delays.slice(19)).toEqual([786_432_000, 1_572_864_000, MAX_TIMER_DELAY_MS, MAX_TIMER_DELAY_MS]);
  });

  it('rejects an invalid URL without calling the transport', async () => {
    const transport = vi.fn(async () => page([]));
    const executor = createExecutor(transport);

    await expect(executor.execute('not a url')).rejects.toBeInstanceOf(FatalRequestError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('logs each retry with attempt, status and delay', async () => {
    const transport = vi
      .fn()
      .mockImplementationOnce(() => raw(429, ''))
      .mockImplementationOnce(() => page([{ id: 1 }]));
    const executor = createExecutor(transport);

    await executor.execute(URL_BASE);

    expect(logger.warn).toHaveBeenCalledWith(
      'http.request.retry',
      expect.objectContaining({ url: URL_BASE, attempt: 1, maxAttempts: 6, status: 429, reason: 'status', delayMs: 1500 }),
    );
    expect(logger.info).toHaveBeenCalledWith(
      'http.request.success',
      expect.objectContaining({ attempt: 2, status: 200, records: 1, hasNext: false }),
    );
  });

  it('logs terminal failures as errors', async () => {
    const transport = vi.fn(async () => raw(401, ''));
    const executor = createExecutor(transport);

    await expect(executor.execute(URL_BASE)).rejects.toThrow(FatalRequestError);
    expect(logger.error).toHaveBeenCalledWith(
      'http.request.failed',
      expect.objectContaining({ attempt: 1, status: 401, retryable: false }),
    );
  });

  describe('cancellation', () => {
    it('performs no request when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const transport = vi.fn(async () => page([]));
      const executor = createExecutor(transport, { signal: controller.signal });

      const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(error).toMatchObject({ attempts: 0 });
      expect(transport).not.toHaveBeenCalled();
    });

    it('stops before the next attempt when cancelled during a backoff wait', async () => {
      const controller = new AbortController();
      const transport = vi.fn(async () => raw(503, ''));
      sleep.mockImplementation(async () => {
        controller.abort();
      });
      const executor = createExecutor(transport, { signal: controller.signal });

      const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(error).not.toBeInstanceOf(ExhaustedRetriesError);
      expect(error).toMatchObject({ attempts: 1 });
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it('passes the signal to the rate limiter and stops when cancelled while throttled', async () => {
      const controller = new AbortController();
      const transport = vi.fn(async () => page([]));
      const throttle = vi.fn(async (_signal?: AbortSignal) => {
        controller.abort();
      });
      const executor = createExecutor(transport, { signal: controller.signal, rateLimiter: { throttle } });

      const error = await executor.execute(URL_BASE).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(RequestCancelledError);
      expect(error).toMatchObject({ attempts: 0 });
      expect(throttle).toHaveBeenCalledWith(controller.signal);
      expect(transport).not.toHaveBeenCalled();
    });

    it('reports a rate limiter wait rejected by the abort as cancellation', async () => {
      const controller = new AbortController();
      const transport = vi.fn(async () => page([]));
      const executor = createExecutor(transport, {
        signal: controller.signal,
        rateLimiter: {
          throttle: async () => {
            controller.abort();
            throw new Error('The operation was aborted');
          },
        },
      });

      await expect(executor.execute(URL_BASE)).rejects.toBeInstanceOf(RequestCancelledError);
      expect(transport).not.toHaveBeenCalled();
    });

    it('reports an abort during a request as cancellation', async () => {
      const controller = new AbortController();
      const transport = vi.fn(
        (_req: TransportRequest, signal: AbortSignal) =>
          new Promise<RawHttpResponse>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(new Error('This operation was aborted')));
            controller.abort();
          }),
      );
      const executor = createExecutor(transport, { signal: controller.signal });

      await expect(executor.execute(URL_BASE)).rejects.toBeInstanceOf(RequestCancelledError);
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});

describe('resolveExecutorConfig', () => {
  it('applies defaults', () => {
    const config = resolveExecutorConfig();
    expect(config.maxAttempts).toBe(6);
    expect(config.timeoutMs).toBe(60_000);
    expect(config.backoff.delay(1)).toBe(1500);
    expect(config.headers).toEqual({});
  });

  it('rejects invalid attempt budgets and timeouts', () => {
    expect(() => resolveExecutorConfig({ maxAttempts: 0 })).toThrow(RangeError);
    expect(() => resolveExecutorConfig({ maxAttempts: 2.5 })).toThrow(RangeError);
    expect(() => resolveExecutorConfig({ timeoutMs: 0 })).toThrow(RangeError);
  });

  it('rejects timeouts a timer cannot hold', () => {
    expect(() => resolveExecutorConfig({ timeoutMs: 3_000_000_000 })).toThrow(RangeError);
    expect(resolveExecutorConfig({ timeoutMs: MAX_TIMER_DELAY_MS }).timeoutMs).toBe(MAX_TIMER_DELAY_MS);
  });
});

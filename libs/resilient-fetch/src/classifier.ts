import { z } from 'zod';
import { ConnectionError, TimeoutError } from './errors';
import type { ApiRecord, AttemptOutcome, FailureCause, HttpExchange } from './types';

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const BODY_SNIPPET_LENGTH = 1000;

const pageSchema = z.object({
  results: z.array(z.record(z.string(), z.unknown())),
  next: z.string().nullable().optional(),
});

/**
 * Classify one HTTP exchange into success, retryable failure or fatal
 * failure. Pure: no I/O, no sleeping, no logging.
 */
export function classifyExchange(exchange: HttpExchange): AttemptOutcome {
  if (exchange.kind === 'fault') {
    return classifyFault(exchange.error);
  }

  const { status, bodyText } = exchange;

  if (status >= 200 && status < 300) {
    return decodePage(status, bodyText);
  }

  const cause: FailureCause = {
    reason: 'status',
    status,
    message: `HTTP ${status}`,
    bodySnippet: snippet(bodyText),
  };

  return RETRYABLE_STATUSES.has(status) ? { kind: 'retryable', cause } : { kind: 'fatal', cause };
}

function classifyFault(error: unknown): AttemptOutcome {
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof TimeoutError) {
    return { kind: 'retryable', cause: { reason: 'timeout', message, error } };
  }
  if (error instanceof ConnectionError) {
    return { kind: 'retryable', cause: { reason: 'connection', message, error } };
  }
  return { kind: 'fatal', cause: { reason: 'unexpected', message, error } };
}

function decodePage(status: number, bodyText: string): AttemptOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch (error) {
    return {
      kind: 'fatal',
      cause: {
        reason: 'malformed',
        status,
        message: 'Response body is not valid JSON',
        bodySnippet: snippet(bodyText),
        error,
      },
    };
  }

  const result = pageSchema.safeParse(parsed);
  if (!result.success) {
    return {
      kind: 'fatal',
      cause: {
        reason: 'malformed',
        status,
        message: 'Response body is not a page with a results array',
        bodySnippet: snippet(bodyText),
        error: result.error,
      },
    };
  }

  const records: ApiRecord[] = result.data.results;
  const next = result.data.next ? result.data.next : null;
  return { kind: 'success', page: { records, next } };
}

function snippet(bodyText: string): string | undefined {
  return bodyText ? bodyText.slice(0, BODY_SNIPPET_LENGTH) : undefined;
}

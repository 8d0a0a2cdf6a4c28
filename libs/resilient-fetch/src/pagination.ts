import { FatalRequestError } from './errors';
import { noopLogger } from './logger';
import type { ApiRecord, Logger, PageResult, PaginationSummary, QueryParams } from './types';

/**
 * The slice of the executor the paginator needs; lets tests drive pagination
 * with a scripted fake.
 */
export interface PageFetcher {
  execute(url: string, query?: QueryParams): Promise<PageResult>;
}

export interface PaginateOptions {
  executor: PageFetcher;
  /** URL of the first page. */
  url: string;
  /** Filters for the first page only; continuation URLs already encode them. */
  query?: QueryParams;
  logger?: Logger;
}

export interface Page {
  index: number;
  url: string;
  records: ApiRecord[];
  next: string | null;
}

/**
 * Yields pages in server order, following each page's `next` link until a
 * page has none. The generator fetches a page only when the consumer asks for
 * it, so breaking out of the loop stops all further requests. A `next` link
 * pointing at a page already fetched in this stream ends it with a
 * {@link FatalRequestError}.
 */
export async function* streamPages(options: PaginateOptions): AsyncGenerator<Page, number, void> {
  const logger = options.logger ?? noopLogger;
  let url: string | null = options.url;
  let query: QueryParams | undefined = options.query;
  let index = 0;
  const visited = new Set<string>();

  while (url) {
    if (visited.has(url)) {
      throw new FatalRequestError(`Pagination loop: ${url} was already fetched`, {
        url,
        attempts: 0,
        failure: { reason: 'malformed', message: 'next link repeats an earlier page' },
      });
    }
    visited.add(url);
    const result: PageResult = await options.executor.execute(url, query);
    const page: Page = { index, url, records: result.records, next: result.next };

    logger.debug('pagination.page', {
      page: index + 1,
      records: page.records.length,
      hasNext: page.next !== null,
    });

    yield page;

    index += 1;
    query = undefined;
    url = result.next;
  }

  return index;
}

/**
 * Flattens {@link streamPages} into a lazy stream of records, preserving the
 * order of records within and across pages.
 *
 * @example
 * ```typescript
 * const stream = paginateRecords({ executor, url: `${base}/opinions/`, query: { date_filed_min: '2024-01-01' } });
 * for await (const record of stream) {
 *   if (++seen >= limit) break; // no further pages are requested
 * }
 * ```
 */
export async function* paginateRecords(
  options: PaginateOptions,
): AsyncGenerator<ApiRecord, PaginationSummary, void> {
  const pages = streamPages(options);
  let recordCount = 0;

  try {
    while (true) {
      const next = await pages.next();
      if (next.done) {
        return { pageCount: next.value, recordCount };
      }
      for (const record of next.value.records) {
        recordCount += 1;
        yield record;
      }
    }
  } finally {
    await pages.return(0);
  }
}

import path from 'node:path';
import { WatermarkTracker, noopLogger, trackWatermark } from '@courtsync/resilient-fetch';
import type { ApiRecord, Logger, PaginationSummary } from '@courtsync/resilient-fetch';
import type { Opinion, OpinionFilters } from '@courtsync/courtlistener-client';
import { PersistenceError, errorMessage } from './errors';
import { projectFields } from './records';
import { appendJsonLines, readSinceFile, recordUserFile, writeSinceFile } from './storage';
import { formatSummary } from './summary';

/** Anything that streams opinions; satisfied by `CourtListenerClient`. */
export interface OpinionSource {
  opinions(filters?: OpinionFilters): AsyncGenerator<Opinion, PaginationSummary, void>;
}

export interface OpinionSyncOptions {
  user: string;
  limit: number;
  dateMin?: string;
  fields?: string[];
  sinceFile?: string;
  dataDir: string;
}

export interface OpinionSyncDeps {
  logger?: Logger;
  /** Receives human-readable progress lines. */
  print?: (line: string) => void;
}

export interface OpinionSyncResult {
  records: ApiRecord[];
  outputFile: string;
  indexFile: string;
  /** Lower bound sent as `date_filed_min`, if any. */
  dateMin?: string;
  /** Largest `date_filed` (YYYY-MM-DD) among the fetched records. */
  watermark?: string;
  sinceFileUpdated: boolean;
  /** Set when the stream failed after some records had been collected. */
  fetchError?: unknown;
}

export const WATERMARK_FIELD = 'date_filed';
const WATERMARK_PREFIX_LENGTH = 10;

/**
 * Fetch up to `limit` opinions, persist them and advance the since-file.
 *
 * A stream failure with nothing collected is rethrown. After a partial
 * fetch the collected records are still saved and the failure is returned in
 * `fetchError`. The since-file only ever moves forward.
 */
export async function runOpinionSync(
  source: OpinionSource,
  options: OpinionSyncOptions,
  deps: OpinionSyncDeps = {},
): Promise<OpinionSyncResult> {
  const logger = deps.logger ?? noopLogger;
  const print = deps.print ?? (() => undefined);

  const stored = options.sinceFile ? await readSinceFile(options.sinceFile, logger) : undefined;
  let dateMin = options.dateMin;
  if (!dateMin && stored && options.sinceFile) {
    dateMin = stored;
    print(`Using since-file date_filed_min from ${options.sinceFile}: ${stored}`);
  }
  if (options.fields) {
    print(`Saving only fields: ${options.fields.join(', ')}`);
  }

  const filters: OpinionFilters = {};
  if (dateMin) {
    filters.date_filed_min = dateMin;
  }

  print(`Fetching up to ${options.limit} opinions ...`);
  logger.info('sync.started', { user: options.user, limit: options.limit, dateMin });

  const tracker = new WatermarkTracker({ field: WATERMARK_FIELD, prefixLength: WATERMARK_PREFIX_LENGTH });
  const records: ApiRecord[] = [];
  let fetchError: unknown;

  try {
    for await (const record of trackWatermark(source.opinions(filters), tracker)) {
      records.push(projectFields(record, options.fields));
      if (records.length >= options.limit) {
        break;
      }
    }
  } catch (error) {
    print(`Error while fetching: ${errorMessage(error)}`);
    if (records.length === 0) {
      throw error;
    }
    logger.error('sync.fetch.partial', { collected: records.length, error: errorMessage(error) });
    fetchError = error;
  }

  const outputFile = path.join(options.dataDir, `${options.user}_opinions.jsonl`);
  const indexFile = path.join(options.dataDir, 'users.json');
  await appendJsonLines(outputFile, records);
  await recordUserFile(indexFile, options.user, outputFile);
  logger.info('sync.persisted', { user: options.user, records: records.length, outputFile });

  print(`Saved ${records.length} records to ${outputFile}`);
  print(`User data index updated: ${indexFile}`);

  const watermark = tracker.current();
  let sinceFileUpdated = false;
  if (options.sinceFile && watermark && (stored === undefined || watermark > stored)) {
    try {
      await writeSinceFile(options.sinceFile, watermark);
      sinceFileUpdated = true;
      print(`Wrote newest date_filed '${watermark}' to since-file: ${options.sinceFile}`);
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      logger.error('sync.since_file.write_failed', { path: error.path, error: errorMessage(error.cause) });
      print(`Failed to write since-file ${options.sinceFile}: ${error.message}`);
    }
  }

  for (const line of formatSummary(records)) {
    print(line);
  }

  return { records, outputFile, indexFile, dateMin, watermark, sinceFileUpdated, fetchError };
}

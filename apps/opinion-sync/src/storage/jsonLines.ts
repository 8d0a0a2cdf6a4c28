import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { ApiRecord } from '@courtsync/resilient-fetch';
import { PersistenceError, errorMessage } from '../errors';

/**
 * Append one JSON document per line, creating parent directories first.
 * The file is created even when there is nothing to append.
 */
export async function appendJsonLines(filePath: string, records: readonly ApiRecord[]): Promise<void> {
  const payload = records.map((record) => `${JSON.stringify(record)}\n`).join('');
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await appendFile(filePath, payload, 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to write records to ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      operation: 'write-records',
      cause: error,
    });
  }
}

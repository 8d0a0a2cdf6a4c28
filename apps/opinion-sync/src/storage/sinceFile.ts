import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { noopLogger } from '@courtsync/resilient-fetch';
import type { Logger } from '@courtsync/resilient-fetch';
import { PersistenceError, errorMessage } from '../errors';

/**
 * Read the stored watermark. A missing, empty or unreadable file means there
 * is none.
 */
export async function readSinceFile(filePath: string, logger: Logger = noopLogger): Promise<string | undefined> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    logger.debug('sync.since_file.unreadable', { path: filePath, error: errorMessage(error) });
    return undefined;
  }
  const value = text.trim();
  return value || undefined;
}

export async function writeSinceFile(filePath: string, value: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, value.trim(), 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to write since-file ${filePath}: ${errorMessage(error)}`, {
      path: filePath,
      operation: 'write-since-file',
      cause: error,
    });
  }
}

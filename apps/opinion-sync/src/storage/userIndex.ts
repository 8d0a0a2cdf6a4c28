import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PersistenceError, errorMessage } from '../errors';

const userEntrySchema = z
  .object({
    username: z.string(),
    saved_files: z.array(z.string()),
  })
  .passthrough();

const userIndexSchema = z
  .object({
    users: z.array(userEntrySchema),
  })
  .passthrough();

export type UserIndex = z.infer<typeof userIndexSchema>;

export async function readUserIndex(indexPath: string): Promise<UserIndex> {
  let text: string;
  try {
    text = await readFile(indexPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return { users: [] };
    }
    throw new PersistenceError(`Failed to read user index ${indexPath}: ${errorMessage(error)}`, {
      path: indexPath,
      operation: 'read-index',
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError(`User index ${indexPath} is not valid JSON`, {
      path: indexPath,
      operation: 'read-index',
      cause: error,
    });
  }

  const result = userIndexSchema.safeParse(parsed);
  if (!result.success) {
    throw new PersistenceError(`User index ${indexPath} has an unexpected shape`, {
      path: indexPath,
      operation: 'read-index',
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Record that `filePath` holds data for `username`. Creates the index when
 * missing; a path already listed for the user is not added again.
 *
 * @returns true when the index changed
 */
export async function recordUserFile(indexPath: string, username: string, filePath: string): Promise<boolean> {
  const index = await readUserIndex(indexPath);

  let entry = index.users.find((user) => user.username === username);
  if (!entry) {
    entry = { username, saved_files: [] };
    index.users.push(entry);
  }
  const added = !entry.saved_files.includes(filePath);
  if (added) {
    entry.saved_files.push(filePath);
  }

  try {
    await mkdir(path.dirname(indexPath), { recursive: true });
    await writeFile(indexPath, JSON.stringify(index, null, 2), 'utf8');
  } catch (error) {
    throw new PersistenceError(`Failed to write user index ${indexPath}: ${errorMessage(error)}`, {
      path: indexPath,
      operation: 'write-index',
      cause: error,
    });
  }
  return added;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

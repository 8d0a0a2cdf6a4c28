export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export type PersistenceOperation = 'write-records' | 'read-index' | 'write-index' | 'write-since-file';

export class PersistenceError extends Error {
  readonly path: string;
  readonly operation: PersistenceOperation;

  constructor(message: string, options: { path: string; operation: PersistenceOperation; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'PersistenceError';
    this.path = options.path;
    this.operation = options.operation;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

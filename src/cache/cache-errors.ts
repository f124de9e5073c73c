export type CacheIOOperation = 'write' | 'clear';

export class CacheIOError extends Error {
  readonly operation: CacheIOOperation;
  readonly path: string;
  readonly code?: string;
  // Entries already deleted when a clear fails part-way
  readonly removed: number;
  readonly failedPaths: readonly string[];

  constructor(
    operation: CacheIOOperation,
    path: string,
    message: string,
    opts?: { code?: string; removed?: number; failedPaths?: readonly string[] }
  ) {
    super(message);
    this.name = 'CacheIOError';
    this.operation = operation;
    this.path = path;
    if (opts?.code !== undefined) {
      this.code = opts.code;
    }
    this.removed = opts?.removed ?? 0;
    this.failedPaths = opts?.failedPaths ?? [];
  }
}

export class CacheWriteRejectedError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`refusing to cache an error result for ${toolName}`);
    this.name = 'CacheWriteRejectedError';
    this.toolName = toolName;
  }
}

export const isCacheIOError = (value: unknown): value is CacheIOError =>
  value instanceof CacheIOError;

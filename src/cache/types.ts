import type { ToolResult } from '../tool-result.js';

export type CacheMissReason = 'disabled' | 'absent' | 'corrupt';

export type CacheLookup =
  | { status: 'hit'; value: ToolResult; ageMs: number }
  | { status: 'stale'; ageMs: number }
  | { status: 'miss'; reason: CacheMissReason };

export type ClearOutcome =
  | { status: 'cleared'; removed: number }
  | { status: 'disabled' };

// Canonicalized argument mapping; undefined members are dropped before hashing.
export type CacheArguments = Record<string, unknown>;

export interface CacheOptions {
  dir: string;
  ttlMs: number;
}

export const CACHE_ENTRY_EXTENSION = '.json';

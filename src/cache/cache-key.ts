import crypto from 'node:crypto';

import type { CacheArguments } from './types.js';

import { stableStringify } from './stable-stringify.js';
import { CACHE_ENTRY_EXTENSION } from './types.js';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const sha256Hex = (input: string): string =>
  crypto.createHash('sha256').update(input).digest('hex');

/**
 * Derive the cache key for one tool invocation: SHA-256 (lowercase hex) of
 * the tool name and the canonical JSON of its arguments.
 */
export const deriveCacheKey = (toolName: string, args: CacheArguments): string =>
  sha256Hex(`${toolName}\n${stableStringify(args)}`);

export const cacheEntryFileName = (toolName: string, key: string): string => {
  if (!TOOL_NAME_PATTERN.test(toolName)) {
    throw new Error(`invalid tool name for cache entry: '${toolName}'`);
  }
  if (!/^[0-9a-f]+$/.test(key)) {
    throw new Error(`invalid cache key: '${key}'`);
  }
  return `${toolName}_${key}${CACHE_ENTRY_EXTENSION}`;
};

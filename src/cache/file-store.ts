import { randomUUID } from 'node:crypto';
import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { ToolResult } from '../tool-result.js';
import type { CacheLookup, ClearOutcome } from './types.js';

import { parseToolResult } from '../tool-result.js';
import { errnoCode, toErrorMessage } from '../utils.js';

import { CacheIOError, CacheWriteRejectedError } from './cache-errors.js';
import { cacheEntryFileName } from './cache-key.js';
import { CACHE_ENTRY_EXTENSION } from './types.js';

// Entry files live flat in the cache directory:
//   {dir}/{toolName}_{sha256hex}.json
// Writes go through a dot-prefixed .tmp sibling that clear never matches.

export const cacheEntryPath = (dir: string, toolName: string, key: string): string =>
  path.join(dir, cacheEntryFileName(toolName, key));

/** True when `dir` exists, is a directory, and can be listed. */
export const isCacheDirUsable = async (dir: string): Promise<boolean> => {
  try {
    const stat = await fs.stat(dir);
    if (!stat.isDirectory()) return false;
    await fs.access(dir, fsConstants.R_OK | fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
};

const decodeEntry = (raw: string): ToolResult | undefined => {
  if (raw.trim().length === 0) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  const result = parseToolResult(parsed);
  if (result === undefined || result.isError === true) return undefined;
  return result;
};

/**
 * Look up one entry. Never throws: an unusable directory, a missing file and
 * unreadable or malformed content all come back as a `miss`.
 *
 * Age is measured from the file's modification time. A TTL of 0 makes every
 * entry stale, as does an entry dated in the future.
 */
export const readCacheEntry = async (
  dir: string,
  toolName: string,
  key: string,
  ttlMs: number,
  nowMs: number = Date.now()
): Promise<CacheLookup> => {
  if (!(await isCacheDirUsable(dir))) return { status: 'miss', reason: 'disabled' };

  let file: string;
  try {
    file = cacheEntryPath(dir, toolName, key);
  } catch {
    return { status: 'miss', reason: 'absent' };
  }

  let mtimeMs: number;
  try {
    const stat = await fs.stat(file);
    if (!stat.isFile()) return { status: 'miss', reason: 'absent' };
    mtimeMs = Math.floor(stat.mtimeMs);
  } catch {
    return { status: 'miss', reason: 'absent' };
  }

  const ageMs = nowMs - mtimeMs;
  if (ttlMs <= 0 || ageMs < 0 || ageMs >= ttlMs) return { status: 'stale', ageMs };

  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch {
    return { status: 'miss', reason: 'absent' };
  }
  const value = decodeEntry(raw);
  if (value === undefined) return { status: 'miss', reason: 'corrupt' };
  return { status: 'hit', value, ageMs };
};

/**
 * Persist a successful result. The payload is written to a temporary file and
 * renamed over the entry, so a concurrent reader sees either the previous
 * entry or the new one in full. Last writer wins.
 */
export const writeCacheEntry = async (
  dir: string,
  toolName: string,
  key: string,
  value: ToolResult
): Promise<void> => {
  if (value.isError === true) throw new CacheWriteRejectedError(toolName);
  const target = cacheEntryPath(dir, toolName, key);
  const temp = path.join(dir, `.${path.basename(target)}.${String(process.pid)}.${randomUUID()}.tmp`);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(temp, JSON.stringify(value), 'utf8');
    await fs.rename(temp, target);
  } catch (error) {
    let message = `failed to write cache entry ${target}: ${toErrorMessage(error)}`;
    try {
      await fs.rm(temp, { force: true });
    } catch (cleanupError) {
      message += ` (temporary file ${temp} left behind: ${toErrorMessage(cleanupError)})`;
    }
    throw new CacheIOError('write', target, message, { code: errnoCode(error) });
  }
};

type RemoveOutcome = { removed: boolean } | { file: string; failure: string; code?: string };

const removeEntry = async (file: string): Promise<RemoveOutcome> => {
  try {
    await fs.unlink(file);
    return { removed: true };
  } catch (error) {
    const code = errnoCode(error);
    // Already gone: a concurrent clear got there first.
    if (code === 'ENOENT') return { removed: false };
    return { file, failure: `${file}: ${toErrorMessage(error)}`, code };
  }
};

/**
 * Delete every `.json` entry in `dir`, leaving other files alone. A symlinked
 * entry loses the link, not its target. An unusable directory reports
 * `disabled` rather than an empty clear.
 */
export const clearCacheEntries = async (dir: string): Promise<ClearOutcome> => {
  if (!(await isCacheDirUsable(dir))) return { status: 'disabled' };

  let names: string[];
  try {
    const dirents = await fs.readdir(dir, { withFileTypes: true });
    names = dirents
      .filter((dirent) => (dirent.isFile() || dirent.isSymbolicLink()) && dirent.name.endsWith(CACHE_ENTRY_EXTENSION))
      .map((dirent) => dirent.name);
  } catch (error) {
    throw new CacheIOError('clear', dir, `failed to read cache directory ${dir}: ${toErrorMessage(error)}`, {
      code: errnoCode(error),
    });
  }

  const outcomes = await Promise.all(names.map(async (name) => await removeEntry(path.join(dir, name))));
  const removed = outcomes.filter((outcome) => 'removed' in outcome && outcome.removed).length;
  const failures = outcomes.flatMap((outcome) => ('failure' in outcome ? [outcome] : []));
  if (failures.length > 0) {
    throw new CacheIOError(
      'clear',
      dir,
      `failed to remove ${String(failures.length)} cache entries: ${failures.map((f) => f.failure).join('; ')}`,
      { code: failures[0].code, removed, failedPaths: failures.map((f) => f.file) }
    );
  }
  return { status: 'cleared', removed };
};

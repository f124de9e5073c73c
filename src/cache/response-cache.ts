import type { ToolResult } from '../tool-result.js';
import type { Logger } from '../types.js';
import type { CacheArguments, CacheLookup, CacheOptions, ClearOutcome } from './types.js';

import { logEntry } from '../logging/structured-logger.js';

import { deriveCacheKey } from './cache-key.js';
import { clearCacheEntries, isCacheDirUsable, readCacheEntry, writeCacheEntry } from './file-store.js';

export interface CacheLookupWithKey {
  key: string;
  lookup: CacheLookup;
}

/**
 * Binds a cache directory, TTL and logger. Keeps no entries in memory: every
 * call goes back to the directory, which may be mounted or removed while the
 * process runs.
 */
export class ResponseCache {
  private disabledReported = false;

  constructor(
    private readonly options: CacheOptions,
    private readonly logger: Logger
  ) {}

  get dir(): string { return this.options.dir; }

  get ttlMs(): number { return this.options.ttlMs; }

  buildKey(toolName: string, args: CacheArguments): string {
    return deriveCacheKey(toolName, args);
  }

  async lookup(toolName: string, args: CacheArguments, nowMs: number = Date.now()): Promise<CacheLookupWithKey> {
    const key = this.buildKey(toolName, args);
    const lookup = await readCacheEntry(this.options.dir, toolName, key, this.options.ttlMs, nowMs);
    this.report(toolName, key, lookup);
    return { key, lookup };
  }

  /**
   * Store a successful result. Skipped when the directory is not mounted;
   * write failures on a mounted directory propagate as CacheIOError.
   */
  async store(toolName: string, key: string, value: ToolResult): Promise<boolean> {
    if (!(await isCacheDirUsable(this.options.dir))) {
      this.reportDisabled();
      return false;
    }
    await writeCacheEntry(this.options.dir, toolName, key, value);
    this.logger.emit(logEntry('TRC', 'cache', 'cache entry stored', { tool: toolName, details: { key } }));
    return true;
  }

  async clear(): Promise<ClearOutcome> {
    const outcome = await clearCacheEntries(this.options.dir);
    if (outcome.status === 'disabled') {
      this.reportDisabled();
    } else {
      this.logger.emit(logEntry('VRB', 'cache', 'cache cleared', { details: { removed: outcome.removed } }));
    }
    return outcome;
  }

  private report(toolName: string, key: string, lookup: CacheLookup): void {
    switch (lookup.status) {
      case 'hit':
        this.logger.emit(logEntry('TRC', 'cache', 'cache hit', { tool: toolName, details: { key, age_ms: lookup.ageMs } }));
        return;
      case 'stale':
        this.logger.emit(logEntry('TRC', 'cache', 'cache entry stale', { tool: toolName, details: { key, age_ms: lookup.ageMs } }));
        return;
      case 'miss':
        if (lookup.reason === 'disabled') {
          this.reportDisabled();
          return;
        }
        if (lookup.reason === 'corrupt') {
          this.logger.emit(logEntry('WRN', 'cache', 'ignoring unreadable cache entry', { tool: toolName, details: { key } }));
          return;
        }
        this.logger.emit(logEntry('TRC', 'cache', 'cache miss', { tool: toolName, details: { key } }));
    }
  }

  private reportDisabled(): void {
    if (this.disabledReported) return;
    this.disabledReported = true;
    this.logger.emit(logEntry('VRB', 'cache', `cache directory ${this.options.dir} is not mounted; caching is disabled`));
  }
}

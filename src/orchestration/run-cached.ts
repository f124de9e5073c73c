import type { CacheArguments } from '../cache/types.js';
import type { ToolResult } from '../tool-result.js';
import type { ToolName } from '../types.js';
import type { OrchestratorDeps } from './types.js';

import { logEntry } from '../logging/structured-logger.js';

/**
 * Cache-first execution of one tool call.
 *
 *   lookup ── hit ──────────────────────────────► return cached
 *      └── miss/stale ─► fetch ── ok ─► store ─► return fresh
 *                          └── throws ─► propagate (nothing stored)
 *
 * There is no retry. A store failure on a mounted cache directory propagates.
 */
export const runCached = async (
  deps: Pick<OrchestratorDeps, 'cache' | 'logger'>,
  toolName: ToolName,
  args: CacheArguments,
  fetcher: () => Promise<ToolResult>
): Promise<ToolResult> => {
  const { key, lookup } = await deps.cache.lookup(toolName, args);
  if (lookup.status === 'hit') {
    deps.logger.emit(logEntry('VRB', 'orchestrator', 'served from cache', { tool: toolName, details: { age_ms: lookup.ageMs } }));
    return lookup.value;
  }

  const started = Date.now();
  const result = await fetcher();
  deps.logger.emit(logEntry('VRB', 'orchestrator', 'fetched from upstream', {
    tool: toolName,
    details: { cache: lookup.status === 'stale' ? 'stale' : lookup.reason, latency_ms: Date.now() - started },
  }));
  await deps.cache.store(toolName, key, result);
  return result;
};

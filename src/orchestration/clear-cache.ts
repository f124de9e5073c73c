import type { ToolResult } from '../tool-result.js';
import type { OrchestratorDeps } from './types.js';

import { textResult } from '../tool-result.js';

export const CLEAR_CACHE = 'clear_cache' as const;

export const CACHE_NOT_ENABLED_TEXT = 'Cache is not enabled (directory not mounted)';

// CacheIOError propagates; the headend renders it as an error result.
export const clearCache = async (deps: Pick<OrchestratorDeps, 'cache'>): Promise<ToolResult> => {
  const outcome = await deps.cache.clear();
  if (outcome.status === 'disabled') return textResult(CACHE_NOT_ENABLED_TEXT);
  return textResult(`Cache cleared successfully (${String(outcome.removed)} entries removed)`);
};

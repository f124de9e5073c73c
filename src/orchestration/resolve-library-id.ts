import type { ToolResult } from '../tool-result.js';
import type { OrchestratorDeps, ResolveLibraryIdArgs } from './types.js';

import { textResult } from '../tool-result.js';

import { runCached } from './run-cached.js';

export const RESOLVE_LIBRARY_ID = 'resolve_library_id' as const;

/**
 * Single fetch: one library search, returned as the raw body (text part) and
 * the parsed response (structured part).
 */
export const resolveLibraryId = async (deps: OrchestratorDeps, args: ResolveLibraryIdArgs): Promise<ToolResult> => (
  await runCached(
    deps,
    RESOLVE_LIBRARY_ID,
    { libraryName: args.libraryName, query: args.query },
    async () => {
      const { body, json } = await deps.api.searchLibraries({
        libraryName: args.libraryName,
        query: args.query,
        apiKey: args.apiKey,
      });
      return textResult(body, json);
    }
  )
);

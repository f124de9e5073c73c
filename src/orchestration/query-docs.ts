import type { ToolResult } from '../tool-result.js';
import type { FetchContextParams } from '../upstream/docs-api-client.js';
import type { OrchestratorDeps, QueryDocsArgs } from './types.js';

import { textResult } from '../tool-result.js';

import { runCached } from './run-cached.js';

export const QUERY_DOCS = 'query_docs' as const;

/**
 * Dual fetch: the text and JSON renderings of the same query are requested
 * concurrently and both must succeed. The first failure fails the call and
 * nothing is cached; the other request is left to finish and its outcome is
 * dropped.
 */
export const queryDocs = async (deps: OrchestratorDeps, args: QueryDocsArgs): Promise<ToolResult> => (
  await runCached(
    deps,
    QUERY_DOCS,
    { libraryId: args.libraryId, query: args.query },
    async () => {
      const params: FetchContextParams = { libraryId: args.libraryId, query: args.query, apiKey: args.apiKey };
      const [text, structured] = await Promise.all([
        deps.api.fetchContextText(params),
        deps.api.fetchContextJson(params),
      ]);
      return textResult(text, structured.json);
    }
  )
);

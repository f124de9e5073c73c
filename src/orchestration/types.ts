import { z } from 'zod';

import type { ResponseCache } from '../cache/response-cache.js';
import type { Logger } from '../types.js';
import type { DocsApi } from '../upstream/docs-api-client.js';

export interface OrchestratorDeps {
  cache: ResponseCache;
  api: DocsApi;
  logger: Logger;
}

const apiKeyField = z
  .string()
  .min(1)
  .optional()
  .describe('API key for this call only. Overrides the configured key; never part of the cache key.');

export const ResolveLibraryIdArgsShape = {
  libraryName: z
    .string()
    .min(1, 'libraryName is required')
    .describe('Library name to search for and retrieve a library ID.'),
  query: z
    .string()
    .describe(
      'The question or task you need help with. Used to rank library results by relevance. '
      + 'Do not include secrets, credentials, personal data or proprietary code.'
    ),
  apiKey: apiKeyField,
};
export const ResolveLibraryIdArgsSchema = z.object(ResolveLibraryIdArgsShape);
export type ResolveLibraryIdArgs = z.infer<typeof ResolveLibraryIdArgsSchema>;

export const QueryDocsArgsShape = {
  libraryId: z
    .string()
    .min(1, 'libraryId is required')
    .describe(
      "Exact library ID (e.g. '/mongodb/docs', '/vercel/next.js', '/vercel/next.js/v14.3.0-canary.87') "
      + "returned by 'resolve_library_id' or given by the user as '/org/project' or '/org/project/version'."
    ),
  query: z
    .string()
    .describe(
      "The question or task you need help with. Be specific: 'React useEffect cleanup function examples' "
      + "rather than 'hooks'. Do not include secrets, credentials, personal data or proprietary code."
    ),
  apiKey: apiKeyField,
};
export const QueryDocsArgsSchema = z.object(QueryDocsArgsShape);
export type QueryDocsArgs = z.infer<typeof QueryDocsArgsSchema>;

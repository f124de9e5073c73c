export { clearCache, CLEAR_CACHE, CACHE_NOT_ENABLED_TEXT } from './clear-cache.js';
export { queryDocs, QUERY_DOCS } from './query-docs.js';
export { resolveLibraryId, RESOLVE_LIBRARY_ID } from './resolve-library-id.js';
export { runCached } from './run-cached.js';
export type { OrchestratorDeps, QueryDocsArgs, ResolveLibraryIdArgs } from './types.js';
export { QueryDocsArgsSchema, QueryDocsArgsShape, ResolveLibraryIdArgsSchema, ResolveLibraryIdArgsShape } from './types.js';

export { deriveCacheKey, cacheEntryFileName, sha256Hex } from './cache/cache-key.js';
export { CacheIOError, CacheWriteRejectedError, isCacheIOError } from './cache/cache-errors.js';
export { cacheEntryPath, clearCacheEntries, isCacheDirUsable, readCacheEntry, writeCacheEntry } from './cache/file-store.js';
export { ResponseCache } from './cache/response-cache.js';
export { DEFAULT_CACHE_TTL_MS, parseCacheTtlMs, parseDurationMs } from './cache/ttl.js';
export type { CacheArguments, CacheLookup, CacheMissReason, ClearOutcome } from './cache/types.js';
export { ConfigError, loadConfig } from './config.js';
export type { ConfigOverrides } from './config.js';
export { createMcpServer, createToolHandlers, McpHeadend } from './headends/mcp-headend.js';
export { createStructuredLogger, logEntry, StructuredLogger } from './logging/structured-logger.js';
export * from './orchestration/index.js';
export { createRuntime } from './runtime.js';
export { errorResult, parseToolResult, textResult, ToolResultSchema } from './tool-result.js';
export type { TextPart, ToolResult } from './tool-result.js';
export type { Configuration, LogEntry, Logger, ToolName } from './types.js';
export { DocsApiClient, DEFAULT_DOCS_API_BASE_URL } from './upstream/docs-api-client.js';
export type { DocsApi, FetchFn } from './upstream/docs-api-client.js';
export { UpstreamError, isUpstreamError } from './upstream/upstream-errors.js';
export type { UpstreamChannel, UpstreamErrorKind } from './upstream/upstream-errors.js';

import type { OrchestratorDeps } from './orchestration/index.js';
import type { Configuration, Logger } from './types.js';
import type { FetchFn } from './upstream/docs-api-client.js';

import { ResponseCache } from './cache/response-cache.js';
import { createStructuredLogger, logEntry } from './logging/structured-logger.js';
import { DocsApiClient } from './upstream/docs-api-client.js';

export interface RuntimeOverrides {
  logger?: Logger;
  fetch?: FetchFn;
}

/** Wire the logger, cache and upstream client for one configuration. */
export function createRuntime(config: Configuration, overrides: RuntimeOverrides = {}): OrchestratorDeps {
  const logger = overrides.logger ?? createStructuredLogger({
    format: config.logging.format,
    trace: config.logging.trace,
  });
  if (config.apiKey === undefined) {
    logger.emit(logEntry('VRB', 'upstream', 'no API key configured, using anonymous access'));
  }
  const cache = new ResponseCache({ dir: config.cache.dir, ttlMs: config.cache.ttlMs }, logger);
  const api = new DocsApiClient({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    timeoutMs: config.fetchTimeoutMs,
    fetch: overrides.fetch,
    logger,
  });
  return { cache, api, logger };
}

import type { Logger } from '../types.js';
import type { UpstreamChannel } from './upstream-errors.js';

import { logEntry } from '../logging/structured-logger.js';
import { isPlainObject, toErrorMessage } from '../utils.js';
import { VERSION } from '../version.js';

import { LibrarySearchResponseSchema, type DocsContentType } from './schemas.js';
import { CHANNEL_LABELS, UpstreamError } from './upstream-errors.js';

export const DEFAULT_DOCS_API_BASE_URL = 'https://context7.com/api';

export type FetchFn = typeof fetch;

export interface DocsApiClientOptions {
  baseUrl?: string;
  apiKey?: string;
  // Per-request deadline; undefined or 0 waits as long as the transport does
  timeoutMs?: number;
  fetch?: FetchFn;
  logger: Logger;
}

export interface SearchLibrariesParams {
  libraryName: string;
  query: string;
  apiKey?: string;
}

export interface FetchContextParams {
  libraryId: string;
  query: string;
  apiKey?: string;
}

export interface JsonBody {
  body: string;
  json: Record<string, unknown>;
}

/** The upstream calls the orchestrator depends on. */
export interface DocsApi {
  searchLibraries: (params: SearchLibrariesParams) => Promise<JsonBody>;
  fetchContextText: (params: FetchContextParams) => Promise<string>;
  fetchContextJson: (params: FetchContextParams) => Promise<JsonBody>;
}

interface RawResponse {
  status: number;
  ok: boolean;
  body: string;
}

export class DocsApiClient implements DocsApi {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly timeoutMs?: number;
  private readonly fetchImpl: FetchFn;
  private readonly logger: Logger;

  constructor(options: DocsApiClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_DOCS_API_BASE_URL).replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? (async (input, init) => await fetch(input, init));
    this.logger = options.logger;
  }

  /** `GET /v2/libs/search` — candidate libraries for a name, ranked against the query. */
  async searchLibraries(params: SearchLibrariesParams): Promise<JsonBody> {
    const url = this.buildUrl('/v2/libs/search', { libraryName: params.libraryName, query: params.query });
    const body = await this.get('search', url, params.apiKey);
    const json = parseJsonObject('search', body);
    const validated = LibrarySearchResponseSchema.safeParse(json);
    if (!validated.success) {
      const issues = validated.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new UpstreamError('invalid_response', 'search', `Unexpected library search response: ${issues}`);
    }
    return { body, json };
  }

  /** `GET /v2/context?type=txt` — documentation rendered as plain text. */
  async fetchContextText(params: FetchContextParams): Promise<string> {
    return await this.get('txt', this.contextUrl(params, 'txt'), params.apiKey);
  }

  /** `GET /v2/context?type=json` — the same documentation as snippets. */
  async fetchContextJson(params: FetchContextParams): Promise<JsonBody> {
    const body = await this.get('json', this.contextUrl(params, 'json'), params.apiKey);
    return { body, json: parseJsonObject('json', body) };
  }

  private contextUrl(params: FetchContextParams, type: DocsContentType): URL {
    return this.buildUrl('/v2/context', { libraryId: params.libraryId, query: params.query, type });
  }

  private buildUrl(pathname: string, query: Record<string, string>): URL {
    const url = new URL(`${this.baseUrl}${pathname}`);
    Object.entries(query).forEach(([key, value]) => {
      url.searchParams.append(key, value);
    });
    return url;
  }

  private buildHeaders(apiKeyOverride?: string): Headers {
    const headers = new Headers();
    headers.set('X-Context7-Source', 'docs-bridge');
    headers.set('X-Context7-Server-Version', VERSION);
    const apiKey = apiKeyOverride ?? this.apiKey;
    if (apiKey !== undefined && apiKey.length > 0) {
      headers.set('Authorization', `Bearer ${apiKey}`);
    }
    return headers;
  }

  private async get(channel: UpstreamChannel, url: URL, apiKeyOverride?: string): Promise<string> {
    const started = Date.now();
    const response = await this.send(channel, url, this.buildHeaders(apiKeyOverride));
    this.logger.emit(logEntry('TRC', 'upstream', `GET ${url.pathname}`, {
      details: { channel, status: response.status, latency_ms: Date.now() - started },
    }));
    if (!response.ok) {
      throw new UpstreamError(
        'http_status',
        channel,
        `${CHANNEL_LABELS[channel]} request failed with status ${String(response.status)}: ${response.body}`,
        { status: response.status }
      );
    }
    return response.body;
  }

  private async send(channel: UpstreamChannel, url: URL, headers: Headers): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutMs = this.timeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    if (typeof timeoutMs === 'number' && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => { controller.abort(); }, Math.trunc(timeoutMs));
    }
    try {
      const res = await this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal });
      const body = await res.text();
      return { status: res.status, ok: res.ok, body };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new UpstreamError(
          'timeout',
          channel,
          `${CHANNEL_LABELS[channel]} request timed out after ${String(timeoutMs)}ms`
        );
      }
      throw new UpstreamError('network', channel, `${CHANNEL_LABELS[channel]} request failed: ${toErrorMessage(error)}`);
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }
}

const parseJsonObject = (channel: UpstreamChannel, body: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new UpstreamError(
      'invalid_response',
      channel,
      `Failed to deserialize ${CHANNEL_LABELS[channel]} response: ${toErrorMessage(error)}`
    );
  }
  if (!isPlainObject(parsed)) {
    throw new UpstreamError('invalid_response', channel, `${CHANNEL_LABELS[channel]} response is not a JSON object`);
  }
  return parsed;
};

import { randomUUID } from 'node:crypto';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { OrchestratorDeps, QueryDocsArgs, ResolveLibraryIdArgs } from '../orchestration/index.js';
import type { ToolResult } from '../tool-result.js';
import type { Logger, ToolName } from '../types.js';
import type { Headend, HeadendClosedEvent, HeadendContext } from './types.js';

import { logEntry } from '../logging/structured-logger.js';
import {
  CLEAR_CACHE,
  QUERY_DOCS,
  QueryDocsArgsShape,
  RESOLVE_LIBRARY_ID,
  ResolveLibraryIdArgsShape,
  clearCache,
  queryDocs,
  resolveLibraryId,
} from '../orchestration/index.js';
import { errorResult } from '../tool-result.js';
import { LibrarySearchResponseSchema } from '../upstream/schemas.js';
import { toErrorMessage } from '../utils.js';
import { VERSION } from '../version.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

export const SERVER_NAME = 'docs-bridge';

const QUERY_DOCS_DESCRIPTION = `Retrieves up-to-date documentation and code examples for any programming library or framework.

Call 'resolve_library_id' first to obtain the exact library ID, unless the user gives one in the format '/org/project' or '/org/project/version'.

Do not call this tool more than 3 times per question. If you cannot find what you need after 3 calls, use the best information you have.`;

const RESOLVE_LIBRARY_ID_DESCRIPTION = `Resolves a package or product name to a library ID and returns the matching libraries.

Call this before 'query_docs' to obtain a valid library ID, unless the user gives one in the format '/org/project' or '/org/project/version'.

Pick the most relevant match by name similarity, description relevance to the question, documentation coverage (code snippet count), source reputation and benchmark score (100 is highest). State the selected ID and why it was chosen; if several fit, say so and continue with the best one; if none fit, say so and suggest a refined query.

Do not call this tool more than 3 times per question.`;

const CLEAR_CACHE_DESCRIPTION = 'Clears the local documentation cache. Use this when cached results appear stale or outdated.';

export interface ToolHandlers {
  [RESOLVE_LIBRARY_ID]: (args: ResolveLibraryIdArgs) => Promise<ToolResult>;
  [QUERY_DOCS]: (args: QueryDocsArgs) => Promise<ToolResult>;
  [CLEAR_CACHE]: () => Promise<ToolResult>;
}

/**
 * Wrap each operation so that a thrown error becomes an error-flagged result
 * carrying the error message unchanged.
 */
export const createToolHandlers = (deps: OrchestratorDeps): ToolHandlers => {
  const guard = <A extends unknown[]>(tool: ToolName, run: (...args: A) => Promise<ToolResult>) => (
    async (...args: A): Promise<ToolResult> => {
      const requestId = randomUUID();
      deps.logger.emit(logEntry('TRC', 'server', 'request', { tool, details: { request_id: requestId } }));
      try {
        const result = await run(...args);
        deps.logger.emit(logEntry('TRC', 'server', 'response status=ok', { tool, details: { request_id: requestId } }));
        return result;
      } catch (error) {
        const message = toErrorMessage(error);
        deps.logger.emit(logEntry('WRN', 'server', `response status=error message:${message}`, {
          tool,
          details: { request_id: requestId },
        }));
        return errorResult(message);
      }
    }
  );

  return {
    [RESOLVE_LIBRARY_ID]: guard(RESOLVE_LIBRARY_ID, async (args: ResolveLibraryIdArgs) => await resolveLibraryId(deps, args)),
    [QUERY_DOCS]: guard(QUERY_DOCS, async (args: QueryDocsArgs) => await queryDocs(deps, args)),
    [CLEAR_CACHE]: guard(CLEAR_CACHE, async () => await clearCache(deps)),
  };
};

export const registerTools = (server: McpServer, handlers: ToolHandlers): void => {
  server.registerTool(
    QUERY_DOCS,
    {
      title: 'Query Documentation',
      description: QUERY_DOCS_DESCRIPTION,
      inputSchema: QueryDocsArgsShape,
      annotations: { readOnlyHint: true },
    },
    async (args) => await handlers[QUERY_DOCS](args)
  );
  server.registerTool(
    RESOLVE_LIBRARY_ID,
    {
      title: 'Resolve Library ID',
      description: RESOLVE_LIBRARY_ID_DESCRIPTION,
      inputSchema: ResolveLibraryIdArgsShape,
      outputSchema: LibrarySearchResponseSchema.shape,
      annotations: { readOnlyHint: true },
    },
    async (args) => await handlers[RESOLVE_LIBRARY_ID](args)
  );
  server.registerTool(
    CLEAR_CACHE,
    {
      title: 'Clear Cache',
      description: CLEAR_CACHE_DESCRIPTION,
      annotations: { readOnlyHint: false, destructiveHint: true },
    },
    async () => await handlers[CLEAR_CACHE]()
  );
};

export const createMcpServer = (deps: OrchestratorDeps): McpServer => {
  const server = new McpServer({ name: SERVER_NAME, version: VERSION });
  registerTools(server, createToolHandlers(deps));
  return server;
};

export class McpHeadend implements Headend {
  public readonly kind = 'mcp' as const;
  public readonly id = 'mcp:stdio';
  public readonly closed: Promise<HeadendClosedEvent>;

  private readonly deps: OrchestratorDeps;
  private readonly closeDeferred = createDeferred<HeadendClosedEvent>();
  private server?: McpServer;
  private transport?: StdioServerTransport;
  private logger?: Logger;
  private stopping = false;
  private closedSignaled = false;

  public constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.closed = this.closeDeferred.promise;
  }

  public async start(context: HeadendContext): Promise<void> {
    if (this.server !== undefined) return;
    this.logger = context.logger;
    const server = createMcpServer(this.deps);
    const transport = new StdioServerTransport();
    this.server = server;
    this.transport = transport;
    transport.onclose = () => { this.signalClosed({ reason: 'stopped', graceful: true }); };
    transport.onerror = (err) => { this.log('ERR', `transport error: ${err.message}`); };
    server.server.onclose = () => { this.signalClosed({ reason: 'stopped', graceful: true }); };
    server.server.onerror = (err) => { this.log('ERR', `server error: ${err.message}`); };
    context.shutdownSignal.addEventListener('abort', () => { void this.stop(); }, { once: true });
    await server.connect(transport);
    this.log('VRB', 'started');
  }

  public async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    if (this.server !== undefined) {
      try {
        await this.server.close();
      } catch (err) {
        this.log('WRN', `failed to close server: ${toErrorMessage(err)}`);
      }
    }
    if (this.transport !== undefined) {
      try {
        await this.transport.close();
      } catch (err) {
        this.log('WRN', `failed to close transport: ${toErrorMessage(err)}`);
      }
    }
    this.signalClosed({ reason: 'stopped', graceful: true });
  }

  private signalClosed(event: HeadendClosedEvent): void {
    if (this.closedSignaled) return;
    this.closedSignaled = true;
    this.closeDeferred.resolve(event);
  }

  private log(severity: 'ERR' | 'WRN' | 'VRB', message: string): void {
    this.logger?.emit(logEntry(severity, 'server', message, { details: { headend: this.id } }));
  }
}

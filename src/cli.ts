#!/usr/bin/env node
import { Command, Option } from 'commander';

import type { Configuration } from './types.js';

import { ConfigError, loadConfig, LogFormatSchema } from './config.js';
import { McpHeadend } from './headends/mcp-headend.js';
import { logEntry } from './logging/structured-logger.js';
import { clearCache } from './orchestration/index.js';
import { createRuntime } from './runtime.js';
import { ShutdownController } from './shutdown-controller.js';
import { toErrorMessage } from './utils.js';
import { VERSION } from './version.js';
import './setup-undici.js';

interface GlobalOptions {
  cacheDir?: string;
  cacheTtl?: string;
  baseUrl?: string;
  logFormat?: string;
  trace?: boolean;
}

// Centralized exit path to guarantee a single, reasoned exit
let hasExited = false;
function exitWith(code: number, reason: string): never {
  try {
    process.stderr.write(`docs-bridge: ${reason}\n`);
  } catch {
    // stderr closed; the exit code still reports the failure
  }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const program = new Command();

program
  .name('docs-bridge')
  .description('MCP tool server for library documentation search, with an on-disk response cache')
  .version(VERSION)
  .option('--cache-dir <path>', 'cache directory; caching is disabled when it does not exist (env CACHE_DIR, default /cache)')
  .option('--cache-ttl <ttl>', "entry lifetime: days, a duration like 12h, or 'off' to always refetch (env CACHE_TTL, default 1)")
  .option('--base-url <url>', 'documentation API base URL (env DOCS_API_BASE_URL)')
  .addOption(new Option('--log-format <format>', 'log format on stderr (env LOG_FORMAT)').choices(LogFormatSchema.options))
  .option('--trace', 'emit trace-level logs (env LOG_LEVEL=trace)');

const resolveConfig = (): Configuration => {
  const opts = program.opts<GlobalOptions>();
  try {
    return loadConfig(process.env, {
      cacheDir: opts.cacheDir,
      cacheTtl: opts.cacheTtl,
      baseUrl: opts.baseUrl,
      logFormat: opts.logFormat,
      trace: opts.trace,
    });
  } catch (error) {
    if (error instanceof ConfigError) exitWith(2, error.message);
    throw error;
  }
};

program
  .command('serve', { isDefault: true })
  .description('serve resolve_library_id, query_docs and clear_cache over MCP stdio')
  .action(async () => {
    const deps = createRuntime(resolveConfig());
    const shutdownController = new ShutdownController();
    const headend = new McpHeadend(deps);
    shutdownController.register(headend.id, async () => { await headend.stop(); });

    const handleSignal = async (sig: NodeJS.Signals): Promise<void> => {
      deps.logger.emit(logEntry('VRB', 'cli', `received ${sig}, shutting down`));
      await shutdownController.shutdown({ logger: deps.logger });
    };
    const registeredSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    registeredSignals.forEach((sig) => {
      process.once(sig, () => { void handleSignal(sig); });
    });

    await headend.start({ logger: deps.logger, shutdownSignal: shutdownController.signal });
    await headend.closed;
    await shutdownController.shutdown({ logger: deps.logger });
  });

program
  .command('clear-cache')
  .description('remove every cached response and report how many were removed')
  .action(async () => {
    const deps = createRuntime(resolveConfig());
    try {
      const result = await clearCache(deps);
      process.stdout.write(`${result.content.map((part) => part.text).join('\n')}\n`);
    } catch (error) {
      exitWith(1, toErrorMessage(error));
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  exitWith(1, toErrorMessage(error));
});

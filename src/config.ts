import { z } from 'zod';

import type { Configuration } from './types.js';

import { parseCacheTtlMs, parseDurationMs } from './cache/ttl.js';
import { DEFAULT_DOCS_API_BASE_URL } from './upstream/docs-api-client.js';

export const DEFAULT_CACHE_DIR = '/cache';
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().optional()
);

export const LogFormatSchema = z.enum(['logfmt', 'json', 'none']);

const EnvSchema = z.object({
  DOCS_API_KEY: optionalString,
  CONTEXT7_API_KEY: optionalString,
  DOCS_API_BASE_URL: optionalString.pipe(z.string().url().optional()),
  CACHE_DIR: optionalString,
  CACHE_TTL: optionalString,
  FETCH_TIMEOUT: optionalString,
  LOG_FORMAT: optionalString.pipe(LogFormatSchema.optional()),
  LOG_LEVEL: optionalString.pipe(z.enum(['verbose', 'trace']).optional()),
});

/** Values given on the command line; each wins over its environment variable. */
export interface ConfigOverrides {
  cacheDir?: string;
  cacheTtl?: string;
  baseUrl?: string;
  logFormat?: string;
  trace?: boolean;
}

export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): Configuration {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const vars = parsed.data;
  const issues: string[] = [];

  const ttlMs = parseCacheTtlMs(overrides.cacheTtl ?? vars.CACHE_TTL);
  if (ttlMs === undefined) {
    issues.push("CACHE_TTL: must be 'off', a number of days, or a duration like 30m/12h/2d");
  }

  const fetchTimeoutMs = vars.FETCH_TIMEOUT === undefined
    ? DEFAULT_FETCH_TIMEOUT_MS
    : parseDurationMs(vars.FETCH_TIMEOUT, { allowOff: true });
  if (fetchTimeoutMs === undefined) {
    issues.push("FETCH_TIMEOUT: must be 'off', a millisecond number, or a duration like 10s/2m");
  }

  const baseUrl = overrides.baseUrl ?? vars.DOCS_API_BASE_URL ?? DEFAULT_DOCS_API_BASE_URL;
  if (!z.string().url().safeParse(baseUrl).success) {
    issues.push(`base URL: '${baseUrl}' is not a valid URL`);
  }

  const format = LogFormatSchema.safeParse(overrides.logFormat ?? vars.LOG_FORMAT ?? 'logfmt');
  if (!format.success) {
    issues.push(`log format: expected one of ${LogFormatSchema.options.join(', ')}`);
  }

  if (issues.length > 0 || ttlMs === undefined || fetchTimeoutMs === undefined || !format.success) {
    throw new ConfigError(issues);
  }

  return {
    apiKey: vars.DOCS_API_KEY ?? vars.CONTEXT7_API_KEY,
    baseUrl,
    cache: {
      dir: overrides.cacheDir ?? vars.CACHE_DIR ?? DEFAULT_CACHE_DIR,
      ttlMs,
    },
    fetchTimeoutMs: fetchTimeoutMs > 0 ? fetchTimeoutMs : undefined,
    logging: {
      format: format.data,
      trace: overrides.trace === true || vars.LOG_LEVEL === 'trace',
    },
  };
}

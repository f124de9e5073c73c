export type ToolName = 'resolve_library_id' | 'query_docs' | 'clear_cache';

export type LogSeverity = 'ERR' | 'WRN' | 'VRB' | 'TRC';

export type LogComponent = 'cache' | 'orchestrator' | 'upstream' | 'server' | 'cli';

export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: LogSeverity;
  component: LogComponent;
  message: string;                      // Human readable message
  tool?: string;                        // Tool the entry belongs to, when there is one
  // Free-form labels rendered as extra logfmt pairs / json fields
  details?: Record<string, string | number | boolean>;
  stack?: string;
}

export interface Logger {
  emit: (entry: LogEntry) => void;
}

export type LogFormat = 'logfmt' | 'json' | 'none';

export interface Configuration {
  apiKey?: string;
  baseUrl: string;
  cache: {
    dir: string;
    ttlMs: number;
  };
  // undefined means no per-fetch deadline
  fetchTimeoutMs?: number;
  logging: {
    format: LogFormat;
    trace: boolean;
  };
}

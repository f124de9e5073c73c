import type { LogEntry, LogFormat, Logger } from '../types.js';

import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  // TRC entries are dropped unless set
  trace?: boolean;
  logfmtWriter?: (line: string) => void;
  jsonWriter?: (line: string) => void;
}

// stdout carries the MCP stdio transport, so every sink defaults to stderr.
export class StructuredLogger implements Logger {
  private readonly labels: Record<string, string>;
  private readonly trace: boolean;
  private readonly sinks: ((event: StructuredLogEvent) => void)[] = [];

  constructor(options: StructuredLoggerOptions = {}) {
    this.labels = options.labels ?? {};
    this.trace = options.trace ?? false;
    const format = options.format ?? 'logfmt';
    if (format === 'logfmt') {
      const writer = options.logfmtWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${formatLogfmt(event)}\n`);
      });
    }
    if (format === 'json') {
      const writer = options.jsonWriter ?? defaultWriter;
      this.sinks.push((event) => {
        writer(`${JSON.stringify(buildJsonPayload(event))}\n`);
      });
    }
  }

  emit(entry: LogEntry): void {
    if (entry.severity === 'TRC' && !this.trace) return;
    if (this.sinks.length === 0) return;
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.sinks.forEach((sink) => {
      sink(event);
    });
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

/** Build a log entry stamped with the current time. */
export function logEntry(
  severity: LogEntry['severity'],
  component: LogEntry['component'],
  message: string,
  extra: Pick<LogEntry, 'tool' | 'details' | 'stack'> = {}
): LogEntry {
  return { timestamp: Date.now(), severity, component, message, ...extra };
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed; nowhere left to report
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('component', event.component);
  push('tool', event.tool);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}

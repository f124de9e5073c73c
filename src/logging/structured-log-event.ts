import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  component: LogEntry['component'];
  tool?: string;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'ts',
  'level',
  'priority',
  'component',
  'tool',
  'message',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

const stringifyDetail = (value: string | number | boolean): string | undefined => {
  if (typeof value === 'string') return value.length > 0 ? value : undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : undefined;
  return value ? 'true' : 'false';
};

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0 && !RESERVED_LABEL_KEYS.has(key)) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (RESERVED_LABEL_KEYS.has(key)) return;
      const rendered = stringifyDetail(value);
      if (rendered !== undefined) labels[key] = rendered;
    });
  }

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    component: entry.component,
    tool: entry.tool,
    labels,
    stack: entry.stack,
  };
}

import type { Logger } from '../types.js';

export type HeadendKind = 'mcp';

export interface HeadendClosedEvent {
  reason: 'stopped';
  graceful: boolean;
}

export interface HeadendContext {
  logger: Logger;
  shutdownSignal: AbortSignal;
}

export interface Headend {
  readonly id: string;
  readonly kind: HeadendKind;
  readonly closed: Promise<HeadendClosedEvent>;
  start: (context: HeadendContext) => Promise<void>;
  stop: () => Promise<void>;
}

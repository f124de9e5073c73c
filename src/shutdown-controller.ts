import type { Logger } from './types.js';

import { logEntry } from './logging/structured-logger.js';
import { toErrorMessage } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { logger?: Logger } = {}): Promise<void> {
    if (this.shutdownPromise !== undefined) {
      await this.shutdownPromise;
      return;
    }
    this.shutdownPromise = this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { logger?: Logger }): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.abortController.abort();
    // Tasks run in reverse registration order, one at a time.
    const entries = Array.from(this.tasks.entries()).reverse();
    for (const [name, task] of entries) {
      try {
        await task();
      } catch (error) {
        opts.logger?.emit(logEntry('WRN', 'cli', `shutdown task '${name}' failed: ${toErrorMessage(error)}`));
      }
    }
  }
}

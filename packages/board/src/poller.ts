import { toError } from '@tasksync/client';
import type { Logger } from 'pino';

export interface PollerOptions {
  intervalMs: number;
  logger: Logger;
  /** Called when a tick rejects; the next tick still runs on schedule */
  onError?: (error: Error) => void;
}

/**
 * Fixed-interval polling with explicit start/stop. A tick is skipped while
 * the previous one is still running.
 */
export class Poller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(
    private readonly tick: () => Promise<unknown>,
    private readonly options: PollerOptions
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.run();
    }, this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async run(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;
    try {
      await this.tick();
    } catch (err) {
      const error = toError(err);
      this.options.logger.warn({ err: error }, 'Poll tick failed');
      this.options.onError?.(error);
    } finally {
      this.ticking = false;
    }
  }
}

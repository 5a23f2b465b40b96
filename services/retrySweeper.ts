import { errorMessage } from '../errors.js';
import type { Logger } from '../lib/logger.js';
import type { ConversationEngine } from './conversationEngine.js';
import type { SessionStore } from './sessionStore.js';

export interface SweeperOptions {
  engine: ConversationEngine;
  store: SessionStore;
  logger: Logger;
  intervalMs: number;
  sessionTtlMs: number;
}

export interface SweepResult {
  /** COMPLETE sessions whose retried report went through. */
  reported: number;
  /** Idle ACTIVE sessions closed and sent for reporting. */
  closed: number;
  /** Idle ACTIVE sessions dropped because they held nothing. */
  evicted: number;
}

/**
 * Periodic housekeeping: retries reports that failed, closes and reports
 * ACTIVE sessions gone quiet for longer than the TTL, and drops quiet ones
 * that never yielded anything.
 */
export class ReportRetrySweeper {
  private timer: ReturnType<typeof setInterval> | undefined;
  private running: Promise<void> | undefined;

  constructor(private readonly options: SweeperOptions) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick();
    }, this.options.intervalMs);
    this.timer.unref();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.running;
  }

  async sweep(): Promise<SweepResult> {
    const { engine, store, logger, sessionTtlMs } = this.options;
    const reported = await engine.retryPendingReports();
    const closed = await engine.closeIdleSessions(sessionTtlMs);
    const evicted = store.evictIdle(sessionTtlMs);
    if (reported > 0 || closed > 0 || evicted > 0) {
      logger.info('sweep finished', { reported, closed, evicted, remaining: store.size });
    }
    return { reported, closed, evicted };
  }

  private tick(): void {
    // At most one sweep runs at a time; a tick that lands mid-sweep is skipped.
    if (this.running) return;
    this.running = this.sweep()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.options.logger.error('sweep failed', { reason: errorMessage(err) });
      })
      .finally(() => {
        this.running = undefined;
      });
  }
}

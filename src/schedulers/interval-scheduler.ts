import { describeError } from "../errors";
import type { Logger } from "../logger";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface IntervalSchedulerOptions {
  intervalMs: number;
  /** Receives a signal that aborts when the scheduler is stopped. */
  tick: (signal: AbortSignal) => Promise<void>;
  logger: Logger;
  onError?: (error: unknown) => void;
  sleep?: Sleep;
  now?: () => Date;
}

export interface SchedulerStatus {
  isRunning: boolean;
  intervalMs: number;
  tickCount: number;
  lastTickAt: Date | null;
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Fixed-interval loop: run the tick, then wait `intervalMs` whatever the tick
 * did. Ticks never overlap and a failing tick never ends the loop.
 */
class IntervalScheduler {
  private isRunning = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private tickCount = 0;
  private lastTickAt: Date | null = null;

  constructor(private readonly options: IntervalSchedulerOptions) {}

  /**
   * Runs until `stop()` is called. The returned promise settles once the
   * loop has exited. A loop that is still finishing its last tick after
   * `stop()` is awaited before a new one begins.
   */
  async start(): Promise<void> {
    const { logger } = this.options;
    if (this.isRunning) {
      logger.warning("Scheduler is already running");
      return;
    }

    if (this.loop) {
      logger.info("Waiting for the previous run to finish");
      await this.loop;
      if (this.isRunning) {
        logger.warning("Scheduler is already running");
        return;
      }
    }

    const loop = this.run();
    this.loop = loop;
    try {
      await loop;
    } finally {
      if (this.loop === loop) {
        this.loop = null;
      }
    }
  }

  private async run(): Promise<void> {
    const { logger, intervalMs } = this.options;
    const controller = new AbortController();
    const wait = this.options.sleep ?? sleep;
    const now = this.options.now ?? (() => new Date());

    this.controller = controller;
    this.isRunning = true;
    logger.info(`Scheduler started, interval ${intervalMs / 1000}s`);

    while (!controller.signal.aborted) {
      try {
        await this.options.tick(controller.signal);
      } catch (error) {
        this.handleError(error);
      } finally {
        this.tickCount += 1;
        this.lastTickAt = now();
      }

      if (!controller.signal.aborted) {
        await wait(intervalMs, controller.signal);
      }
    }

    logger.info("Scheduler stopped");
  }

  stop(): void {
    if (!this.isRunning) {
      this.options.logger.warning("Scheduler is not running");
      return;
    }
    this.isRunning = false;
    this.controller?.abort();
    this.controller = null;
  }

  getStatus(): SchedulerStatus {
    return {
      isRunning: this.isRunning,
      intervalMs: this.options.intervalMs,
      tickCount: this.tickCount,
      lastTickAt: this.lastTickAt,
    };
  }

  private handleError(error: unknown): void {
    const { onError, logger } = this.options;
    if (!onError) {
      logger.error(`Scheduler tick failed: ${describeError(error)}`);
      return;
    }
    try {
      onError(error);
    } catch (handlerError) {
      logger.error(`Scheduler error handler failed: ${describeError(handlerError)}`);
    }
  }
}

export { IntervalScheduler };

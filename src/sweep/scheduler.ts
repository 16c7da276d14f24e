import { errorFields, type Logger } from "../log.js";

export interface SweepSchedulerOptions {
  /** Performs one sweep and resolves to the number of tasks closed. */
  run: () => Promise<number>;
  intervalMs: number;
  logger: Logger;
}

export interface SweepScheduler {
  /** Runs a sweep immediately unless one is already in flight. */
  tick(): Promise<void>;
  stop(): void;
}

export function startSweepScheduler({
  run,
  intervalMs,
  logger,
}: SweepSchedulerOptions): SweepScheduler {
  let running = false;
  let stopped = false;

  async function tick(): Promise<void> {
    if (stopped) {
      return;
    }
    if (running) {
      logger.debug("previous sweep still running, skipping");
      return;
    }
    running = true;
    try {
      const count = await run();
      logger.info(`closed ${count} overdue task(s)`, { count });
    } catch (err) {
      logger.error("overdue sweep failed", errorFields(err));
    } finally {
      running = false;
    }
  }

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);

  logger.info("sweep scheduler started", { interval_ms: intervalMs });

  return {
    tick,
    stop() {
      if (stopped) {
        return;
      }
      stopped = true;
      clearInterval(timer);
      logger.info("sweep scheduler stopped");
    },
  };
}

import type { Logger } from './logger.js';

/**
 * Single logical timer driving a periodic task
 */
export interface Poller {
  start(): void;
  /** Stop the timer and wait for an in-flight run to finish */
  stop(): Promise<void>;
  isRunning(): boolean;
}

/**
 * Interval poller that never overlaps runs. A run still in progress when the
 * next tick fires causes that tick to be skipped.
 */
export function createIntervalPoller(
  name: string,
  task: () => Promise<void>,
  intervalMs: number,
  logger: Logger
): Poller {
  let intervalId: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  const runSafe = (): void => {
    if (inFlight) {
      logger.debug(`${name}: previous run still in progress, skipping tick`);
      return;
    }
    inFlight = task()
      .catch((error: unknown) => {
        logger.error(`${name} failed: ${error instanceof Error ? error.message : String(error)}`);
      })
      .finally(() => {
        inFlight = null;
      });
  };

  return {
    start(): void {
      if (intervalId !== null) {
        return;
      }
      logger.debug(`${name} started (every ${intervalMs}ms)`);
      runSafe();
      intervalId = setInterval(runSafe, intervalMs);
    },

    async stop(): Promise<void> {
      if (intervalId === null) {
        return;
      }
      clearInterval(intervalId);
      intervalId = null;
      if (inFlight) {
        await inFlight;
      }
      logger.debug(`${name} stopped`);
    },

    isRunning(): boolean {
      return intervalId !== null;
    }
  };
}

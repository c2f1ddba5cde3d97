/**
 * Interval worker
 *
 * Runs a task immediately and then every `intervalMs`, never overlapping
 * iterations. Failures are logged and the loop keeps going.
 */

import { logger } from "./logger";

export interface WorkerOptions {
  /** Used in log lines */
  name: string;
  intervalMs: number;
  runOnce: () => Promise<void>;
  cleanup?: () => Promise<void> | void;
  startupMetadata?: Record<string, unknown>;
  /**
   * Stop on SIGINT/SIGTERM and exit the process afterwards.
   * Default: false
   */
  handleSignals?: boolean;
  /** How long stop() waits for a running iteration. Default: 5000 */
  shutdownTimeoutMs?: number;
}

export interface IntervalWorker {
  /** Resolves once the running iteration (if any) and cleanup have finished */
  stop(): Promise<void>;
  isRunning(): boolean;
}

export function createIntervalWorker(options: WorkerOptions): IntervalWorker {
  const { name, intervalMs, runOnce, cleanup, startupMetadata } = options;
  const shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5_000;

  logger.info(`Starting ${name}`, startupMetadata ?? {});

  let runningPromise: Promise<void> | null = null;
  let stopped = false;

  const runOnceSafely = async (): Promise<void> => {
    // Skip a tick while the previous iteration is still in flight
    if (runningPromise !== null || stopped) return;
    runningPromise = runOnce().catch((error: unknown) => {
      logger.error(`${name} iteration failed`, { error });
    });
    await runningPromise;
    runningPromise = null;
  };

  void runOnceSafely();
  const interval = setInterval(() => {
    void runOnceSafely();
  }, intervalMs);

  let stopPromise: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopPromise ??= (async () => {
      stopped = true;
      logger.info(`Shutting down ${name}...`);
      clearInterval(interval);

      if (runningPromise !== null) {
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<void>((resolve) => {
          timer = setTimeout(resolve, shutdownTimeoutMs);
        });
        await Promise.race([runningPromise, timeout]);
        clearTimeout(timer);
      }

      if (cleanup) await cleanup();
      logger.info(`${name} shutdown complete`);
    })();
    return stopPromise;
  };

  if (options.handleSignals === true) {
    const onSignal = (): void => {
      stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`${name} shutdown failed`, { error });
          process.exit(1);
        });
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  logger.info(`${name} running`, { intervalMs });

  return {
    stop,
    isRunning: () => !stopped,
  };
}

/**
 * Oracle Reader
 *
 * - Per-attempt timeout with abort
 * - Exponential backoff between attempts
 * - A source that still fails after the last attempt yields an error sample,
 *   which the engine rejects (fail closed)
 */

import { err, type Result } from "neverthrow";

import type { OracleReadings, OracleSample } from "@dnmm/core";
import { logger } from "@dnmm/utils";

import type { OracleSourceError, OracleSourcePort } from "../ports";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 1_000,
  multiplier: 2,
};

export interface ReadOptions {
  timeoutMs: number;
  retry?: RetryConfig;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelayMs(attempt: number, retry: RetryConfig): number {
  return Math.min(retry.initialDelayMs * Math.pow(retry.multiplier, attempt), retry.maxDelayMs);
}

async function readOnce(source: OracleSourcePort, timeoutMs: number): Promise<Result<OracleSample, OracleSourceError>> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<Result<OracleSample, OracleSourceError>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(err({ type: "timeout", message: `${source.name} did not answer within ${timeoutMs}ms` }));
    }, timeoutMs);
  });

  const read = source.read(controller.signal).catch(
    (error: unknown): Result<OracleSample, OracleSourceError> =>
      err({ type: "transport_failed", message: error instanceof Error ? error.message : String(error) }),
  );

  try {
    return await Promise.race([read, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Read one source with timeout and retries. Never rejects.
 */
export async function readWithTimeout(source: OracleSourcePort, options: ReadOptions): Promise<OracleSample> {
  const retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: OracleSourceError = { type: "transport_failed", message: "no attempt made" };
  for (let attempt = 0; attempt < retry.maxAttempts; attempt++) {
    const result = await readOnce(source, options.timeoutMs);
    if (result.isOk()) return result.value;

    lastError = result.error;
    const isLast = attempt === retry.maxAttempts - 1;
    logger.warn(`Oracle read failed on ${source.name}`, {
      attempt: attempt + 1,
      maxAttempts: retry.maxAttempts,
      error: result.error,
    });
    if (!isLast) await sleep(backoffDelayMs(attempt, retry));
  }

  return { status: "error", ageSec: 0, detail: `${lastError.type}: ${lastError.message}` };
}

export interface OracleSources {
  primary: OracleSourcePort;
  ema?: OracleSourcePort;
  secondary?: OracleSourcePort;
}

/**
 * Reads all configured sources in parallel into one OracleReadings.
 */
export class OracleReader {
  constructor(
    private readonly sources: OracleSources,
    private readonly options: ReadOptions,
  ) {}

  async read(): Promise<OracleReadings> {
    const { primary, ema, secondary } = this.sources;
    const [primarySample, emaSample, secondarySample] = await Promise.all([
      readWithTimeout(primary, this.options),
      ema ? readWithTimeout(ema, this.options) : Promise.resolve(undefined),
      secondary ? readWithTimeout(secondary, this.options) : Promise.resolve(undefined),
    ]);

    return { primary: primarySample, ema: emaSample, secondary: secondarySample };
  }
}

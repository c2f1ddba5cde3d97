/**
 * Oracle Reader Unit Tests
 *
 * - Timeout becomes an error sample
 * - Backoff schedule between attempts
 * - Recovery on a later attempt
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ok, type Result } from "neverthrow";

import type { OracleSample } from "@dnmm/core";
import { logger } from "@dnmm/utils";

import { OracleReader, backoffDelayMs, readWithTimeout, type RetryConfig } from "../src/oracle/oracle-reader";
import { StaticOracleSource } from "../src/oracle/static-oracle-source";
import type { OracleSourceError, OracleSourcePort } from "../src/ports";

const MID = 25n * 10n ** 18n;
const retry: RetryConfig = { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 150, multiplier: 2 };

const createSource = (name: string, mid = MID): StaticOracleSource =>
  new StaticOracleSource(name, { mid, publishedAtSec: 1_000 }, () => 1_004);

describe("readWithTimeout", () => {
  let delays: number[];
  const sleep = (ms: number): Promise<void> => {
    delays.push(ms);
    return Promise.resolve();
  };

  beforeEach(() => {
    delays = [];
    logger.setSink({ write: () => {} });
  });

  afterEach(() => {
    logger.clearSink();
  });

  test("should return the sample on the first successful read", async () => {
    const sample = await readWithTimeout(createSource("pyth"), { timeoutMs: 50, retry, sleep });

    expect(sample).toEqual({ status: "ok", mid: MID, ageSec: 4 });
    expect(delays).toEqual([]);
  });

  test("should turn a hanging source into an error sample and abort each attempt", async () => {
    const signals: AbortSignal[] = [];
    const hanging: OracleSourcePort = {
      name: "hang",
      read: (signal) => {
        signals.push(signal);
        return new Promise(() => {});
      },
    };

    const sample = await readWithTimeout(hanging, { timeoutMs: 5, retry, sleep });

    expect(sample).toEqual({ status: "error", ageSec: 0, detail: "timeout: hang did not answer within 5ms" });
    expect(signals).toHaveLength(3);
    expect(signals.every((s) => s.aborted)).toBe(true);
  });

  test("should back off exponentially up to the max delay", async () => {
    const source = createSource("hyper");
    source.fail({ type: "transport_failed", message: "503" });

    const sample = await readWithTimeout(source, { timeoutMs: 50, retry, sleep });

    expect(sample.status).toBe("error");
    expect(sample.detail).toBe("transport_failed: 503");
    // 100, min(200, 150); no sleep after the last attempt
    expect(delays).toEqual([100, 150]);
  });

  test("should recover on a later attempt", async () => {
    let calls = 0;
    const flaky: OracleSourcePort = {
      name: "flaky",
      read: (): Promise<Result<OracleSample, OracleSourceError>> => {
        calls++;
        if (calls === 1) return Promise.reject(new Error("socket hang up"));
        return Promise.resolve(ok({ status: "ok", mid: MID, ageSec: 1 }));
      },
    };

    const sample = await readWithTimeout(flaky, { timeoutMs: 50, retry, sleep });

    expect(sample).toEqual({ status: "ok", mid: MID, ageSec: 1 });
    expect(calls).toBe(2);
    expect(delays).toEqual([100]);
  });
});

describe("backoffDelayMs", () => {
  test("should grow by the multiplier", () => {
    const wide = { ...retry, maxDelayMs: 10_000 };
    expect([0, 1, 2, 3].map((n) => backoffDelayMs(n, wide))).toEqual([100, 200, 400, 800]);
  });
});

describe("OracleReader", () => {
  beforeEach(() => {
    logger.setSink({ write: () => {} });
  });

  afterEach(() => {
    logger.clearSink();
  });

  test("should read every configured source", async () => {
    const reader = new OracleReader(
      { primary: createSource("primary"), secondary: createSource("secondary", 26n * 10n ** 18n) },
      { timeoutMs: 50, retry },
    );

    const readings = await reader.read();

    expect(readings.primary.mid).toBe(MID);
    expect(readings.secondary?.mid).toBe(26n * 10n ** 18n);
    expect(readings.ema).toBeUndefined();
  });
});

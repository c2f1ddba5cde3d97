/**
 * Repository Unit Tests
 *
 * In-memory implementations for behaviour, Postgres implementations against a
 * client-less drizzle instance for the DB_ERROR path.
 */

import { drizzle } from "drizzle-orm/node-postgres";
import { describe, expect, test } from "vitest";

import { schema } from "@dnmm/db";

import {
  createInMemoryEngineConfigRepository,
  createInMemoryEngineEventRepository,
  createInMemoryPoolStateRepository,
} from "../src/memory";
import {
  createPostgresEngineConfigRepository,
  createPostgresEngineEventRepository,
  createPostgresPoolStateRepository,
} from "../src/postgres";
import { createTestConfig, createTestState } from "./fixtures";

describe("InMemoryPoolStateRepository", () => {
  test("should return null before the first save", async () => {
    const repo = createInMemoryPoolStateRepository();
    expect((await repo.getLatest("pool-1"))._unsafeUnwrap()).toBeNull();
  });

  test("should return the latest snapshot per pool as a copy", async () => {
    const repo = createInMemoryPoolStateRepository();
    const state = createTestState();
    await repo.save({ poolId: "pool-1", ts: new Date(1_000), version: 1, state });
    await repo.save({ poolId: "pool-1", ts: new Date(2_000), version: 2, state: { ...state, fee: { lastFeeBps: 40, lastTick: 9 } } });
    await repo.save({ poolId: "pool-2", ts: new Date(3_000), version: 1, state });

    const latest = (await repo.getLatest("pool-1"))._unsafeUnwrap();

    expect(latest?.version).toBe(2);
    expect(latest?.state.fee).toEqual({ lastFeeBps: 40, lastTick: 9 });
    expect(latest?.state.inventory).toEqual(state.inventory);
    expect(latest?.state.inventory).not.toBe(state.inventory);
  });

  test("should not let an older snapshot replace a newer one", async () => {
    const repo = createInMemoryPoolStateRepository();
    const state = createTestState();
    await repo.save({ poolId: "pool-1", ts: new Date(2_000), version: 2, state });
    await repo.save({ poolId: "pool-1", ts: new Date(1_000), version: 1, state });

    expect((await repo.getLatest("pool-1"))._unsafeUnwrap()?.version).toBe(2);
  });
});

describe("InMemoryEngineEventRepository", () => {
  test("should list newest first, filtered by pool and type, up to the limit", async () => {
    const repo = createInMemoryEngineEventRepository();
    await repo.append([
      { poolId: "pool-1", ts: new Date(1), event: { type: "DIVERGENCE_HAIRCUT", deltaBps: 40, haircutBps: 13, softBand: false } },
      { poolId: "pool-2", ts: new Date(2), event: { type: "DIVERGENCE_REJECTED", deltaBps: 80, hardBps: 75 } },
      { poolId: "pool-1", ts: new Date(3), event: { type: "DIVERGENCE_REJECTED", deltaBps: 90, hardBps: 75 } },
      { poolId: "pool-1", ts: new Date(4), event: { type: "DIVERGENCE_CLEARED", deltaBps: 5, healthyStreak: 3 } },
    ]);

    const recent = (await repo.listRecent({ poolId: "pool-1", limit: 2 }))._unsafeUnwrap();
    expect(recent.map((r) => r.event.type)).toEqual(["DIVERGENCE_CLEARED", "DIVERGENCE_REJECTED"]);

    const rejected = (await repo.listRecent({ poolId: "pool-1", type: "DIVERGENCE_REJECTED", limit: 10 }))._unsafeUnwrap();
    expect(rejected).toEqual([
      { poolId: "pool-1", ts: new Date(3), event: { type: "DIVERGENCE_REJECTED", deltaBps: 90, hardBps: 75 } },
    ]);
  });

  test("should drop the oldest events past the history limit", async () => {
    const repo = createInMemoryEngineEventRepository(2);
    await repo.append([
      { poolId: "pool-1", ts: new Date(1), event: { type: "DIVERGENCE_REJECTED", deltaBps: 80, hardBps: 75 } },
      { poolId: "pool-1", ts: new Date(2), event: { type: "DIVERGENCE_REJECTED", deltaBps: 85, hardBps: 75 } },
    ]);
    await repo.append([
      { poolId: "pool-1", ts: new Date(3), event: { type: "DIVERGENCE_REJECTED", deltaBps: 90, hardBps: 75 } },
    ]);

    const recent = (await repo.listRecent({ poolId: "pool-1", limit: 10 }))._unsafeUnwrap();
    expect(recent.map((r) => r.ts)).toEqual([new Date(3), new Date(2)]);
  });
});

describe("InMemoryEngineConfigRepository", () => {
  test("should return the latest accepted config", async () => {
    const repo = createInMemoryEngineConfigRepository();
    const config = createTestConfig();
    await repo.save({ poolId: "pool-1", ts: new Date(1), reason: "initial", config });
    await repo.save({ poolId: "pool-1", ts: new Date(2), reason: "fee", config: { ...config, fee: { ...config.fee, capBps: 200 } } });

    const latest = (await repo.getLatest("pool-1"))._unsafeUnwrap();

    expect(latest?.reason).toBe("fee");
    expect(latest?.config.fee.capBps).toBe(200);
    expect(latest?.config.maker.s0Notional).toBe(5_000_000_000n);
  });
});

describe("Postgres repositories", () => {
  const db = drizzle.mock({ schema });

  test("should wrap driver failures in DB_ERROR", async () => {
    const states = createPostgresPoolStateRepository(db);
    const events = createPostgresEngineEventRepository(db);
    const configs = createPostgresEngineConfigRepository(db);

    const saved = await states.save({ poolId: "pool-1", ts: new Date(0), version: 1, state: createTestState() });
    expect(saved._unsafeUnwrapErr().type).toBe("DB_ERROR");
    expect((await states.getLatest("pool-1"))._unsafeUnwrapErr().type).toBe("DB_ERROR");
    expect((await events.listRecent({ poolId: "pool-1", limit: 5 }))._unsafeUnwrapErr().type).toBe("DB_ERROR");
    expect((await configs.getLatest("pool-1"))._unsafeUnwrapErr().type).toBe("DB_ERROR");
  });

  test("should not touch the database for an empty event batch", async () => {
    const events = createPostgresEngineEventRepository(db);
    expect((await events.append([])).isOk()).toBe(true);
  });
});

/**
 * Engine Codec Unit Tests
 */

import { describe, expect, test } from "vitest";

import type { JsonValue } from "@dnmm/utils";

import {
  decodeEngineConfig,
  decodeEngineEvent,
  decodePoolState,
  encodeEngineConfig,
  encodeEngineEvent,
  encodePoolState,
} from "../src/codec/engine-codec";
import { createTestConfig, createTestState } from "./fixtures";

function asRecord(json: JsonValue): Record<string, JsonValue> {
  if (json === null || typeof json !== "object" || Array.isArray(json)) throw new Error("expected a JSON object");
  return json;
}

describe("pool state codec", () => {
  test("should write bigints as decimal strings", () => {
    const json = encodePoolState(createTestState());

    expect(json).toMatchObject({
      inventory: { baseReserves: "1000000000000000000000", quoteReserves: "25000000000", lastRebalancePrice: "0" },
      sigma: { sigmaBps: 0, lastMid: "0", lastTick: 0 },
    });
  });

  test("should decode what it encodes", () => {
    const state = createTestState();
    expect(decodePoolState(encodePoolState(state))._unsafeUnwrap()).toEqual(state);
  });

  test("should name the offending field", () => {
    const broken = { ...asRecord(encodePoolState(createTestState())), fee: { lastFeeBps: -1, lastTick: 0 } };

    const error = decodePoolState(broken)._unsafeUnwrapErr();

    expect(error.type).toBe("CODEC_ERROR");
    expect(error.message).toContain("fee.lastFeeBps");
  });

  test("should reject non-integer amounts", () => {
    const broken = { ...asRecord(encodePoolState(createTestState())), sigma: { sigmaBps: 0, lastMid: "1.5", lastTick: 0 } };

    expect(decodePoolState(broken)._unsafeUnwrapErr().message).toContain("sigma.lastMid");
  });
});

describe("engine config codec", () => {
  test("should decode what it encodes", () => {
    const config = createTestConfig();
    expect(decodeEngineConfig(encodeEngineConfig(config))._unsafeUnwrap()).toEqual(config);
  });

  test("should accept integer numbers for amounts", () => {
    const json = {
      ...asRecord(encodeEngineConfig(createTestConfig())),
      aomq: { minQuoteNotional: 5, emergencySpreadBps: 100, floorEpsilonBps: 0 } };
    expect(decodeEngineConfig(json)._unsafeUnwrap().aomq.minQuoteNotional).toBe(5n);
  });
});

describe("engine event codec", () => {
  test("should decode each event shape", () => {
    const event = {
      type: "RECENTER_COMMITTED",
      trigger: "auto",
      price: 27n * 10n ** 18n,
      previousTarget: 1_000n,
      newTarget: 962n,
      deviationBps: 800,
    } as const;

    expect(encodeEngineEvent(event)).toEqual({
      type: "RECENTER_COMMITTED",
      trigger: "auto",
      price: "27000000000000000000",
      previousTarget: "1000",
      newTarget: "962",
      deviationBps: 800,
    });
    expect(decodeEngineEvent(encodeEngineEvent(event))._unsafeUnwrap()).toEqual(event);
  });

  test("should reject an unknown event type", () => {
    expect(decodeEngineEvent({ type: "SOMETHING_ELSE" })._unsafeUnwrapErr().type).toBe("CODEC_ERROR");
  });
});

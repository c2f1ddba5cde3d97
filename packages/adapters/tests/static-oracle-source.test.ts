import { describe, expect, test } from "vitest";

import { StaticOracleSource } from "../src/oracle/static-oracle-source";

const MID = 25n * 10n ** 18n;

describe("StaticOracleSource", () => {
  test("should measure age from the publish time", async () => {
    let now = 1_010;
    const source = new StaticOracleSource("static", { mid: MID, confidenceBps: 12, publishedAtSec: 1_000 }, () => now);

    const first = await source.read(new AbortController().signal);
    expect(first._unsafeUnwrap()).toEqual({ status: "ok", mid: MID, confidenceBps: 12, ageSec: 10 });

    now = 995;
    const second = await source.read(new AbortController().signal);
    expect(second._unsafeUnwrap().ageSec).toBe(0);
  });

  test("should fail until a new price is set", async () => {
    const source = new StaticOracleSource("static", { mid: MID, publishedAtSec: 0 }, () => 0);
    source.fail({ type: "invalid_response", message: "bad payload" });

    expect((await source.read(new AbortController().signal))._unsafeUnwrapErr().type).toBe("invalid_response");

    source.set({ mid: MID, publishedAtSec: 0 });
    expect((await source.read(new AbortController().signal)).isOk()).toBe(true);
  });

  test("should refuse an aborted read", async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new StaticOracleSource("static", { mid: MID, publishedAtSec: 0 }, () => 0);

    expect((await source.read(controller.signal))._unsafeUnwrapErr().type).toBe("timeout");
  });
});

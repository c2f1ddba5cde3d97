/**
 * Static Oracle Source
 *
 * Serves a price set in process. Used by the mirror when it runs from the
 * parameter file's reference prices, and by tests.
 */

import { err, ok, type Result } from "neverthrow";

import type { Bps, OracleSample, OracleStatus, PriceWad, Sec } from "@dnmm/core";

import type { OracleSourceError, OracleSourcePort } from "../ports";

export interface StaticPrice {
  mid?: PriceWad;
  bid?: PriceWad;
  ask?: PriceWad;
  confidenceBps?: Bps;
  /** Unix seconds the price was published at; age is measured from here */
  publishedAtSec: Sec;
  status?: OracleStatus;
}

export const unixNowSec = (): Sec => Math.floor(Date.now() / 1000);

export class StaticOracleSource implements OracleSourcePort {
  private price: StaticPrice;
  private failure: OracleSourceError | null = null;

  constructor(
    readonly name: string,
    price: StaticPrice,
    private readonly clock: () => Sec = unixNowSec,
  ) {
    this.price = price;
  }

  /** Replace the served price and clear any injected failure */
  set(price: StaticPrice): void {
    this.price = price;
    this.failure = null;
  }

  /** Make subsequent reads fail until the next set() */
  fail(failure: OracleSourceError): void {
    this.failure = failure;
  }

  read(signal: AbortSignal): Promise<Result<OracleSample, OracleSourceError>> {
    if (signal.aborted) {
      return Promise.resolve(err({ type: "timeout", message: `${this.name} read aborted` }));
    }
    if (this.failure !== null) return Promise.resolve(err(this.failure));

    const { mid, bid, ask, confidenceBps, publishedAtSec, status } = this.price;
    return Promise.resolve(
      ok({
        status: status ?? "ok",
        mid,
        bid,
        ask,
        confidenceBps,
        ageSec: Math.max(this.clock() - publishedAtSec, 0),
      }),
    );
  }
}

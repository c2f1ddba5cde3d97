/**
 * Engine Event Port - Sink for engine events
 */

import type { Result } from "neverthrow";

import type { EngineEvent } from "@dnmm/core";

export interface PublishedEvent {
  poolId: string;
  ts: Date;
  event: EngineEvent;
}

export type EngineEventError = { type: "publish_failed"; message: string };

export interface EngineEventPort {
  publish(events: PublishedEvent[]): Promise<Result<void, EngineEventError>>;
}

/**
 * Event Recorder
 *
 * EngineEventPort for the mirror: logs each event, appends the batch to the
 * event repository, then forwards it to in-process subscribers.
 */

import { err, ok, type Result } from "neverthrow";

import type { EngineEventError, EngineEventPort, PublishedEvent } from "@dnmm/adapters";
import type { EngineEventRepository } from "@dnmm/repositories";
import { createLogger, type Logger } from "@dnmm/utils";

export class EventRecorder implements EngineEventPort {
  constructor(
    private readonly repository: EngineEventRepository,
    private readonly forward?: EngineEventPort,
    private readonly log: Logger = createLogger("events"),
  ) {}

  async publish(events: PublishedEvent[]): Promise<Result<void, EngineEventError>> {
    for (const { poolId, event } of events) {
      const { type, ...fields } = event;
      this.log.info(type, { poolId, ...fields });
    }

    const appended = await this.repository.append(events);
    if (appended.isErr()) {
      return err({ type: "publish_failed", message: `${appended.error.type}: ${appended.error.message}` });
    }

    if (this.forward !== undefined) return this.forward.publish(events);
    return ok(undefined);
  }
}

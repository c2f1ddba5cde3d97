/**
 * In-Memory Event Bus
 *
 * Fans published events out to subscribers and keeps a bounded history.
 * A throwing subscriber is logged and does not stop delivery to the others.
 */

import { ok, type Result } from "neverthrow";

import type { EngineEvent } from "@dnmm/core";
import { logger } from "@dnmm/utils";

import type { EngineEventError, EngineEventPort, PublishedEvent } from "../ports";

export type EventHandler = (event: PublishedEvent) => void;

export class InMemoryEventBus implements EngineEventPort {
  private handlers: EventHandler[] = [];
  private history: PublishedEvent[] = [];

  constructor(private readonly historyLimit = 1_000) {}

  /**
   * Register a handler; returns the unsubscribe function.
   */
  subscribe(handler: EventHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter((h) => h !== handler);
    };
  }

  publish(events: PublishedEvent[]): Promise<Result<void, EngineEventError>> {
    for (const published of events) {
      this.history.push(published);
      for (const handler of this.handlers) {
        try {
          handler(published);
        } catch (error) {
          logger.error("Event handler failed", { eventType: published.event.type, error });
        }
      }
    }
    if (this.history.length > this.historyLimit) {
      this.history = this.history.slice(this.history.length - this.historyLimit);
    }
    return Promise.resolve(ok(undefined));
  }

  /** Most recent events, oldest first, optionally filtered by type */
  recent(type?: EngineEvent["type"]): PublishedEvent[] {
    return type === undefined ? [...this.history] : this.history.filter((p) => p.event.type === type);
  }
}

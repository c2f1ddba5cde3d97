/**
 * Port interfaces for adapters
 */

export type { OracleSourceError, OracleSourcePort } from "./oracle-source-port";

export type { EngineEventError, EngineEventPort, PublishedEvent } from "./engine-event-port";

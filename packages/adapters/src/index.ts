/**
 * packages/adapters - Ports and in-process adapters
 *
 * - Port interfaces for oracle sources and event sinks
 * - Timeout/backoff oracle reader
 * - Static oracle source and in-memory event bus
 */

// Port interfaces
export * from "./ports";

// Oracle
export * from "./oracle/oracle-reader";
export * from "./oracle/static-oracle-source";

// Events
export * from "./events/in-memory-event-bus";

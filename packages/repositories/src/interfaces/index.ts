export type { RepositoryError } from "./errors";
export { dbError } from "./errors";
export type { PoolStateRecord, PoolStateRepository } from "./pool-state-repository";
export type { EngineEventQuery, EngineEventRecord, EngineEventRepository } from "./engine-event-repository";
export type { EngineConfigRecord, EngineConfigRepository } from "./engine-config-repository";

export { createPostgresPoolStateRepository } from "./pool-state-repository";
export { createPostgresEngineEventRepository } from "./engine-event-repository";
export { createPostgresEngineConfigRepository } from "./engine-config-repository";

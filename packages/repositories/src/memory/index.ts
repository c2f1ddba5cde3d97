export {
  createInMemoryEngineConfigRepository,
  createInMemoryEngineEventRepository,
  createInMemoryPoolStateRepository,
} from "./in-memory-repositories";

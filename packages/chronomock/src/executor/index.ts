export {
  task,
  SpawnToken,
  type SpawnTokenState,
  type TaskOptions,
  type TaskFunction,
} from "./task";
export {
  createEventLoopSpawner,
  type Spawner,
  type EventLoopSpawner,
  type EventLoopSpawnerOptions,
} from "./spawner";
export { MockSpawner, type MockSpawnerError } from "./mock";

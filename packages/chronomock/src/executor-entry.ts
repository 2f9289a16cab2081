/**
 * chronomock/executor
 *
 * The Spawner capability: tasks, spawn tokens, the event-loop spawner for
 * production and MockSpawner for tests.
 *
 * @example
 * ```typescript
 * import { task, MockSpawner, type Spawner } from 'chronomock/executor';
 * import { unwrap } from 'chronomock/result';
 *
 * const exampleTask = task(async () => {});
 *
 * // Generic over the Spawner interface
 * export function spawnTasks(spawner: Spawner) {
 *   unwrap(spawner.spawn(exampleTask()));
 * }
 *
 * // In a test
 * const spawner = MockSpawner.expect(1);
 * spawnTasks(spawner);
 * spawner.release(); // throws if spawnTasks spawned anything but one task
 * ```
 */

export {
  // Capability
  type Spawner,

  // Tasks
  task,
  SpawnToken,
  type SpawnTokenState,
  type TaskOptions,
  type TaskFunction,

  // Production
  createEventLoopSpawner,
  type EventLoopSpawner,
  type EventLoopSpawnerOptions,

  // Mock
  MockSpawner,
  type MockSpawnerError,
} from "./executor";

/**
 * Worker Pool Module
 *
 * @module
 */

export type { IWorkerPool, WorkerTask, WorkerResult, WorkerPoolStats } from "./interfaces/IWorkerPool.js";
export {
  WorkerPool,
  InProcessWorkerPool,
  defaultPoolSize,
  type WorkerPoolConfig,
  type TaskExecutor,
} from "./worker-pool.js";
export {
  ParseResolveWorkerPool,
  createParseResolveExecutor,
  type ParseTaskInput,
  type ParseTaskOutput,
  type ParseResolveDependencies,
} from "./parse-resolve-worker.js";

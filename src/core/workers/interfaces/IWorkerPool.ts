/**
 * Worker Pool Interfaces
 *
 * @module
 */

import type { DirectoryGraphError } from "../../errors.js";

export interface WorkerTask<TInput> {
  id: string;
  type: string;
  input: TInput;
  /** Higher runs first (default 0) */
  priority?: number;
  /** Overrides the pool's task timeout */
  timeout?: number;
}

interface WorkerResultBase {
  taskId: string;
  durationMs: number;
  workerId: string;
}

export type WorkerResult<TOutput> =
  | (WorkerResultBase & { success: true; output: TOutput })
  | (WorkerResultBase & { success: false; error: DirectoryGraphError });

export interface WorkerPoolStats {
  size: number;
  activeWorkers: number;
  idleWorkers: number;
  pendingTasks: number;
  totalSubmitted: number;
  totalCompleted: number;
  totalFailed: number;
  totalDurationMs: number;
  queueWaitTimeMs: number;
}

export interface IWorkerPool<TInput, TOutput> {
  submit(task: WorkerTask<TInput>): Promise<WorkerResult<TOutput>>;
  /** Resolves once nothing is queued or running */
  drain(): Promise<void>;
  stats(): WorkerPoolStats;
  shutdown(): Promise<void>;
}

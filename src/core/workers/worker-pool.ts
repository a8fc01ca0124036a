/**
 * Worker Pool Implementation
 *
 * Bounded pool for parse & resolve work over cached artifacts:
 * - Fixed pool size (defaults to the available cores)
 * - Priority-based task scheduling
 * - Task timeout handling
 * - Drain for cancellation, statistics
 *
 * Task failures are results, never rejections, so one bad page cannot
 * take down a batch.
 */

import * as os from "node:os";
import { ErrorCode, PipelineError, wrapError } from "../errors.js";
import { timeout, TimeoutError } from "../../utils/async.js";
import { createLogger } from "../../utils/logger.js";
import type { IWorkerPool, WorkerPoolStats, WorkerResult, WorkerTask } from "./interfaces/IWorkerPool.js";

const logger = createLogger("worker-pool");

// =============================================================================
// Types
// =============================================================================

export interface WorkerPoolConfig {
  size: number;
  taskTimeoutMs: number;
  maxQueueSize: number;
}

interface QueuedTask<TInput, TOutput> {
  task: WorkerTask<TInput>;
  resolve: (result: WorkerResult<TOutput>) => void;
  reject: (error: Error) => void;
  queuedAt: number;
}

interface WorkerState {
  id: string;
  busy: boolean;
  currentTaskId: string | null;
  completedTasks: number;
  failedTasks: number;
}

export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism());
}

// =============================================================================
// Abstract Worker Pool
// =============================================================================

export abstract class WorkerPool<TInput, TOutput> implements IWorkerPool<TInput, TOutput> {
  protected workers: Map<string, WorkerState> = new Map();
  protected taskQueue: QueuedTask<TInput, TOutput>[] = [];
  protected config: WorkerPoolConfig;
  protected isShutdown = false;
  private idleWaiters: Array<() => void> = [];

  // Statistics
  protected _stats = {
    totalSubmitted: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalDurationMs: 0,
    queueWaitTimeMs: 0,
  };

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    this.config = {
      size: Math.max(1, config.size ?? defaultPoolSize()),
      taskTimeoutMs: config.taskTimeoutMs ?? 30000,
      maxQueueSize: config.maxQueueSize ?? 10000,
    };
    for (let i = 1; i <= this.config.size; i++) {
      const id = `worker-${i}`;
      this.workers.set(id, { id, busy: false, currentTaskId: null, completedTasks: 0, failedTasks: 0 });
    }
  }

  async submit(task: WorkerTask<TInput>): Promise<WorkerResult<TOutput>> {
    if (this.isShutdown) {
      throw new PipelineError("Worker pool is shut down", ErrorCode.PIPELINE_WORKER_POOL_SHUTDOWN, {
        taskId: task.id,
      });
    }

    if (this.taskQueue.length >= this.config.maxQueueSize) {
      throw new PipelineError("Task queue is full", ErrorCode.PIPELINE_QUEUE_FULL, { taskId: task.id });
    }

    this._stats.totalSubmitted++;

    return new Promise((resolve, reject) => {
      const queuedTask: QueuedTask<TInput, TOutput> = {
        task,
        resolve,
        reject,
        queuedAt: Date.now(),
      };

      // Insert by priority (higher priority first, FIFO within a priority)
      const priority = task.priority ?? 0;
      const index = this.taskQueue.findIndex((queued) => priority > (queued.task.priority ?? 0));
      if (index === -1) {
        this.taskQueue.push(queuedTask);
      } else {
        this.taskQueue.splice(index, 0, queuedTask);
      }

      this.dispatch();
    });
  }

  async drain(): Promise<void> {
    if (this.isIdle()) return;
    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stats(): WorkerPoolStats {
    const workers = Array.from(this.workers.values());
    const activeWorkers = workers.filter((w) => w.busy).length;

    return {
      size: this.config.size,
      activeWorkers,
      idleWorkers: this.workers.size - activeWorkers,
      pendingTasks: this.taskQueue.length,
      totalSubmitted: this._stats.totalSubmitted,
      totalCompleted: this._stats.totalCompleted,
      totalFailed: this._stats.totalFailed,
      totalDurationMs: this._stats.totalDurationMs,
      queueWaitTimeMs: this._stats.queueWaitTimeMs,
    };
  }

  /**
   * Rejects queued tasks and waits for running ones to finish.
   */
  async shutdown(): Promise<void> {
    this.isShutdown = true;

    const pending = this.taskQueue;
    this.taskQueue = [];
    for (const queued of pending) {
      queued.reject(
        new PipelineError("Worker pool shut down before the task ran", ErrorCode.PIPELINE_WORKER_POOL_SHUTDOWN, {
          taskId: queued.task.id,
        })
      );
    }

    await this.drain();
    logger.debug({ stats: this.stats() }, "Worker pool shut down");
  }

  // ==========================================================================
  // Abstract Methods (to be implemented by specific worker types)
  // ==========================================================================

  protected abstract executeTask(workerId: string, task: WorkerTask<TInput>): Promise<TOutput>;

  // ==========================================================================
  // Internal Methods
  // ==========================================================================

  private isIdle(): boolean {
    return this.taskQueue.length === 0 && Array.from(this.workers.values()).every((w) => !w.busy);
  }

  /** Hands queued tasks to idle workers */
  private dispatch(): void {
    for (const worker of this.workers.values()) {
      if (this.taskQueue.length === 0) break;
      if (worker.busy) continue;

      const queued = this.taskQueue.shift();
      if (!queued) break;

      worker.busy = true;
      worker.currentTaskId = queued.task.id;
      void this.run(worker, queued);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const wake of waiters) wake();
    }
  }

  private async run(worker: WorkerState, queued: QueuedTask<TInput, TOutput>): Promise<void> {
    const startTime = Date.now();
    this._stats.queueWaitTimeMs += startTime - queued.queuedAt;
    const timeoutMs = queued.task.timeout ?? this.config.taskTimeoutMs;

    try {
      const output = await timeout(
        this.executeTask(worker.id, queued.task),
        timeoutMs,
        `Task ${queued.task.id} timed out after ${timeoutMs}ms`
      );

      const durationMs = Date.now() - startTime;
      this._stats.totalCompleted++;
      this._stats.totalDurationMs += durationMs;
      worker.completedTasks++;

      queued.resolve({ taskId: queued.task.id, success: true, output, durationMs, workerId: worker.id });
    } catch (error) {
      const durationMs = Date.now() - startTime;
      this._stats.totalFailed++;
      worker.failedTasks++;

      const failure =
        error instanceof TimeoutError
          ? new PipelineError(error.message, ErrorCode.PIPELINE_TASK_TIMEOUT, { taskId: queued.task.id, timeoutMs })
          : wrapError(error, `Task ${queued.task.id} failed`);

      logger.debug({ taskId: queued.task.id, type: queued.task.type, error: failure.message }, "Task failed");
      queued.resolve({ taskId: queued.task.id, success: false, error: failure, durationMs, workerId: worker.id });
    } finally {
      worker.busy = false;
      worker.currentTaskId = null;
      this.dispatch();
    }
  }
}

// =============================================================================
// In-Process Worker Pool
// =============================================================================

export type TaskExecutor<TInput, TOutput> = (input: TInput, workerId: string) => Promise<TOutput>;

export class InProcessWorkerPool<TInput, TOutput> extends WorkerPool<TInput, TOutput> {
  private executor: TaskExecutor<TInput, TOutput>;

  constructor(executor: TaskExecutor<TInput, TOutput>, config?: Partial<WorkerPoolConfig>) {
    super(config);
    this.executor = executor;
  }

  protected async executeTask(workerId: string, task: WorkerTask<TInput>): Promise<TOutput> {
    return this.executor(task.input, workerId);
  }
}

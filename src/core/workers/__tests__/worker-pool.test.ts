/**
 * Tests for the worker pool
 */

import { describe, it, expect } from "vitest";
import { InProcessWorkerPool, type TaskExecutor, type WorkerPoolConfig } from "../worker-pool.js";
import type { WorkerResult, WorkerTask } from "../interfaces/IWorkerPool.js";
import { ErrorCode, ExtractionError, PipelineError } from "../../errors.js";

function createPool<TInput, TOutput>(
  executor: TaskExecutor<TInput, TOutput>,
  config: Partial<WorkerPoolConfig>
): InProcessWorkerPool<TInput, TOutput> {
  return new InProcessWorkerPool(executor, config);
}

function submitAll<TInput, TOutput>(
  pool: InProcessWorkerPool<TInput, TOutput>,
  tasks: WorkerTask<TInput>[]
): Promise<WorkerResult<TOutput>[]> {
  return Promise.all(tasks.map((task) => pool.submit(task)));
}

describe("InProcessWorkerPool", () => {
  it("should run tasks and report outputs", async () => {
    const pool = createPool(async (input: number) => input * 2, { size: 2 });

    const results = await submitAll(pool, [1, 2, 3].map((n) => ({ id: `t${n}`, type: "double", input: n })));

    expect(results.map((r) => (r.success ? r.output : null))).toEqual([2, 4, 6]);
    expect(pool.stats()).toMatchObject({ size: 2, totalSubmitted: 3, totalCompleted: 3, totalFailed: 0 });
  });

  it("should never run more tasks at once than its size", async () => {
    let running = 0;
    let peak = 0;
    const pool = createPool(
      async (input: number) => {
        running++;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 2));
        running--;
        return input;
      },
      { size: 3 }
    );

    await submitAll(pool, Array.from({ length: 10 }, (_, i) => ({ id: `t${i}`, type: "sleep", input: i })));

    expect(peak).toBe(3);
  });

  it("should return failures as results", async () => {
    const pool = createPool(
      async (input: string) => {
        if (input === "bad") throw new ExtractionError("no items", ErrorCode.EXTRACTION_NO_ITEMS, { key: input });
        return input;
      },
      { size: 1 }
    );

    const [good, bad] = await submitAll(pool, [
      { id: "good", type: "parse", input: "good" },
      { id: "bad", type: "parse", input: "bad" },
    ]);

    expect(good?.success).toBe(true);
    expect(bad?.success).toBe(false);
    if (bad && !bad.success) {
      expect(bad.error).toBeInstanceOf(ExtractionError);
      expect(bad.error.code).toBe(ErrorCode.EXTRACTION_NO_ITEMS);
    }
    expect(pool.stats().totalFailed).toBe(1);
  });

  it("should fail a task that exceeds its timeout", async () => {
    const pool = createPool(
      (_input: number) => new Promise<number>(() => undefined),
      { size: 1, taskTimeoutMs: 10 }
    );

    const result = await pool.submit({ id: "slow", type: "hang", input: 1 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("Task slow timed out after 10ms");
      expect(result.error.code).toBe(ErrorCode.PIPELINE_TASK_TIMEOUT);
    }
  });

  it("should run higher-priority tasks first", async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const order: string[] = [];
    const pool = createPool(
      async (input: string) => {
        if (input === "blocker") await gate;
        order.push(input);
        return input;
      },
      { size: 1 }
    );

    const all = Promise.all([
      pool.submit({ id: "blocker", type: "t", input: "blocker" }),
      pool.submit({ id: "low", type: "t", input: "low" }),
      pool.submit({ id: "high", type: "t", input: "high", priority: 5 }),
    ]);
    openGate();
    await all;

    expect(order).toEqual(["blocker", "high", "low"]);
  });

  it("should drain running work and reject submissions after shutdown", async () => {
    const finished: number[] = [];
    const pool = createPool(
      async (input: number) => {
        await new Promise((resolve) => setTimeout(resolve, 2));
        finished.push(input);
        return input;
      },
      { size: 2 }
    );

    const pending = submitAll(pool, [1, 2].map((n) => ({ id: `t${n}`, type: "t", input: n })));
    await pool.drain();
    expect(finished.sort()).toEqual([1, 2]);
    await pending;

    await pool.shutdown();
    await expect(pool.submit({ id: "late", type: "t", input: 3 })).rejects.toThrow(PipelineError);
  });

  it("should resolve drain immediately when idle", async () => {
    const pool = createPool(async (input: number) => input, { size: 1 });
    await expect(pool.drain()).resolves.toBeUndefined();
  });
});

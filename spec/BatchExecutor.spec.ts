import { getEventListeners } from "events";
import _ from "lodash";
import { setTimeout as sleep } from "timers/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BatchExecutor } from "../src/BatchExecutor.js";
import { BatchExecutionError, CancellationError, ConfigurationError, ExecutorRejectedError } from "../src/errors.js";

// settle a promise into its value or error so rejections are always handled
const settle = <T>(promise: Promise<T>) => promise.then(
  (value) => ({ value }),
  (error: unknown) => ({ error })
);

describe("BatchExecutor", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should refuse a concurrency that isn't a positive integer", () => {
    expect(() => new BatchExecutor({ concurrency: 0 })).toThrow(ConfigurationError);
    expect(() => new BatchExecutor({ concurrency: 1.5 })).toThrow(ConfigurationError);
    expect(() => new BatchExecutor({ gracePeriodMs: -1 })).toThrow(ConfigurationError);
  });

  it("should default to one slot per cpu", () => {
    const executor = new BatchExecutor();
    expect(executor.concurrency).toBeGreaterThanOrEqual(1);
  });

  describe("invokeAll", () => {
    it("should resolve results in task order", async () => {
      const executor = new BatchExecutor({ concurrency: 3 });
      const tasks = _.range(6).map((index) => async () => {
        await sleep(6 - index);
        return index * 10;
      });

      expect(await executor.invokeAll(tasks)).toEqual([0, 10, 20, 30, 40, 50]);
    });

    it("should never run more tasks at once than its concurrency", async () => {
      const executor = new BatchExecutor({ concurrency: 2 });
      let running = 0;
      let mostRunning = 0;
      const tasks = _.range(6).map(() => async () => {
        running++;
        mostRunning = Math.max(mostRunning, running);
        await sleep(5);
        running--;
      });

      await executor.invokeAll(tasks);

      expect(mostRunning).toBe(2);
      expect(executor.isIdle).toBe(true);
    });

    it("should resolve an empty batch without scheduling anything", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      expect(await executor.invokeAll([])).toEqual([]);
      expect(executor.activeCount).toBe(0);
      expect(executor.pendingCount).toBe(0);
    });

    it("should fail the whole batch with the first error and cancel the rest", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      let ranAfterFailure = false;
      const tasks: Array<() => void> = [
        () => {
          throw new Error("boom");
        },
        () => {
          ranAfterFailure = true;
        },
      ];

      const result = await settle(executor.invokeAll(tasks));

      expect(result).toHaveProperty("error");
      const error = "error" in result ? result.error : undefined;
      expect(error).toBeInstanceOf(BatchExecutionError);
      expect(error).toHaveProperty("message", "batch of 2 tasks failed: boom");
      expect(error).toHaveProperty("cause.message", "boom");

      await executor.shutdown();
      expect(ranAfterFailure).toBe(false);
    });

    it("should cancel the batch when the caller's signal aborts", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const controller = new AbortController();
      const started: number[] = [];
      const tasks = _.range(3).map((index) => async (signal: AbortSignal) => {
        started.push(index);
        await sleep(10_000, undefined, { signal });
      });

      const batch = settle(executor.invokeAll(tasks, { signal: controller.signal }));
      controller.abort(new Error("caller gave up"));
      const result = await batch;

      const error = "error" in result ? result.error : undefined;
      expect(error).toBeInstanceOf(BatchExecutionError);
      expect(error).toHaveProperty("cause.message", "caller gave up");
      expect(controller.signal.aborted).toBe(true);

      expect(await executor.shutdown()).toBe("terminated");
      expect(started).toEqual([]);
    });

    it("should refuse a batch whose signal has already aborted", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const controller = new AbortController();
      controller.abort(new Error("too late"));
      const task = vi.fn();

      await expect(executor.invokeAll([task], { signal: controller.signal })).rejects.toThrow(BatchExecutionError);
      expect(task).not.toHaveBeenCalled();
    });
  });

  describe("submit", () => {
    it("should hand each task an abort signal", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const signal = await executor.submit((signal) => signal);
      expect(signal.aborted).toBe(false);
    });

    it("should drop a queued task when its signal aborts", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const controller = new AbortController();
      const blocker = executor.submit(() => sleep(5));
      const queued = settle(executor.submit(() => "ran", { signal: controller.signal }));

      expect(executor.pendingCount).toBe(1);
      controller.abort();

      const result = await queued;
      expect("error" in result && result.error).toBeInstanceOf(CancellationError);
      expect(executor.pendingCount).toBe(0);
      await blocker;
    });

    it("should watch a shared signal with one listener however many tasks depend on it", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const controller = new AbortController();
      const results = _.range(20).map((index) => executor.submit(() => index, { signal: controller.signal }));

      expect(getEventListeners(controller.signal, "abort")).toHaveLength(1);
      expect(await Promise.all(results)).toEqual(_.range(20));
      expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
    });
  });

  describe("shutdown", () => {
    it("should let in flight work finish before terminating", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const first = executor.submit(async () => {
        await sleep(5);
        return "first";
      });
      const second = executor.submit(() => "second");

      expect(await executor.shutdown()).toBe("terminated");
      expect(await first).toBe("first");
      expect(await second).toBe("second");
      expect(executor.state).toBe("terminated");
    });

    it("should refuse new work once shutdown has begun", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const shutdown = executor.shutdown();

      expect(executor.state).toBe("shutting-down");
      await expect(executor.submit(() => 1)).rejects.toThrow(ExecutorRejectedError);
      await expect(executor.invokeAll([() => 1])).rejects.toThrow(ExecutorRejectedError);
      await shutdown;
    });

    it("should return the same shutdown when called more than once", async () => {
      const executor = new BatchExecutor({ concurrency: 1 });
      const first = executor.shutdown();
      expect(executor.shutdown()).toBe(first);
      expect(await first).toBe("terminated");
    });

    it("should cancel work that outlives the grace period", async () => {
      const executor = new BatchExecutor({ concurrency: 1, gracePeriodMs: 20, forceCancelPeriodMs: 1000 });
      const running = settle(executor.submit((signal) => sleep(10_000, undefined, { signal })));
      const queued = settle(executor.submit(() => "never"));

      expect(await executor.shutdown()).toBe("terminated");

      expect("error" in (await running)).toBe(true);
      const queuedResult = await queued;
      expect("error" in queuedResult && queuedResult.error).toBeInstanceOf(CancellationError);
      expect(console.warn).toHaveBeenCalledWith(expect.any(String), "2 tasks were forcefully stopped");
    });

    it("should end up failed when work ignores cancellation", async () => {
      const executor = new BatchExecutor({ concurrency: 1, gracePeriodMs: 5, forceCancelPeriodMs: 5 });
      const stubborn = executor.submit(() => sleep(100, "done"));

      expect(await executor.shutdown()).toBe("failed");
      expect(console.error).toHaveBeenCalledWith(expect.any(String), "executor failed to terminate completely, 1 tasks are still running");
      expect(await stubborn).toBe("done");
    });

    it("should cancel everything at once and rethrow when the waiting caller is interrupted", async () => {
      const executor = new BatchExecutor({ concurrency: 1, gracePeriodMs: 10_000 });
      const running = settle(executor.submit((signal) => sleep(10_000, undefined, { signal })));
      const controller = new AbortController();

      const shutdown = settle(executor.shutdown({ signal: controller.signal }));
      controller.abort(new Error("interrupted"));

      const result = await shutdown;
      expect("error" in result && result.error).toHaveProperty("message", "interrupted");
      expect("error" in (await running)).toBe(true);
      expect(await executor.shutdown()).toBe("terminated");
      expect(executor.state).toBe("terminated");
    });

    it("should settle into failed after an interrupted shutdown when work ignores cancellation", async () => {
      const executor = new BatchExecutor({ concurrency: 1, gracePeriodMs: 10_000, forceCancelPeriodMs: 5 });
      const stubborn = executor.submit(() => sleep(100, "done"));
      await sleep(5);
      const controller = new AbortController();

      const shutdown = settle(executor.shutdown({ signal: controller.signal }));
      controller.abort(new Error("interrupted"));

      const result = await shutdown;
      expect("error" in result && result.error).toHaveProperty("message", "interrupted");
      expect(await executor.shutdown()).toBe("failed");
      expect(executor.state).toBe("failed");
      expect(console.error).toHaveBeenCalledWith(expect.any(String), "executor failed to terminate completely, 1 tasks are still running");
      expect(await stubborn).toBe("done");
    });
  });
});

import { EventEmitter } from "events";
import os from "os";
import { setImmediate as yieldToEventLoop } from "timers/promises";
import { BatchExecutionError, CancellationError, ConfigurationError, ExecutorRejectedError } from "./errors.js";
import { errorMessage, log } from "./utils.js";

export type ExecutorState = "running" | "shutting-down" | "terminated" | "failed";

/** One unit of work. The signal aborts when the unit's batch is cancelled or the executor is forcibly shut down. */
export type Task<T> = (signal: AbortSignal) => T | Promise<T>;

export interface BatchExecutorOptions {
  /** how many units may run at once, fixed for the executor's lifetime */
  concurrency?: number;
  /** how long shutdown waits for queued and running work before cancelling it */
  gracePeriodMs?: number;
  /** how long shutdown waits for cancelled work to settle before giving up */
  forceCancelPeriodMs?: number;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

interface QueuedUnit {
  run: () => Promise<void>;
  abort: (reason: unknown) => void;
}

/** The units depending on one signal, and the single listener that aborts them all */
interface SignalWatch {
  units: Set<QueuedUnit>;
  onAbort: () => void;
}

export const defaultConcurrency = () => Math.max(1, os.availableParallelism());

/**
 * A fixed size pool that runs units of work, a batch at a time or one by one.
 * Units beyond the concurrency limit wait in a FIFO queue. Every unit yields to the event loop once before running, so cancellation can land between units.
 * Emits `idle` whenever the last running or queued unit settles.
 */
export class BatchExecutor extends EventEmitter {
  readonly concurrency: number;
  readonly gracePeriodMs: number;
  readonly forceCancelPeriodMs: number;
  state: ExecutorState = "running";
  activeCount = 0;
  queue: QueuedUnit[] = [];
  private controller = new AbortController();
  private shutdownPromise?: Promise<ExecutorState>;
  private watches = new Map<AbortSignal, SignalWatch>();

  constructor(options: BatchExecutorOptions = {}) {
    super();
    this.concurrency = options.concurrency ?? defaultConcurrency();
    this.gracePeriodMs = options.gracePeriodMs ?? 5000;
    this.forceCancelPeriodMs = options.forceCancelPeriodMs ?? 5000;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new ConfigurationError(`Expected executor concurrency to be an integer from 1 and up, got ${this.concurrency}`);
    }
    if (!(this.gracePeriodMs >= 0) || !(this.forceCancelPeriodMs >= 0)) {
      throw new ConfigurationError("Expected executor shutdown periods to be zero or more milliseconds");
    }
  }

  get pendingCount() {
    return this.queue.length;
  }

  get isIdle() {
    return this.activeCount == 0 && this.queue.length == 0;
  }

  /**
   * Schedule one unit of work. Resolves with the task's result, or rejects with a `CancellationError` if the unit is cancelled before it starts.
   */
  submit<T>(task: Task<T>, options: SubmitOptions = {}): Promise<T> {
    if (this.state !== "running") {
      return Promise.reject(new ExecutorRejectedError(`executor is ${this.state} and isn't accepting new work`));
    }

    const sources = options.signal ? [this.controller.signal, options.signal] : [this.controller.signal];
    const aborted = sources.find((source) => source.aborted);
    if (aborted) {
      return Promise.reject(new CancellationError("task was cancelled before it was scheduled", { cause: aborted.reason }));
    }

    return new Promise<T>((resolve, reject) => {
      const controller = new AbortController();
      const release = () => {
        for (const source of sources) this.unwatch(source, unit);
      };

      const unit: QueuedUnit = {
        run: async () => {
          this.activeCount++;
          try {
            await yieldToEventLoop();
            if (controller.signal.aborted) {
              throw new CancellationError("task was cancelled before it started", { cause: controller.signal.reason });
            }
            const outcome = new Promise<T>((settle) => settle(task(controller.signal)));
            await outcome;
            resolve(outcome);
          } catch (error) {
            reject(error);
          } finally {
            release();
            this.activeCount--;
            this.drain();
            this.emitIfIdle();
          }
        },
        abort: (reason) => {
          controller.abort(reason);

          // units that haven't started are dropped now; running ones see their signal abort and decide for themselves
          const index = this.queue.indexOf(unit);
          if (index >= 0) {
            this.queue.splice(index, 1);
            release();
            reject(new CancellationError("task was cancelled before it started", { cause: reason }));
            this.emitIfIdle();
          }
        },
      };

      for (const source of sources) this.watch(source, unit);
      this.queue.push(unit);
      this.drain();
    });
  }

  /**
   * Run every task and resolve with their results in task order once all have finished.
   * Any failure, or an abort of the caller's signal, cancels the rest of the batch and rejects with a single `BatchExecutionError`. There are no partial results.
   */
  async invokeAll<T>(tasks: Task<T>[], options: SubmitOptions = {}): Promise<T[]> {
    if (tasks.length == 0) return [];
    if (this.state !== "running") {
      throw new ExecutorRejectedError(`executor is ${this.state} and isn't accepting new work`);
    }
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw new BatchExecutionError("batch was cancelled before it started", { cause: callerSignal.reason });
    }

    const batch = new AbortController();
    const onCallerAbort = () => batch.abort(callerSignal?.reason);
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    const cancelled = new Promise<never>((_resolve, reject) => {
      batch.signal.addEventListener("abort", () => reject(batch.signal.reason), { once: true });
    });

    log.debug("running batch", { size: tasks.length, concurrency: this.concurrency });
    try {
      const submitted = tasks.map((task) => this.submit(task, { signal: batch.signal }));
      return await Promise.race([Promise.all(submitted), cancelled]);
    } catch (error) {
      if (!batch.signal.aborted) batch.abort(error);
      throw new BatchExecutionError(`batch of ${tasks.length} tasks failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * Stop taking work, then give running and queued work `gracePeriodMs` to finish. After that, cancel whatever is left and wait up to `forceCancelPeriodMs` for it to settle.
   * Resolves with the final state, `failed` if the pool never went quiet.
   * If the caller's signal aborts while waiting, everything is cancelled at once and the abort reason is rethrown.
   * Calling shutdown again after that resolves with the state the pool settles into within `forceCancelPeriodMs`.
   */
  shutdown(options: SubmitOptions = {}): Promise<ExecutorState> {
    this.shutdownPromise ??= this.performShutdown(options.signal);
    return this.shutdownPromise;
  }

  private async performShutdown(signal?: AbortSignal): Promise<ExecutorState> {
    log.debug("executor shutdown initiated", { active: this.activeCount, pending: this.pendingCount });
    this.state = "shutting-down";

    try {
      if (await this.waitForIdle(this.gracePeriodMs, signal)) return this.settle(true);

      log.warn(`executor did not finish within ${this.gracePeriodMs}ms, forcing cancellation`);
      const stopped = this.forceCancel();
      log.warn(`${stopped} tasks were forcefully stopped`);
      return this.settle(await this.waitForIdle(this.forceCancelPeriodMs, signal));
    } catch (error) {
      log.warn("executor shutdown was interrupted, forcing immediate cancellation");
      this.forceCancel();
      // later shutdown calls see the outcome of the forced stop rather than the interruption
      this.shutdownPromise = this.waitForIdle(this.forceCancelPeriodMs).then((idle) => this.settle(idle));
      throw error;
    }
  }

  private settle(idle: boolean): ExecutorState {
    if (idle) {
      this.state = "terminated";
      log.debug("executor shut down");
    } else {
      log.error(`executor failed to terminate completely, ${this.activeCount} tasks are still running`);
      this.state = "failed";
    }
    return this.state;
  }

  private forceCancel() {
    const stopped = this.activeCount + this.queue.length;
    this.controller.abort(new CancellationError("executor was shut down"));
    return stopped;
  }

  /** Units share one abort listener per signal, however many of them depend on it */
  private watch(signal: AbortSignal, unit: QueuedUnit) {
    let watch = this.watches.get(signal);
    if (!watch) {
      const units = new Set<QueuedUnit>();
      const onAbort = () => {
        this.watches.delete(signal);
        for (const unit of units) unit.abort(signal.reason);
      };
      watch = { units, onAbort };
      this.watches.set(signal, watch);
      signal.addEventListener("abort", onAbort, { once: true });
    }
    watch.units.add(unit);
  }

  private unwatch(signal: AbortSignal, unit: QueuedUnit) {
    const watch = this.watches.get(signal);
    if (!watch) return;
    watch.units.delete(unit);
    if (watch.units.size == 0) {
      this.watches.delete(signal);
      signal.removeEventListener("abort", watch.onAbort);
    }
  }

  private drain() {
    while (this.activeCount < this.concurrency && this.queue.length > 0) {
      const unit = this.queue.shift();
      if (unit) void unit.run();
    }
  }

  private emitIfIdle() {
    if (this.isIdle) this.emit("idle");
  }

  /** Resolves true once idle, false if `ms` passes first, and rejects with the signal's reason if it aborts first */
  private waitForIdle(ms: number, signal?: AbortSignal) {
    return new Promise<boolean>((resolve, reject) => {
      if (signal?.aborted) return reject(signal.reason);
      if (this.isIdle) return resolve(true);

      const finish = () => {
        clearTimeout(timer);
        this.off("idle", onIdle);
        signal?.removeEventListener("abort", onAbort);
      };
      const onIdle = () => {
        finish();
        resolve(true);
      };
      const onAbort = () => {
        finish();
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        finish();
        resolve(false);
      }, ms);

      this.on("idle", onIdle);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}

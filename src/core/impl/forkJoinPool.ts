import os from "node:os";

import type { Task, TaskHandle, TaskScheduler, WorkerContext } from "../pool.js";
import type { WorkerId } from "../types.js";

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

type TaskState = "queued" | "running" | "done";

interface QueuedTask {
  readonly state: TaskState;
  run(ctx: WorkerContext): Promise<void>;
}

class ForkedTask<T> implements TaskHandle<T>, QueuedTask {
  state: TaskState = "queued";
  private outcome: Outcome<T> | undefined;
  private readonly waiters: Array<(outcome: Outcome<T>) => void> = [];

  constructor(private readonly task: Task<T>) {}

  /** Never rejects: a failure is stored and re-thrown by `join`. */
  async run(ctx: WorkerContext): Promise<void> {
    this.state = "running";
    let outcome: Outcome<T>;
    try {
      outcome = { ok: true, value: await this.task(ctx) };
    } catch (error) {
      outcome = { ok: false, error };
    }
    this.outcome = outcome;
    this.state = "done";
    for (const resolve of this.waiters.splice(0)) resolve(outcome);
  }

  async join(ctx?: WorkerContext): Promise<T> {
    // helping join: run a task nobody has picked up yet on the joiner's slot
    if (ctx && this.state === "queued") {
      await this.run(ctx);
    }
    const outcome = this.outcome ?? (await new Promise<Outcome<T>>((resolve) => this.waiters.push(resolve)));
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }
}

export interface ForkJoinPoolOptions {
  /** Worker slots; defaults to the number of available cores. */
  parallelism?: number;
}

/**
 * Fork-join pool on the event loop.
 *
 * Every task runs on the calling thread. Worker slots bound how many forked
 * tasks are in flight; those tasks interleave at `await` points and never
 * run CPU work in parallel.
 *
 * Forked tasks queue FIFO and are started on the next macrotask, one per free
 * worker slot. A slot is held until the task settles. A join on a task that is
 * still queued runs it inline, so nested fork/join completes even with a
 * single slot.
 */
export class ForkJoinPool implements TaskScheduler {
  readonly parallelism: number;
  private readonly queue: QueuedTask[] = [];
  private readonly freeWorkers: WorkerId[];
  private drainScheduled = false;

  constructor(options: ForkJoinPoolOptions = {}) {
    const parallelism = options.parallelism ?? os.availableParallelism();
    if (!Number.isInteger(parallelism) || parallelism < 1) {
      throw new RangeError(`parallelism must be a positive integer, got ${parallelism}`);
    }
    this.parallelism = parallelism;
    // popped from the end, so worker 0 is handed out first
    this.freeWorkers = Array.from({ length: parallelism }, (_, i) => parallelism - 1 - i);
  }

  fork<T>(task: Task<T>): TaskHandle<T> {
    const forked = new ForkedTask(task);
    this.queue.push(forked);
    this.scheduleDrain();
    return forked;
  }

  invoke<T>(task: Task<T>): Promise<T> {
    return this.fork(task).join();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this.drain();
    });
  }

  private drain(): void {
    while (this.queue.length > 0) {
      const workerId = this.freeWorkers.pop();
      if (workerId === undefined) return;

      let next = this.queue.shift();
      // skip tasks already run inline by a join
      while (next && next.state !== "queued") next = this.queue.shift();
      if (!next) {
        this.freeWorkers.push(workerId);
        return;
      }

      void next.run({ workerId, scheduler: this }).then(() => {
        this.freeWorkers.push(workerId);
        if (this.queue.length > 0) this.scheduleDrain();
      });
    }
  }
}

let sharedPool: ForkJoinPool | undefined;

/** Process-wide pool used when a search is not given a scheduler. */
export function commonPool(): ForkJoinPool {
  sharedPool ??= new ForkJoinPool();
  return sharedPool;
}

import type { WorkerId } from "./types.js";

/** Passed to every running task; forks and joins go through it. */
export interface WorkerContext {
  readonly workerId: WorkerId;
  readonly scheduler: TaskScheduler;
}

export type Task<T> = (ctx: WorkerContext) => Promise<T>;

export interface TaskHandle<T> {
  /**
   * Waits for the task's result, re-throwing its failure.
   * Called from inside the pool (with `ctx`), a task that has not started
   * yet runs inline in the joiner's flow.
   */
  join(ctx?: WorkerContext): Promise<T>;
}

/**
 * Fork-join scheduler.
 *
 * Contract notes:
 * - `fork` never blocks and never runs the task synchronously
 * - at most `parallelism` forked tasks hold a worker slot at once
 * - joining must not deadlock, whatever the nesting depth
 */
export interface TaskScheduler {
  readonly parallelism: number;
  fork<T>(task: Task<T>): TaskHandle<T>;
  /** Submits a task from outside the pool and waits for it. */
  invoke<T>(task: Task<T>): Promise<T>;
}

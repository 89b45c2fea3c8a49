/**
 * Bounded Worker Pool
 *
 * Runs an async handler over a task list with a fixed number of tasks in
 * flight and yields each settled task in completion order. Scene work is
 * filesystem I/O plus download subprocesses, so concurrency lives in the
 * event loop and the child processes rather than in worker threads.
 *
 * Cancellation is cooperative: the token is read before every
 * submission. Once it reads true nothing new starts, tasks already
 * running drain, and the tasks never started are counted as cancelled.
 *
 * @module services/worker-pool
 */

import { availableParallelism } from 'node:os';

// ============================================================================
// Types
// ============================================================================

/**
 * Read-only view of a shutdown request
 */
export interface CancellationToken {
  readonly cancelled: boolean;
}

/**
 * Token that never cancels
 */
export const NEVER_CANCELLED: CancellationToken = Object.freeze({ cancelled: false });

/**
 * One settled task, shaped like a PromiseSettledResult
 */
export type PoolCompletion<TTask, TResult> =
  | { readonly task: TTask; readonly status: 'fulfilled'; readonly value: TResult }
  | { readonly task: TTask; readonly status: 'rejected'; readonly reason: Error };

export interface WorkerPoolOptions {
  /** Tasks in flight at once; 1 runs tasks strictly in order */
  readonly workers: number;
  readonly token?: CancellationToken;
}

export interface WorkerPoolStats {
  readonly submitted: number;
  readonly completed: number;
  readonly cancelled: number;
}

/**
 * Worker count for a requested value: all cores by default, never more
 */
export function resolveWorkerCount(requested?: number, cores: number = availableParallelism()): number {
  if (requested === undefined || !Number.isFinite(requested) || requested < 1) {
    return Math.max(1, cores);
  }
  return Math.max(1, Math.min(Math.floor(requested), cores));
}

// ============================================================================
// Pool
// ============================================================================

/**
 * @example
 * ```typescript
 * const pool = new WorkerPool((task: TaskSpec) => executor.execute(task), {
 *   workers: 8,
 *   token: shutdown,
 * });
 *
 * for await (const completion of pool.run(tasks)) {
 *   if (completion.status === 'fulfilled') tracker.record(completion.value);
 * }
 * ```
 */
export class WorkerPool<TTask, TResult> {
  private readonly workers: number;
  private readonly token: CancellationToken;
  private submitted = 0;
  private completed = 0;
  private cancelled = 0;

  constructor(
    private readonly handler: (task: TTask) => Promise<TResult>,
    options: WorkerPoolOptions
  ) {
    this.workers = Math.max(1, Math.floor(options.workers));
    this.token = options.token ?? NEVER_CANCELLED;
  }

  stats(): WorkerPoolStats {
    return {
      submitted: this.submitted,
      completed: this.completed,
      cancelled: this.cancelled,
    };
  }

  /**
   * Run every task, yielding each as it settles
   */
  async *run(tasks: readonly TTask[]): AsyncGenerator<PoolCompletion<TTask, TResult>, void, undefined> {
    const settled: PoolCompletion<TTask, TResult>[] = [];
    let wake: (() => void) | null = null;
    let next = 0;
    let active = 0;

    const settle = (completion: PoolCompletion<TTask, TResult>): void => {
      active--;
      settled.push(completion);
      launch();
      const resume = wake;
      wake = null;
      resume?.();
    };

    const launch = (): void => {
      while (active < this.workers && next < tasks.length && !this.token.cancelled) {
        const task = tasks[next];
        next++;
        active++;
        this.submitted++;

        let pending: Promise<TResult>;
        try {
          pending = this.handler(task);
        } catch (error) {
          pending = Promise.reject(error);
        }
        pending.then(
          (value) => settle({ task, status: 'fulfilled', value }),
          (error: unknown) =>
            settle({
              task,
              status: 'rejected',
              reason: error instanceof Error ? error : new Error(String(error)),
            })
        );
      }
    };

    launch();

    while (active > 0 || settled.length > 0) {
      const completion = settled.shift();
      if (completion === undefined) {
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
        continue;
      }
      this.completed++;
      yield completion;
    }

    this.cancelled += tasks.length - next;
  }
}

/**
 * Bulkhead Isolation Pattern
 *
 * Caps the number of concurrent executions of one kind of work and queues
 * the overflow. A scene task runs its asset downloads through a bulkhead,
 * so one scene never has more than a handful of download processes alive
 * no matter how many assets it requests.
 */

/**
 * Bulkhead configuration
 */
export interface BulkheadConfig {
  readonly name: string;
  readonly maxConcurrent: number;
}

/**
 * Bulkhead Isolator
 *
 * The queue is unbounded: every caller eventually runs, in arrival order.
 *
 * @example
 * ```typescript
 * const bulkhead = new Bulkhead({ name: 'scene-41069025-assets', maxConcurrent: 4 });
 *
 * const ok = await bulkhead.execute(() => downloader.downloadAsset(request));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  private readonly queue: Array<() => void> = [];

  constructor(config: BulkheadConfig) {
    if (config.maxConcurrent < 1) {
      throw new RangeError(`Bulkhead '${config.name}' needs maxConcurrent >= 1`);
    }
    this.config = config;
  }

  get name(): string {
    return this.config.name;
  }

  /** Executions currently in flight */
  get active(): number {
    return this.activeCount;
  }

  /** Executions waiting for a slot */
  get queued(): number {
    return this.queue.length;
  }

  /**
   * Execute function with bulkhead protection
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      return this.executeImmediate(fn);
    }
    return this.enqueue(fn);
  }

  /**
   * Execute immediately (slot available)
   */
  private async executeImmediate<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;
    try {
      return await fn();
    } finally {
      this.activeCount--;
      this.processNextQueued();
    }
  }

  /**
   * Enqueue request for later execution
   */
  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.executeImmediate(fn).then(resolve, reject);
      });
    });
  }

  /**
   * Process next queued request
   */
  private processNextQueued(): void {
    if (this.activeCount >= this.config.maxConcurrent) {
      return;
    }
    this.queue.shift()?.();
  }
}

/**
 * Bulkhead sized for a known batch of work
 */
export function createBatchBulkhead(
  name: string,
  batchSize: number,
  maxConcurrent: number
): Bulkhead {
  return new Bulkhead({
    name,
    maxConcurrent: Math.max(1, Math.min(batchSize, maxConcurrent)),
  });
}

import type { Logger } from "../shared/logger";

export interface DispatcherOptions<T> {
  /** Number of sequential workers. Items with the same key always share one. */
  partitions: number;
  /** Queue bound per partition; `submit` waits while the partition is full. */
  capacity: number;
  partitionKey: (item: T) => number;
  handler: (item: T) => void | Promise<void>;
  logger?: Logger;
}

interface Partition<T> {
  index: number;
  queue: T[];
  active: boolean;
  done: Promise<void>;
  spaceWaiters: Array<() => void>;
  processed: number;
}

/**
 * Bounded many-producer queue in front of one sequential worker per
 * partition. Items are handled in submission order within a partition;
 * partitions interleave freely.
 *
 * A handler that throws stops every worker. Pending and later `submit`
 * calls, and `drain`, reject with that error.
 */
export class PartitionedDispatcher<T> {
  private readonly partitions: Partition<T>[];
  private readonly capacity: number;
  private readonly partitionKey: (item: T) => number;
  private readonly handler: (item: T) => void | Promise<void>;
  private readonly logger?: Logger;
  private failure: { error: unknown } | null = null;

  constructor(options: DispatcherOptions<T>) {
    if (!Number.isInteger(options.partitions) || options.partitions < 1) {
      throw new Error(`partitions must be a positive integer, got ${options.partitions}`);
    }
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error(`capacity must be a positive integer, got ${options.capacity}`);
    }

    this.capacity = options.capacity;
    this.partitionKey = options.partitionKey;
    this.handler = options.handler;
    this.logger = options.logger;
    this.partitions = Array.from({ length: options.partitions }, (_, index) => ({
      index,
      queue: [],
      active: false,
      done: Promise.resolve(),
      spaceWaiters: [],
      processed: 0,
    }));
  }

  partitionOf(item: T): number {
    const key = this.partitionKey(item);
    const count = this.partitions.length;
    return ((key % count) + count) % count;
  }

  /** Queue an item. Resolves once it is enqueued, not once it is handled. */
  async submit(item: T): Promise<void> {
    const partition = this.partitions[this.partitionOf(item)];
    if (!partition) throw new Error("Partition index out of range");

    while (partition.queue.length >= this.capacity && !this.failure) {
      await new Promise<void>((resolve) => partition.spaceWaiters.push(resolve));
    }
    if (this.failure) throw this.failure.error;

    partition.queue.push(item);
    this.ensureWorker(partition);
  }

  /** Wait until every queue is empty and every worker idle. */
  async drain(): Promise<void> {
    while (this.partitions.some((p) => p.active)) {
      await Promise.all(this.partitions.map((p) => p.done));
    }
    if (this.failure) throw this.failure.error;
  }

  get pending(): number {
    return this.partitions.reduce((sum, p) => sum + p.queue.length, 0);
  }

  /** Items handled so far, per partition. */
  stats(): number[] {
    return this.partitions.map((p) => p.processed);
  }

  private ensureWorker(partition: Partition<T>): void {
    if (partition.active) return;
    partition.active = true;
    partition.done = this.run(partition).then(
      () => {
        partition.active = false;
        // Items pushed after the loop saw an empty queue but before this callback.
        if (partition.queue.length > 0 && !this.failure) this.ensureWorker(partition);
      },
      (error: unknown) => {
        partition.active = false;
        this.fail(partition, error);
      },
    );
  }

  private async run(partition: Partition<T>): Promise<void> {
    while (partition.queue.length > 0 && !this.failure) {
      const item = partition.queue.shift();
      partition.spaceWaiters.shift()?.();
      if (item === undefined) continue;
      await this.handler(item);
      partition.processed++;
    }
  }

  private fail(partition: Partition<T>, error: unknown): void {
    if (!this.failure) {
      this.failure = { error };
      this.logger?.error(
        {
          partition: partition.index,
          error: error instanceof Error ? error.message : String(error),
        },
        "Partition worker failed",
      );
    }
    for (const p of this.partitions) {
      for (const wake of p.spaceWaiters.splice(0)) wake();
    }
  }
}

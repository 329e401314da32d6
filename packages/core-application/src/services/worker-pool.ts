import type { Logger } from "../ports/logger";
import { describeError } from "../application/errors";
import { WorkQueue } from "./work-queue";

export const DEFAULT_WORKER_COUNT = 4;

export type WorkerPoolOptions = {
  workerCount?: number;
  /** Bound on queued items; defaults to the number of items */
  queueCapacity?: number;
  logger?: Logger;
};

export type WorkerTask<T> = (item: T, workerId: number) => Promise<void>;

/**
 * Drains `items` through `workerCount` concurrent workers sharing one FIFO
 * queue. Resolves after every worker has exited. A rejected task is logged
 * and the worker moves on to the next item.
 */
export async function runWorkerPool<T>(
  items: Iterable<T>,
  options: WorkerPoolOptions,
  task: WorkerTask<T>
): Promise<void> {
  const workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new RangeError(`Worker count must be a positive integer, got ${workerCount}`);
  }

  const all = [...items];
  const queue = new WorkQueue<T>(options.queueCapacity ?? Math.max(all.length, 1));

  const worker = async (workerId: number) => {
    for (let item = await queue.take(); item !== undefined; item = await queue.take()) {
      try {
        await task(item, workerId);
      } catch (err) {
        options.logger?.warn(`Worker ${workerId} failed on ${String(item)}: ${describeError(err)}`);
      }
    }
  };

  const workers = Array.from({ length: workerCount }, (_, i) => worker(i + 1));

  try {
    for (const item of all) await queue.push(item);
  } finally {
    queue.close();
  }

  await Promise.all(workers);
}

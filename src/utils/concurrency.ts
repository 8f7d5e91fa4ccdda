import { CONCURRENCY } from '../config/constants.js';

type ProgressCallback = (completed: number, total: number) => void;

interface ConcurrencyExecutionOptions {
  /** Invoked after each task settles */
  readonly onProgress?: ProgressCallback;
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return 1;
  return Math.min(Math.max(1, Math.floor(limit)), CONCURRENCY.MAX);
}

async function settle<T>(task: () => Promise<T>): Promise<PromiseSettledResult<T>> {
  try {
    return { status: 'fulfilled', value: await task() };
  } catch (reason: unknown) {
    return { status: 'rejected', reason };
  }
}

/**
 * Runs `tasks` on a pool of at most `limit` (1-10) workers. Workers take the
 * next task in list order, so a limit of 1 runs them strictly one after
 * another. Results come back in task order.
 */
export async function runWithConcurrency<T>(
  limit: number,
  tasks: readonly (() => Promise<T>)[],
  options?: ConcurrencyExecutionOptions
): Promise<PromiseSettledResult<T>[]> {
  const total = tasks.length;
  const results: PromiseSettledResult<T>[] = [];
  let nextIndex = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < total) {
      const index = nextIndex++;
      const task = tasks[index];
      if (!task) continue;

      results[index] = await settle(task);
      completed++;
      options?.onProgress?.(completed, total);
    }
  };

  const workerCount = Math.min(clampLimit(limit), total);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}

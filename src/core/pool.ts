import { settle, type Outcome } from "./outcome.js";

export interface PoolOptions {
  concurrency: number;
  onSettled?: (completed: number, total: number) => void;
}

/**
 * Process items in parallel with bounded concurrency.
 * Workers pick up the next item as soon as they're free (work-stealing pattern).
 * Every task runs exactly once and is captured as an Outcome, so one failure
 * never stops the others. Outcomes preserve input order; `onSettled` fires in
 * completion order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => R | Promise<R>,
  options: PoolOptions,
): Promise<Outcome<R>[]> {
  const outcomes: Outcome<R>[] = new Array(items.length);
  let index = 0;
  let completed = 0;

  async function worker() {
    while (index < items.length) {
      const i = index++;
      outcomes[i] = await settle(() => fn(items[i], i));
      completed++;
      options.onSettled?.(completed, items.length);
    }
  }

  const workerCount = Math.min(Math.max(options.concurrency, 1), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return outcomes;
}

/**
 * Bounded-concurrency execution of async operations.
 *
 * Dependency direction: parallel.ts → core/errors (leaf-ish module)
 * Used by: workflow task-queue
 */

import { ValidationError } from '../core/errors.js';

/** Outcome of one operation, at its input index. */
export type ParallelResult<T> =
  | { readonly index: number; readonly success: true; readonly value: T }
  | { readonly index: number; readonly success: false; readonly error: Error };

/** Options for parallel execution. */
export interface ParallelOptions {
  /** Maximum number of concurrent operations (default: unlimited). */
  concurrency?: number;
}

/**
 * Execute an array of operations concurrently. Every operation runs to
 * completion; a failure is recorded in its result instead of stopping the rest.
 *
 * @returns Array of results with the same order as input
 */
export async function parallel<T>(
  operations: ReadonlyArray<() => Promise<T>>,
  options: ParallelOptions = {},
): Promise<ParallelResult<T>[]> {
  const { concurrency = Infinity } = options;
  if (!(concurrency >= 1)) {
    throw new ValidationError(`Concurrency must be at least 1, got ${concurrency}`);
  }

  const results: ParallelResult<T>[] = [];
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < operations.length) {
      const index = nextIndex++;
      const operation = operations[index];
      if (!operation) continue;
      try {
        results[index] = { index, success: true, value: await operation() };
      } catch (error) {
        results[index] = { index, success: false, error: error instanceof Error ? error : new Error(String(error)) };
      }
    }
  };

  const workers = Math.min(concurrency, operations.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));

  return results;
}

/**
 * Parallel map with concurrency control. Results keep the input order.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {},
): Promise<ParallelResult<R>[]> {
  return parallel(
    items.map((item, index) => () => mapper(item, index)),
    options,
  );
}

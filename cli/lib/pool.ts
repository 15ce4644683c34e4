/**
 * Bounded concurrency over a list of operations.
 *
 * @module
 */

import { spawn, type Operation, type Task } from "effection";

/**
 * Apply `fn` to every item with at most `limit` operations in flight.
 * Results are returned in input order. If any operation throws, the
 * remaining workers are halted and the error propagates.
 */
export function* mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Operation<R>,
): Operation<R[]> {
  const results = new Map<number, { value: R }>();
  let next = 0;

  function* worker(): Operation<void> {
    while (next < items.length) {
      const index = next++;
      results.set(index, { value: yield* fn(items[index], index) });
    }
  }

  const workers: Task<void>[] = [];
  const size = Math.max(1, Math.min(limit, items.length));
  for (let i = 0; i < size; i++) {
    workers.push(yield* spawn(worker));
  }
  for (const task of workers) {
    yield* task;
  }

  return items.map((_, index) => {
    const slot = results.get(index);
    if (!slot) {
      throw new Error(`No result for item ${index}`);
    }
    return slot.value;
  });
}

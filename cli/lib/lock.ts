/**
 * Exclusive lock for serializing work against one environment.
 *
 * Waiters are served in arrival order. A waiter that is halted while
 * queued is removed; one halted right after being handed the lock
 * passes it on.
 *
 * @module
 */

import { call, type Operation } from "effection";

export interface Lock {
  /** Run `op` while holding the lock */
  withLock<T>(op: () => Operation<T>): Operation<T>;
  /** True while some operation holds the lock */
  readonly locked: boolean;
}

export function createLock(): Lock {
  let held = false;
  const waiters: Array<() => void> = [];

  function release(): void {
    const next = waiters.shift();
    if (next) {
      next();
    } else {
      held = false;
    }
  }

  function* acquire(): Operation<void> {
    if (!held) {
      held = true;
      return;
    }

    let granted = false;
    let acquired = false;
    let waiter: (() => void) | undefined;
    try {
      yield* call(
        () =>
          new Promise<void>((resolve) => {
            waiter = () => {
              granted = true;
              resolve();
            };
            waiters.push(waiter);
          }),
      );
      acquired = true;
    } finally {
      if (!acquired) {
        if (granted) {
          release();
        } else {
          const index = waiters.findIndex((w) => w === waiter);
          if (index >= 0) waiters.splice(index, 1);
        }
      }
    }
  }

  return {
    get locked() {
      return held;
    },
    *withLock<T>(op: () => Operation<T>): Operation<T> {
      yield* acquire();
      try {
        return yield* op();
      } finally {
        release();
      }
    },
  };
}

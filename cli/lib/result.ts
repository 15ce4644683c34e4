/**
 * Outcomes of steps that may fail without stopping the experiment.
 *
 * Provisioning an environment and installing a coverage tool into it are
 * attempted per environment key or cell id. A failure is kept with that
 * key, so the runs depending on it are recorded as failed and reported
 * at the end while the other environments carry on.
 *
 * @module
 */

import type { Operation } from "effection";

/**
 * A step that failed, labelled with the environment key or cell id it
 * was attempted for.
 */
export interface Failure {
  context: string;
  error: Error;
}

export type Result<T> = { ok: true; value: T } | ({ ok: false } & Failure);

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `op`, turning a thrown error into a failure labelled with `context`.
 */
export function* attempt<T>(context: string, op: Operation<T>): Operation<Result<T>> {
  try {
    return { ok: true, value: yield* op };
  } catch (error: unknown) {
    return { ok: false, context, error: toError(error) };
  }
}

/**
 * The failures among `results`, in order.
 */
export function failuresOf<T>(results: Iterable<Result<T>>): Failure[] {
  const found: Failure[] = [];
  for (const result of results) {
    if (!result.ok) {
      found.push({ context: result.context, error: result.error });
    }
  }
  return found;
}

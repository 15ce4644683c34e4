/**
 * Interpreter specs.
 *
 * @module
 */

import type { InterpreterConfig } from "./schema.js";
import type { InterpreterSpec } from "./types.js";

/**
 * A Python found on PATH by its versioned name, e.g. `python3.12`.
 */
export function python(major: number, minor: number): InterpreterSpec {
  return Object.freeze({
    slug: `${major}.${minor}`,
    executable: `python${major}.${minor}`,
    description: `Python ${major}.${minor}`,
  });
}

/**
 * A Python built into an install prefix, e.g. a local CPython checkout
 * installed at `/usr/local/cpython/v3.13.0`.
 */
export function adHocPython(prefix: string, slug: string): InterpreterSpec {
  return Object.freeze({
    slug,
    executable: `${prefix.replace(/\/+$/, "")}/bin/python3`,
    description: `Python at ${prefix}`,
  });
}

/**
 * Build an interpreter spec from its experiment-file form.
 */
export function interpreterFromConfig(config: InterpreterConfig): InterpreterSpec {
  if ("python" in config) {
    const [major, minor] = config.python.split(".").map((p) => parseInt(p, 10));
    return python(major, minor);
  }
  return adHocPython(config.prefix, config.slug);
}

/**
 * Range Driver
 *
 * `parallelFor` / `parallelReduce` make one decision per call: an
 * indivisible range is looped in place; a divisible one is handed to the
 * backend, which bottoms out in the same sequential loop on every sub-range.
 * Element shapes are therefore handled identically on both paths.
 *
 * Operators run concurrently only as far as the backend interleaves
 * sub-ranges; a stateful operator must tolerate that on the delegated path.
 * Nothing is caught here: an operator's throw aborts the call unchanged.
 */

import {
  globalDispatchTracer,
  type DispatchOperation,
  type DispatchTracer,
} from "@splitrange/core";
import { invoke } from "./dispatch.js";
import type { Monoid } from "./monoid.js";
import type { Backend, DispatchContext, DivisibleRange, ExecutionMode, Outcome } from "./types.js";

// ============================================================================
// Sequential path
// ============================================================================

/** Apply `op` to every element of `range` in traversal order. */
export function forEachSequential<E, A extends unknown[]>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => unknown
): void {
  for (const i = range.begin(), e = range.end(); !i.equals(e); i.next()) {
    invoke(range.shape, op, i.deref());
  }
}

/**
 * Fold `range` from `init`: `acc = reduce(acc, op(element))`.
 *
 * @returns The result of `reduce(op(i), ...)` for all `i` in `range`.
 */
export function reduceSequential<E, A extends unknown[], T>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => T,
  reduce: (a: T, b: T) => T,
  init: T
): T {
  let acc = init;
  for (const i = range.begin(), e = range.end(); !i.equals(e); i.next()) {
    acc = reduce(acc, invoke(range.shape, op, i.deref()));
  }
  return acc;
}

// ============================================================================
// Driver
// ============================================================================

export interface Driver<M extends ExecutionMode> {
  readonly backend: Backend<M>;

  parallelFor<E, A extends unknown[]>(
    range: DivisibleRange<E, A>,
    op: (...args: A) => unknown
  ): Outcome<M, void>;

  /**
   * `reduce` must be associative and `init` its identity; the backend may
   * seed every sub-range with `init`.
   */
  parallelReduce<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    op: (...args: A) => T,
    reduce: (a: T, b: T) => T,
    init: T
  ): Outcome<M, T>;

  parallelFold<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    op: (...args: A) => T,
    monoid: Monoid<T>
  ): Outcome<M, T>;
}

export interface DriverOptions {
  tracer?: DispatchTracer;
}

export function createDriver<M extends ExecutionMode>(
  backend: Backend<M>,
  options: DriverOptions = {}
): Driver<M> {
  const tracer = options.tracer ?? globalDispatchTracer;

  function decide<E, A extends unknown[]>(
    range: DivisibleRange<E, A>,
    operation: DispatchOperation
  ): DispatchContext | undefined {
    const divisible = range.isDivisible();
    tracer.record(divisible ? "delegated" : "sequential", {
      operation,
      backend: backend.name,
      size: range.size(),
      depth: 0,
    });
    return divisible ? { operation, tracer } : undefined;
  }

  function parallelReduce<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    op: (...args: A) => T,
    reduce: (a: T, b: T) => T,
    init: T
  ): Outcome<M, T> {
    const ctx = decide(range, "reduce");
    if (ctx === undefined) {
      return backend.run(() => reduceSequential(range, op, reduce, init));
    }
    return backend.reduce(
      range,
      init,
      (sub, partial) => reduceSequential(sub, op, reduce, partial),
      reduce,
      ctx
    );
  }

  return {
    backend,

    parallelFor(range, op) {
      const ctx = decide(range, "for");
      if (ctx === undefined) {
        return backend.run(() => forEachSequential(range, op));
      }
      return backend.forEach(range, (sub) => forEachSequential(sub, op), ctx);
    },

    parallelReduce,

    parallelFold(range, op, monoid) {
      return parallelReduce(range, op, (a, b) => monoid.combine(a, b), monoid.empty());
    },
  };
}

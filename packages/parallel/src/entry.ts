/**
 * Module-level entry points backed by configuration.
 *
 * The backends are chosen from `resolveParallelConfig()` the first time an
 * entry point runs and reused afterwards; `resetDrivers()` forgets them so
 * the next call re-reads configuration.
 */

import { resolveParallelConfig } from "@splitrange/core";
import { asyncBackendFor, syncBackendFor } from "./backends/index.js";
import { createDriver, type Driver } from "./driver.js";
import type { Monoid } from "./monoid.js";
import type { DivisibleRange } from "./types.js";

let syncDriver: Driver<"sync"> | undefined;
let asyncDriver: Driver<"async"> | undefined;

/** The blocking driver selected by configuration. */
export function defaultDriver(): Driver<"sync"> {
  if (syncDriver === undefined) {
    const cfg = resolveParallelConfig();
    syncDriver = createDriver(syncBackendFor(cfg.backend, cfg));
  }
  return syncDriver;
}

/** The promise-returning driver selected by configuration. */
export function defaultAsyncDriver(): Driver<"async"> {
  if (asyncDriver === undefined) {
    const cfg = resolveParallelConfig();
    asyncDriver = createDriver(asyncBackendFor(cfg.asyncBackend, cfg));
  }
  return asyncDriver;
}

export function resetDrivers(): void {
  syncDriver = undefined;
  asyncDriver = undefined;
}

export function parallelFor<E, A extends unknown[]>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => unknown
): void {
  defaultDriver().parallelFor(range, op);
}

export function parallelReduce<E, A extends unknown[], T>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => T,
  reduce: (a: T, b: T) => T,
  init: T
): T {
  return defaultDriver().parallelReduce(range, op, reduce, init);
}

export function parallelFold<E, A extends unknown[], T>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => T,
  monoid: Monoid<T>
): T {
  return defaultDriver().parallelFold(range, op, monoid);
}

export function parallelForAsync<E, A extends unknown[]>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => unknown
): Promise<void> {
  return defaultAsyncDriver().parallelFor(range, op);
}

export function parallelReduceAsync<E, A extends unknown[], T>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => T,
  reduce: (a: T, b: T) => T,
  init: T
): Promise<T> {
  return defaultAsyncDriver().parallelReduce(range, op, reduce, init);
}

export function parallelFoldAsync<E, A extends unknown[], T>(
  range: DivisibleRange<E, A>,
  op: (...args: A) => T,
  monoid: Monoid<T>
): Promise<T> {
  return defaultAsyncDriver().parallelFold(range, op, monoid);
}

import { setImmediate as nextTurn } from "node:timers/promises";

/** Run `thunk` now, delivering its result or its throw through a promise. */
export function defer<T>(thunk: () => T): Promise<T> {
  return new Promise<T>((resolve) => resolve(thunk()));
}

/** Let other queued work run before continuing. */
export function yieldToLoop(): Promise<void> {
  return nextTurn();
}

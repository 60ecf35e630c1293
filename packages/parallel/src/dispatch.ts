/**
 * Element Dispatcher
 *
 * Decides how one element is handed to a user operator. The decision is
 * carried by an `ElementShape` built once where the range is constructed,
 * so nothing inspects elements at run time:
 *
 *   scalar()            op(x)
 *   tuple()             op(...x)
 *   deref(inner)        dispatch on inner with x.deref()
 *
 * Shapes nest without limit: `deref(deref(tuple()))` dereferences exactly
 * twice and then spreads.
 *
 * @example
 * ```typescript
 * const pairs = tuple<[number, string]>();
 * invoke(pairs, (n, s) => `${n}${s}`, [1, "a"]); // "1a"
 * ```
 */

import type { Dereferenceable } from "./types.js";

export type ShapeKind = "scalar" | "tuple" | "deref";

/**
 * How an element of type E becomes operator arguments A.
 */
export interface ElementShape<E, A extends unknown[]> {
  readonly kind: ShapeKind;
  /** Dereferences performed before a scalar or tuple is reached. */
  readonly depth: number;
  invoke<R>(op: (...args: A) => R, elem: E): R;
}

/** Elements passed to the operator as they are. */
export function scalar<T>(): ElementShape<T, [T]> {
  return {
    kind: "scalar",
    depth: 0,
    invoke: (op, elem) => op(elem),
  };
}

/** Elements spread positionally into the operator. */
export function tuple<T extends unknown[]>(): ElementShape<T, T> {
  return {
    kind: "tuple",
    depth: 0,
    invoke: (op, elem) => op(...elem),
  };
}

/** Elements that are handles: dereference once, then dispatch on `inner`. */
export function deref<E, A extends unknown[]>(
  inner: ElementShape<E, A>
): ElementShape<Dereferenceable<E>, A> {
  return {
    kind: "deref",
    depth: inner.depth + 1,
    invoke: (op, handle) => inner.invoke(op, handle.deref()),
  };
}

/** Number of dereferences `shape` performs before unpacking. */
export function shapeDepth<E, A extends unknown[]>(shape: ElementShape<E, A>): number {
  return shape.depth;
}

/** Call `op` with `elem` unpacked according to `shape`. */
export function invoke<E, A extends unknown[], R>(
  shape: ElementShape<E, A>,
  op: (...args: A) => R,
  elem: E
): R {
  return shape.invoke(op, elem);
}

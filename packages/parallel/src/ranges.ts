/**
 * Divisible Ranges
 *
 * Every range here is a half-open window [lo, hi) over an index function,
 * split at its midpoint. A range is divisible while it holds more than
 * `grainSize` elements.
 *
 * Factories:
 * - blockedRange(begin, end)   indices, scalar elements
 * - arrayRange(items)          array slice, scalar elements
 * - tupleRange(items)          array slice, tuple elements spread into the operator
 * - zipRange(a, b)             pairs a[i], b[i]
 * - handleRange(items, inner)  array of handles, dereferenced before dispatch
 */

import { RangeBoundsError, SplitError } from "@splitrange/core";
import { deref, scalar, tuple, type ElementShape } from "./dispatch.js";
import type { Cursor, Dereferenceable, DivisibleRange } from "./types.js";

// ============================================================================
// IndexCursor
// ============================================================================

export class IndexCursor<E> implements Cursor<E> {
  constructor(
    private readonly at: (index: number) => E,
    private position: number
  ) {}

  get index(): number {
    return this.position;
  }

  deref(): E {
    return this.at(this.position);
  }

  /** Equal when both walk the same element accessor and sit at the same index. */
  equals(other: Cursor<E>): boolean {
    return other instanceof IndexCursor && other.at === this.at && other.index === this.position;
  }

  next(): void {
    this.position++;
  }
}

// ============================================================================
// IndexedRange
// ============================================================================

export class IndexedRange<E, A extends unknown[]> implements DivisibleRange<E, A> {
  constructor(
    readonly shape: ElementShape<E, A>,
    private readonly at: (index: number) => E,
    readonly lo: number,
    readonly hi: number,
    readonly grainSize: number = 1
  ) {
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo > hi) {
      throw new RangeBoundsError(`range bounds must be integers with lo <= hi, got [${lo}, ${hi})`);
    }
    if (!Number.isInteger(grainSize) || grainSize < 1) {
      throw new RangeBoundsError(`grain size must be a positive integer, got ${grainSize}`);
    }
  }

  begin(): IndexCursor<E> {
    return new IndexCursor(this.at, this.lo);
  }

  end(): IndexCursor<E> {
    return new IndexCursor(this.at, this.hi);
  }

  size(): number {
    return this.hi - this.lo;
  }

  empty(): boolean {
    return this.hi === this.lo;
  }

  isDivisible(): boolean {
    return this.size() > this.grainSize;
  }

  split(): [IndexedRange<E, A>, IndexedRange<E, A>] {
    if (!this.isDivisible()) {
      throw new SplitError(
        `range [${this.lo}, ${this.hi}) with grain size ${this.grainSize} is not divisible`,
        this.size()
      );
    }
    const mid = this.lo + Math.floor(this.size() / 2);
    return [
      new IndexedRange(this.shape, this.at, this.lo, mid, this.grainSize),
      new IndexedRange(this.shape, this.at, mid, this.hi, this.grainSize),
    ];
  }

  /** Materialize the elements in traversal order. */
  toArray(): E[] {
    const out: E[] = [];
    for (let i = this.lo; i < this.hi; i++) out.push(this.at(i));
    return out;
  }
}

// ============================================================================
// Factories
// ============================================================================

/** Indices in [begin, end), handed to the operator as numbers. */
export function blockedRange(
  begin: number,
  end: number,
  grainSize?: number
): IndexedRange<number, [number]> {
  return new IndexedRange(scalar<number>(), (i) => i, begin, end, grainSize);
}

/** An array slice with an explicit element shape. */
export function sliceRange<E, A extends unknown[]>(
  items: readonly E[],
  shape: ElementShape<E, A>,
  grainSize?: number
): IndexedRange<E, A> {
  return new IndexedRange(shape, (i) => items[i], 0, items.length, grainSize);
}

/** Array elements handed to the operator as they are. */
export function arrayRange<T>(items: readonly T[], grainSize?: number): IndexedRange<T, [T]> {
  return sliceRange(items, scalar<T>(), grainSize);
}

/** Tuple elements spread into the operator. */
export function tupleRange<T extends unknown[]>(
  items: readonly T[],
  grainSize?: number
): IndexedRange<T, T> {
  return sliceRange(items, tuple<T>(), grainSize);
}

/** Pairs `(a[i], b[i])` up to the shorter array's length. */
export function zipRange<L, R>(
  left: readonly L[],
  right: readonly R[],
  grainSize?: number
): IndexedRange<[L, R], [L, R]> {
  const length = Math.min(left.length, right.length);
  return new IndexedRange(
    tuple<[L, R]>(),
    (i): [L, R] => [left[i], right[i]],
    0,
    length,
    grainSize
  );
}

/** Handles dereferenced once before `inner` decides how to call the operator. */
export function handleRange<E, A extends unknown[]>(
  handles: readonly Dereferenceable<E>[],
  inner: ElementShape<E, A>,
  grainSize?: number
): IndexedRange<Dereferenceable<E>, A> {
  return sliceRange(handles, deref(inner), grainSize);
}

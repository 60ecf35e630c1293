/**
 * Range and Backend Capabilities
 *
 * Hierarchy:
 *   Dereferenceable<T>
 *     └── Cursor<E>
 *   DivisibleRange<E, A>   — consumed by the drivers
 *   Backend<M>             — split/schedule/join strategy, M = "sync" | "async"
 */

import type { DispatchOperation, DispatchTracer } from "@splitrange/core";
import type { ElementShape } from "./dispatch.js";

// ============================================================================
// Handles and cursors
// ============================================================================

/** Anything that yields a value when dereferenced. */
export interface Dereferenceable<T> {
  deref(): T;
}

/**
 * A position in a range. Borrowed from the range for one traversal.
 */
export interface Cursor<E> extends Dereferenceable<E> {
  equals(other: Cursor<E>): boolean;
  /** Advance in place. */
  next(): void;
}

// ============================================================================
// DivisibleRange
// ============================================================================

/**
 * A range the drivers can iterate or hand to a backend.
 *
 * @typeParam E - The element type a cursor dereferences to
 * @typeParam A - The argument list an operator receives for one element
 */
export interface DivisibleRange<E, A extends unknown[]> {
  /** How an element is unpacked into operator arguments. */
  readonly shape: ElementShape<E, A>;

  begin(): Cursor<E>;
  end(): Cursor<E>;
  size(): number;

  /**
   * Whether splitting would pay off. Must be pure: the answer depends only on
   * the range's current size and shape.
   */
  isDivisible(): boolean;

  /**
   * Divide into two ranges covering this one, in order. Only valid when
   * `isDivisible()` is true.
   */
  split(): [DivisibleRange<E, A>, DivisibleRange<E, A>];
}

// ============================================================================
// Backend
// ============================================================================

export type ExecutionMode = "sync" | "async";

/** What a backend of mode M hands back for a result of type T. */
export type Outcome<M extends ExecutionMode, T> = M extends "async" ? Promise<T> : T;

/** Per-call information a backend needs for tracing. */
export interface DispatchContext {
  readonly operation: DispatchOperation;
  readonly tracer: DispatchTracer;
}

/**
 * A parallel execution strategy. Every backend must bottom out in the
 * supplied `leaf` callbacks; it never calls a user operator itself.
 */
export interface Backend<M extends ExecutionMode> {
  readonly name: string;
  readonly mode: M;

  /** Split `range` as the backend sees fit and run `leaf` on every piece. */
  forEach<E, A extends unknown[]>(
    range: DivisibleRange<E, A>,
    leaf: (sub: DivisibleRange<E, A>) => void,
    ctx: DispatchContext
  ): Outcome<M, void>;

  /**
   * Split `range`, fold each piece with `leaf` seeded by `init`, and combine
   * the partials pairwise in range order.
   */
  reduce<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    init: T,
    leaf: (sub: DivisibleRange<E, A>, partial: T) => T,
    combine: (a: T, b: T) => T,
    ctx: DispatchContext
  ): Outcome<M, T>;

  /** Run work in place, delivered the way this backend delivers results. */
  run<T>(thunk: () => T): Outcome<M, T>;
}

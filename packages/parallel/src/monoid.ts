/**
 * Semigroup / Monoid
 *
 * The reduction half of `parallelFold`: `combine` must be associative and
 * `empty()` its identity. Commutativity is not required by the backends in
 * this package, which all join partials in range order.
 */

export interface Semigroup<A> {
  combine(a: A, b: A): A;
}

export interface Monoid<A> extends Semigroup<A> {
  empty(): A;
}

export const monoidNumber: Monoid<number> = {
  combine: (a, b) => a + b,
  empty: () => 0,
};

export const monoidBigInt: Monoid<bigint> = {
  combine: (a, b) => a + b,
  empty: () => 0n,
};

export const monoidString: Monoid<string> = {
  combine: (a, b) => a + b,
  empty: () => "",
};

/** Concatenation. Associative but not commutative. */
export function monoidArray<T>(): Monoid<T[]> {
  return {
    combine: (a, b) => [...a, ...b],
    empty: () => [],
  };
}

export const monoidMax: Monoid<number> = {
  combine: (a, b) => Math.max(a, b),
  empty: () => -Infinity,
};

export const monoidMin: Monoid<number> = {
  combine: (a, b) => Math.min(a, b),
  empty: () => Infinity,
};

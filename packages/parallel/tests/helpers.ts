import type { Cursor, DivisibleRange, ElementShape } from "../src/index.js";

/** Shared counters for a range and every sub-range split from it. */
export interface SplitLog {
  splits: number;
  divisibleQueries: number;
}

/**
 * Wraps a range, counting `split()` calls across the whole split tree.
 * `force` overrides `isDivisible()` on the outermost range only.
 */
export class InstrumentedRange<E, A extends unknown[]> implements DivisibleRange<E, A> {
  constructor(
    private readonly inner: DivisibleRange<E, A>,
    readonly log: SplitLog = { splits: 0, divisibleQueries: 0 },
    private readonly force?: boolean
  ) {}

  get shape(): ElementShape<E, A> {
    return this.inner.shape;
  }

  begin(): Cursor<E> {
    return this.inner.begin();
  }

  end(): Cursor<E> {
    return this.inner.end();
  }

  size(): number {
    return this.inner.size();
  }

  isDivisible(): boolean {
    this.log.divisibleQueries++;
    return this.force ?? this.inner.isDivisible();
  }

  split(): [DivisibleRange<E, A>, DivisibleRange<E, A>] {
    this.log.splits++;
    const [left, right] = this.inner.split();
    return [new InstrumentedRange(left, this.log), new InstrumentedRange(right, this.log)];
  }
}

/** Force the sequential path for any range. */
export function indivisible<E, A extends unknown[]>(
  range: DivisibleRange<E, A>
): InstrumentedRange<E, A> {
  return new InstrumentedRange(range, undefined, false);
}


import { SplitError } from "@splitrange/core";
import type { DivisibleRange } from "../types.js";

/**
 * Split a range and confirm the halves are strictly smaller and cover it.
 * A range that breaks this has lied about being divisible.
 */
export function checkedSplit<E, A extends unknown[]>(
  range: DivisibleRange<E, A>
): [DivisibleRange<E, A>, DivisibleRange<E, A>] {
  const parent = range.size();
  const [left, right] = range.split();
  const l = left.size();
  const r = right.size();

  if (l >= parent || r >= parent || l + r !== parent) {
    throw new SplitError(
      `split of a range of size ${parent} produced halves of size ${l} and ${r}`,
      parent
    );
  }
  return [left, right];
}

/** Whether a backend with this grain size should divide `range` further. */
export function shouldSplit<E, A extends unknown[]>(
  range: DivisibleRange<E, A>,
  grainSize: number
): boolean {
  return range.isDivisible() && range.size() > grainSize;
}

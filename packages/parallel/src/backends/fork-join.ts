/**
 * Fork-join backend: recursive bisection on the calling thread.
 *
 * A range is split while it is divisible and larger than `grainSize`; the
 * left half is always finished before the right one, and reduce partials are
 * joined along the same tree, so results combine in range order.
 */

import type { Backend, DispatchContext, DivisibleRange } from "../types.js";
import { integerOption } from "./options.js";
import { checkedSplit, shouldSplit } from "./split.js";

export interface ForkJoinOptions {
  /** Ranges of at most this many elements are run as one leaf. Default 1. */
  grainSize?: number;
}

export function forkJoinBackend(options: ForkJoinOptions = {}): Backend<"sync"> {
  const grainSize = integerOption("grainSize", options.grainSize, 1, 1);

  function trace<E, A extends unknown[]>(
    kind: "split" | "leaf",
    range: DivisibleRange<E, A>,
    depth: number,
    ctx: DispatchContext
  ): void {
    ctx.tracer.record(kind, {
      operation: ctx.operation,
      backend: "fork-join",
      size: range.size(),
      depth,
    });
  }

  return {
    name: "fork-join",
    mode: "sync",

    forEach(range, leaf, ctx) {
      const walk = (sub: typeof range, depth: number): void => {
        if (shouldSplit(sub, grainSize)) {
          trace("split", sub, depth, ctx);
          const [left, right] = checkedSplit(sub);
          walk(left, depth + 1);
          walk(right, depth + 1);
        } else {
          trace("leaf", sub, depth, ctx);
          leaf(sub);
        }
      };
      walk(range, 0);
    },

    reduce(range, init, leaf, combine, ctx) {
      const fold = (sub: typeof range, depth: number): typeof init => {
        if (shouldSplit(sub, grainSize)) {
          trace("split", sub, depth, ctx);
          const [left, right] = checkedSplit(sub);
          const l = fold(left, depth + 1);
          return combine(l, fold(right, depth + 1));
        }
        trace("leaf", sub, depth, ctx);
        return leaf(sub, init);
      };
      return fold(range, 0);
    },

    run(thunk) {
      return thunk();
    },
  };
}

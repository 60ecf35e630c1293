/**
 * Async backend: size-threshold fan-out on the event loop.
 *
 * Ranges at or below `threshold` elements run in place. Larger ranges are
 * cut into at most `chunks` pieces (always splitting the largest divisible
 * piece) and each piece runs as its own task. Partials are combined in
 * range order once every task has settled.
 */

import type { Backend, DispatchContext, DivisibleRange } from "../types.js";
import { integerOption } from "./options.js";
import { checkedSplit } from "./split.js";
import { defer, yieldToLoop } from "./tasks.js";

export interface AsyncBackendOptions {
  /** Ranges with at most this many elements are not fanned out. Default 128. */
  threshold?: number;
  /** Upper bound on the number of concurrent pieces. Default 4. */
  chunks?: number;
}

interface Piece<E, A extends unknown[]> {
  range: DivisibleRange<E, A>;
  depth: number;
}

export function asyncBackend(options: AsyncBackendOptions = {}): Backend<"async"> {
  const threshold = integerOption("threshold", options.threshold, 128, 0);
  const chunks = integerOption("chunks", options.chunks, 4, 1);

  function partition<E, A extends unknown[]>(
    range: DivisibleRange<E, A>,
    ctx: DispatchContext
  ): Piece<E, A>[] {
    const pieces: Piece<E, A>[] = [{ range, depth: 0 }];

    while (pieces.length < chunks) {
      let target = -1;
      for (let i = 0; i < pieces.length; i++) {
        const candidate = pieces[i].range;
        if (!candidate.isDivisible()) continue;
        if (target < 0 || candidate.size() > pieces[target].range.size()) target = i;
      }
      if (target < 0) break;

      const { range: parent, depth } = pieces[target];
      ctx.tracer.record("split", {
        operation: ctx.operation,
        backend: "async",
        size: parent.size(),
        depth,
      });
      const [left, right] = checkedSplit(parent);
      pieces.splice(target, 1, { range: left, depth: depth + 1 }, { range: right, depth: depth + 1 });
    }

    return pieces;
  }

  async function fanOut<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    leaf: (sub: DivisibleRange<E, A>) => T,
    ctx: DispatchContext
  ): Promise<T[]> {
    if (range.size() <= threshold) {
      ctx.tracer.record("threshold", {
        operation: ctx.operation,
        backend: "async",
        size: range.size(),
        depth: 0,
      });
      return [await defer(() => leaf(range))];
    }

    let failed = false;
    const pieces = partition(range, ctx);
    return Promise.all(
      pieces.map(async ({ range: sub, depth }): Promise<T> => {
        await yieldToLoop();
        if (failed) throw new Error("aborted after an earlier piece failed");
        ctx.tracer.record("leaf", {
          operation: ctx.operation,
          backend: "async",
          size: sub.size(),
          depth,
        });
        try {
          return leaf(sub);
        } catch (error) {
          failed = true;
          throw error;
        }
      })
    );
  }

  return {
    name: "async",
    mode: "async",

    async forEach(range, leaf, ctx) {
      await fanOut(range, leaf, ctx);
    },

    async reduce(range, init, leaf, combine, ctx) {
      const partials = await fanOut(range, (sub) => leaf(sub, init), ctx);
      return partials.reduce((acc, partial) => combine(acc, partial));
    },

    run: defer,
  };
}

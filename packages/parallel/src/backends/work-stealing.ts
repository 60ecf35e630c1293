/**
 * Work-stealing backend: a pool of cooperative workers on the event loop.
 *
 * Each worker owns a deque. It takes work from the bottom of its own deque,
 * splits it down to the grain size (pushing right halves back onto its own
 * deque), runs the remaining leaf, and yields. An idle worker steals the
 * oldest (and therefore largest) task from the top of another worker's deque.
 *
 * Reduce partials are stored in the split tree and joined left-to-right once
 * every worker has drained, so results combine in range order regardless of
 * which worker ran which leaf.
 */

import { invariant } from "@splitrange/core";
import type { Backend, DispatchContext, DivisibleRange } from "../types.js";
import { integerOption } from "./options.js";
import { checkedSplit, shouldSplit } from "./split.js";
import { yieldToLoop } from "./tasks.js";

export interface WorkStealingOptions {
  /** Number of cooperative workers. Default 4. */
  workers?: number;
  /** Ranges of at most this many elements are run as one leaf. Default 1. */
  grainSize?: number;
}

interface JoinNode<T> {
  result?: { partial: T };
  left?: JoinNode<T>;
  right?: JoinNode<T>;
}

interface Task<E, A extends unknown[], T> {
  range: DivisibleRange<E, A>;
  depth: number;
  node: JoinNode<T>;
}

function join<T>(node: JoinNode<T>, combine: (a: T, b: T) => T): T {
  if (node.left !== undefined && node.right !== undefined) {
    const l = join(node.left, combine);
    return combine(l, join(node.right, combine));
  }
  invariant(node.result !== undefined, "work-stealing leaf finished without a partial");
  return node.result.partial;
}

export function workStealingBackend(options: WorkStealingOptions = {}): Backend<"async"> {
  const workers = integerOption("workers", options.workers, 4, 1);
  const grainSize = integerOption("grainSize", options.grainSize, 1, 1);

  async function execute<E, A extends unknown[], T>(
    range: DivisibleRange<E, A>,
    leaf: (sub: DivisibleRange<E, A>) => T,
    ctx: DispatchContext
  ): Promise<JoinNode<T>> {
    const root: JoinNode<T> = {};
    const deques: Task<E, A, T>[][] = Array.from({ length: workers }, () => []);
    deques[0].push({ range, depth: 0, node: root });
    let failed = false;

    const record = (kind: "split" | "leaf", sub: DivisibleRange<E, A>, depth: number) =>
      ctx.tracer.record(kind, {
        operation: ctx.operation,
        backend: "work-stealing",
        size: sub.size(),
        depth,
      });

    const steal = (self: number): Task<E, A, T> | undefined => {
      for (let k = 1; k < workers; k++) {
        const victim = deques[(self + k) % workers];
        if (victim.length > 0) return victim.shift();
      }
      return undefined;
    };

    const worker = async (self: number): Promise<void> => {
      const own = deques[self];
      while (!failed) {
        const task = own.pop() ?? steal(self);
        if (task === undefined) return;

        try {
          let { range: current, depth, node } = task;
          while (shouldSplit(current, grainSize)) {
            record("split", current, depth);
            const [left, right] = checkedSplit(current);
            const leftNode: JoinNode<T> = {};
            const rightNode: JoinNode<T> = {};
            node.left = leftNode;
            node.right = rightNode;
            own.push({ range: right, depth: depth + 1, node: rightNode });
            current = left;
            node = leftNode;
            depth++;
          }

          record("leaf", current, depth);
          node.result = { partial: leaf(current) };
        } catch (error) {
          // A bad split or a throwing operator stops every worker.
          failed = true;
          throw error;
        }
        await yieldToLoop();
      }
    };

    await Promise.all(deques.map((_, self) => worker(self)));
    return root;
  }

  return {
    name: "work-stealing",
    mode: "async",

    async forEach(range, leaf, ctx) {
      await execute(range, leaf, ctx);
    },

    async reduce(range, init, leaf, combine, ctx) {
      const root = await execute(range, (sub) => leaf(sub, init), ctx);
      return join(root, combine);
    },

    async run(thunk) {
      return thunk();
    },
  };
}

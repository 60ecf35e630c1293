import type { Backend } from "../types.js";
import { defer } from "./tasks.js";

/**
 * Never splits: the whole range is one leaf on the calling thread.
 * Also stands in when configuration selects no backend.
 */
export const sequentialBackend: Backend<"sync"> = {
  name: "sequential",
  mode: "sync",

  forEach(range, leaf, ctx) {
    ctx.tracer.record("leaf", {
      operation: ctx.operation,
      backend: "sequential",
      size: range.size(),
      depth: 0,
    });
    leaf(range);
  },

  reduce(range, init, leaf, _combine, ctx) {
    ctx.tracer.record("leaf", {
      operation: ctx.operation,
      backend: "sequential",
      size: range.size(),
      depth: 0,
    });
    return leaf(range, init);
  },

  run(thunk) {
    return thunk();
  },
};

/**
 * The sequential backend behind a promise, for async entry points when no
 * async backend is configured. Failures surface as rejections.
 */
export const deferredSequentialBackend: Backend<"async"> = {
  name: "sequential",
  mode: "async",

  forEach(range, leaf, ctx) {
    return defer(() => sequentialBackend.forEach(range, leaf, ctx));
  },

  reduce(range, init, leaf, combine, ctx) {
    return defer(() => sequentialBackend.reduce(range, init, leaf, combine, ctx));
  },

  run: defer,
};

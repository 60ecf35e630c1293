import {
  unreachable,
  type AsyncBackendName,
  type ParallelConfig,
  type SyncBackendName,
} from "@splitrange/core";
import type { Backend } from "../types.js";
import { asyncBackend } from "./async.js";
import { forkJoinBackend } from "./fork-join.js";
import { deferredSequentialBackend, sequentialBackend } from "./sequential.js";
import { workStealingBackend } from "./work-stealing.js";

export { sequentialBackend, deferredSequentialBackend } from "./sequential.js";
export { forkJoinBackend, type ForkJoinOptions } from "./fork-join.js";
export { workStealingBackend, type WorkStealingOptions } from "./work-stealing.js";
export { asyncBackend, type AsyncBackendOptions } from "./async.js";
export { checkedSplit } from "./split.js";

/** Build the blocking backend named by configuration. */
export function syncBackendFor(
  name: SyncBackendName,
  cfg: Pick<ParallelConfig, "grainSize">
): Backend<"sync"> {
  switch (name) {
    case "fork-join":
      return forkJoinBackend({ grainSize: cfg.grainSize });
    case "sequential":
    case "none":
      return sequentialBackend;
    default:
      return unreachable(name);
  }
}

/** Build the promise-returning backend named by configuration. */
export function asyncBackendFor(
  name: AsyncBackendName,
  cfg: Pick<ParallelConfig, "grainSize" | "workers" | "threshold">
): Backend<"async"> {
  switch (name) {
    case "work-stealing":
      return workStealingBackend({ workers: cfg.workers, grainSize: cfg.grainSize });
    case "async":
      return asyncBackend({ threshold: cfg.threshold, chunks: cfg.workers });
    case "none":
      return deferredSequentialBackend;
    default:
      return unreachable(name);
  }
}

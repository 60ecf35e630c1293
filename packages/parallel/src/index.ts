// Capabilities
export type {
  Cursor,
  Dereferenceable,
  DivisibleRange,
  Backend,
  DispatchContext,
  ExecutionMode,
  Outcome,
} from "./types.js";

// Element dispatch
export { scalar, tuple, deref, invoke, shapeDepth, type ElementShape, type ShapeKind } from "./dispatch.js";

// Ranges
export {
  IndexCursor,
  IndexedRange,
  blockedRange,
  sliceRange,
  arrayRange,
  tupleRange,
  zipRange,
  handleRange,
} from "./ranges.js";

// Backends
export {
  sequentialBackend,
  deferredSequentialBackend,
  forkJoinBackend,
  workStealingBackend,
  asyncBackend,
  syncBackendFor,
  asyncBackendFor,
  checkedSplit,
  type ForkJoinOptions,
  type WorkStealingOptions,
  type AsyncBackendOptions,
} from "./backends/index.js";

// Drivers
export {
  createDriver,
  forEachSequential,
  reduceSequential,
  type Driver,
  type DriverOptions,
} from "./driver.js";
export {
  defaultDriver,
  defaultAsyncDriver,
  resetDrivers,
  parallelFor,
  parallelReduce,
  parallelFold,
  parallelForAsync,
  parallelReduceAsync,
  parallelFoldAsync,
} from "./entry.js";

// Reductions
export {
  monoidNumber,
  monoidBigInt,
  monoidString,
  monoidArray,
  monoidMax,
  monoidMin,
  type Semigroup,
  type Monoid,
} from "./monoid.js";

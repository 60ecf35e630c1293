/**
 * Core module exports for @splitrange/core
 *
 * This package provides:
 * - Configuration (environment, config file, programmatic)
 * - Reason-coded error types
 * - Dispatch tracing
 * - Runtime safety primitives (invariant, unreachable)
 */

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";

// Configuration System
export {
  config,
  defineConfig,
  resolveParallelConfig,
  readBoolean,
  SYNC_BACKENDS,
  ASYNC_BACKENDS,
  type SplitRangeConfig,
  type ParallelConfig,
  type SyncBackendName,
  type AsyncBackendName,
} from "./config.js";

// Errors
export {
  SplitRangeError,
  SplitError,
  RangeBoundsError,
  ConfigError,
  type SplitRangeErrorCode,
} from "./errors.js";

// Dispatch Tracing
export {
  DispatchTracer,
  formatDispatchRecord,
  globalDispatchTracer,
  type DispatchKind,
  type DispatchOperation,
  type DispatchRecord,
  type DispatchSummary,
  type TraceWriter,
} from "./dispatch-trace.js";

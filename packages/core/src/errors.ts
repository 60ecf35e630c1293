/**
 * Error Types
 *
 * Reason-coded errors raised by the library itself. Operator failures are
 * never wrapped: whatever user code throws reaches the caller unchanged.
 */

/** Reason codes for library failures. */
export type SplitRangeErrorCode = "invalid_split" | "invalid_range" | "invalid_config";

/**
 * Base class for every error the library raises on its own behalf.
 */
export class SplitRangeError extends Error {
  constructor(
    message: string,
    readonly code: SplitRangeErrorCode
  ) {
    super(message);
    this.name = "SplitRangeError";
  }
}

/**
 * Thrown when a range reports itself divisible but cannot be split into two
 * strictly smaller halves that cover it.
 */
export class SplitError extends SplitRangeError {
  constructor(
    message: string,
    readonly size: number
  ) {
    super(message, "invalid_split");
    this.name = "SplitError";
  }
}

/**
 * Thrown when a range is constructed with bounds or a grain size it cannot
 * honor.
 */
export class RangeBoundsError extends SplitRangeError {
  constructor(message: string) {
    super(message, "invalid_range");
    this.name = "RangeBoundsError";
  }
}

/**
 * Thrown when a configuration value is outside what the library accepts.
 */
export class ConfigError extends SplitRangeError {
  constructor(
    readonly key: string,
    readonly value: unknown,
    message: string
  ) {
    super(message, "invalid_config");
    this.name = "ConfigError";
  }
}

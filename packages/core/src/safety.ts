/**
 * Runtime Safety Primitives
 *
 * - `invariant(condition, message)` — runtime assertion
 * - `unreachable(value?)` — marks impossible code paths
 *
 * @example
 * ```typescript
 * type Mode = "sync" | "async";
 * function label(mode: Mode): string {
 *   switch (mode) {
 *     case "sync": return "blocking";
 *     case "async": return "deferred";
 *     default: return unreachable(mode); // Type error if Mode is extended
 *   }
 * }
 * ```
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param _value - A value of type `never` (for type-level exhaustiveness)
 * @throws Error always
 */
export function unreachable(_value?: never): never {
  throw new Error("Unreachable code reached");
}

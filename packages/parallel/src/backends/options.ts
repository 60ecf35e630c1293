import { ConfigError } from "@splitrange/core";

/** Validate a numeric backend option, falling back to `fallback` when absent. */
export function integerOption(
  key: string,
  value: number | undefined,
  fallback: number,
  min: number
): number {
  const resolved = value ?? fallback;
  if (!Number.isInteger(resolved) || resolved < min) {
    throw new ConfigError(key, resolved, `${key} must be an integer >= ${min}, got ${resolved}`);
  }
  return resolved;
}

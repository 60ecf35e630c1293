/**
 * Dispatch Tracing System
 *
 * Records how each `parallelFor` / `parallelReduce` call was executed: whether
 * the driver ran the range sequentially or delegated it, and how the backend
 * split it into leaves.
 *
 * Features:
 * - Records every decision with backend name, range size and split depth
 * - Enabled by the `tracing` config key or programmatically
 * - Echoes records through a writer when `debug` is on
 * - Supports CLI-style summary output
 */

import { readBoolean } from "./config.js";

/**
 * Kinds of dispatch decisions that can be traced.
 */
export type DispatchKind =
  | "sequential" // driver saw an indivisible range and looped in place
  | "delegated" // driver handed a divisible range to the backend
  | "split" // backend divided a range in two
  | "leaf" // backend ran the sequential loop on a sub-range
  | "threshold"; // backend ran a divisible range in place because it was small

/** Which entry point produced the record. */
export type DispatchOperation = "for" | "reduce";

/**
 * A single dispatch event record.
 */
export interface DispatchRecord {
  kind: DispatchKind;
  operation: DispatchOperation;
  /** Backend that handled the call */
  backend: string;
  /** Size of the range the decision was made on */
  size: number;
  /** Number of splits between the caller's range and this one */
  depth: number;
  /** Timestamp for ordering */
  timestamp: number;
}

/**
 * Counts of records, grouped for display.
 */
export interface DispatchSummary {
  total: number;
  byKind: Record<DispatchKind, number>;
  byBackend: Record<string, number>;
}

export type TraceWriter = (line: string) => void;

/**
 * Tracks dispatch decisions across driver calls.
 */
export class DispatchTracer {
  private records: DispatchRecord[] = [];
  private enabled: boolean | undefined;
  private readonly writer: TraceWriter;

  constructor(writer?: TraceWriter) {
    this.writer = writer ?? ((line) => console.debug(line));
  }

  /**
   * Check if tracing is enabled. Falls back to the `tracing` config key
   * until `enable()` or `disable()` is called.
   */
  isEnabled(): boolean {
    return this.enabled ?? readBoolean("tracing");
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  /**
   * Record a dispatch event.
   */
  record(kind: DispatchKind, details: Omit<DispatchRecord, "kind" | "timestamp">): void {
    if (!this.isEnabled()) return;

    const record: DispatchRecord = { kind, ...details, timestamp: Date.now() };
    this.records.push(record);

    if (readBoolean("debug")) {
      this.writer(formatDispatchRecord(record));
    }
  }

  getAllRecords(): DispatchRecord[] {
    return [...this.records];
  }

  getRecordsByKind(kind: DispatchKind): DispatchRecord[] {
    return this.records.filter((r) => r.kind === kind);
  }

  getSummary(): DispatchSummary {
    const byKind: Record<DispatchKind, number> = {
      sequential: 0,
      delegated: 0,
      split: 0,
      leaf: 0,
      threshold: 0,
    };
    const byBackend: Record<string, number> = {};

    for (const record of this.records) {
      byKind[record.kind]++;
      byBackend[record.backend] = (byBackend[record.backend] ?? 0) + 1;
    }

    return { total: this.records.length, byKind, byBackend };
  }

  /**
   * Format trace output for CLI.
   */
  formatForCLI(): string {
    if (this.records.length === 0) {
      return "No dispatches recorded.";
    }

    const lines: string[] = [];
    const byBackend = new Map<string, DispatchRecord[]>();
    for (const record of this.records) {
      const group = byBackend.get(record.backend);
      if (group) {
        group.push(record);
      } else {
        byBackend.set(record.backend, [record]);
      }
    }

    for (const [backend, records] of byBackend) {
      lines.push(`== ${backend} ==`);
      for (const record of records) {
        lines.push(`  ${formatDispatchRecord(record)}`);
      }
    }

    return lines.join("\n");
  }

  clear(): void {
    this.records = [];
  }
}

/**
 * One-line rendering of a record, e.g. `[split] reduce size=8 depth=0 (fork-join)`.
 */
export function formatDispatchRecord(record: DispatchRecord): string {
  return `[${record.kind}] ${record.operation} size=${record.size} depth=${record.depth} (${record.backend})`;
}

/**
 * Global dispatch tracer instance.
 */
export const globalDispatchTracer = new DispatchTracer();

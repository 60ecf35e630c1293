/**
 * Tests for the dispatch tracing system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { DispatchTracer, config, formatDispatchRecord } from "../src/index.js";

describe("DispatchTracer", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("records nothing while disabled", () => {
    const tracer = new DispatchTracer();
    tracer.record("sequential", { operation: "for", backend: "fork-join", size: 3, depth: 0 });
    expect(tracer.isEnabled()).toBe(false);
    expect(tracer.getAllRecords()).toEqual([]);
  });

  it("follows the tracing config key until told otherwise", () => {
    const tracer = new DispatchTracer();
    config.set({ tracing: true });
    expect(tracer.isEnabled()).toBe(true);
    tracer.disable();
    expect(tracer.isEnabled()).toBe(false);
  });

  it("turns on when SPLITRANGE_TRACING is 1", () => {
    vi.stubEnv("SPLITRANGE_TRACING", "1");
    const tracer = new DispatchTracer();
    expect(tracer.isEnabled()).toBe(true);

    tracer.record("leaf", { operation: "for", backend: "sequential", size: 2, depth: 0 });
    expect(tracer.getAllRecords()).toHaveLength(1);
  });

  it("stays off when SPLITRANGE_TRACING is 0", () => {
    vi.stubEnv("SPLITRANGE_TRACING", "0");
    expect(new DispatchTracer().isEnabled()).toBe(false);
  });

  it("echoes records when SPLITRANGE_DEBUG is 1", () => {
    vi.stubEnv("SPLITRANGE_DEBUG", "1");
    const writer = vi.fn();
    const tracer = new DispatchTracer(writer);
    tracer.enable();
    tracer.record("threshold", { operation: "reduce", backend: "async", size: 5, depth: 0 });
    expect(writer).toHaveBeenCalledWith("[threshold] reduce size=5 depth=0 (async)");
  });

  it("summarizes records by kind and backend", () => {
    const tracer = new DispatchTracer();
    tracer.enable();
    tracer.record("delegated", { operation: "reduce", backend: "fork-join", size: 4, depth: 0 });
    tracer.record("split", { operation: "reduce", backend: "fork-join", size: 4, depth: 0 });
    tracer.record("leaf", { operation: "reduce", backend: "fork-join", size: 2, depth: 1 });
    tracer.record("leaf", { operation: "reduce", backend: "fork-join", size: 2, depth: 1 });
    tracer.record("threshold", { operation: "for", backend: "async", size: 9, depth: 0 });

    expect(tracer.getSummary()).toEqual({
      total: 5,
      byKind: { sequential: 0, delegated: 1, split: 1, leaf: 2, threshold: 1 },
      byBackend: { "fork-join": 4, async: 1 },
    });
    expect(tracer.getRecordsByKind("leaf").map((r) => r.depth)).toEqual([1, 1]);
  });

  it("formats records for the CLI grouped by backend", () => {
    const tracer = new DispatchTracer();
    expect(tracer.formatForCLI()).toBe("No dispatches recorded.");

    tracer.enable();
    tracer.record("sequential", { operation: "for", backend: "fork-join", size: 3, depth: 0 });
    tracer.record("leaf", { operation: "reduce", backend: "async", size: 2, depth: 1 });

    expect(tracer.formatForCLI()).toBe(
      [
        "== fork-join ==",
        "  [sequential] for size=3 depth=0 (fork-join)",
        "== async ==",
        "  [leaf] reduce size=2 depth=1 (async)",
      ].join("\n")
    );
  });

  it("writes each record in debug mode", () => {
    const writer = vi.fn();
    const tracer = new DispatchTracer(writer);
    tracer.enable();

    tracer.record("split", { operation: "reduce", backend: "fork-join", size: 8, depth: 0 });
    expect(writer).not.toHaveBeenCalled();

    config.set({ debug: true });
    tracer.record("split", { operation: "reduce", backend: "fork-join", size: 8, depth: 0 });
    expect(writer).toHaveBeenCalledWith("[split] reduce size=8 depth=0 (fork-join)");
  });

  it("clears records", () => {
    const tracer = new DispatchTracer();
    tracer.enable();
    tracer.record("leaf", { operation: "for", backend: "sequential", size: 1, depth: 0 });
    tracer.clear();
    expect(tracer.getAllRecords()).toEqual([]);
  });
});

describe("formatDispatchRecord", () => {
  it("renders one line", () => {
    expect(
      formatDispatchRecord({
        kind: "delegated",
        operation: "for",
        backend: "work-stealing",
        size: 12,
        depth: 0,
        timestamp: 0,
      })
    ).toBe("[delegated] for size=12 depth=0 (work-stealing)");
  });
});

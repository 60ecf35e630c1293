import { describe, it, expect, beforeEach } from "vitest";
import { DispatchTracer } from "@splitrange/core";
import {
  arrayRange,
  blockedRange,
  createDriver,
  forkJoinBackend,
  handleRange,
  monoidArray,
  monoidBigInt,
  monoidMax,
  monoidMin,
  monoidNumber,
  sequentialBackend,
  tuple,
  tupleRange,
  zipRange,
  type Backend,
  type Dereferenceable,
} from "../src/index.js";
import { InstrumentedRange, indivisible } from "./helpers.js";

const cases: Array<[string, Backend<"sync">]> = [
  ["sequential", sequentialBackend],
  ["fork-join", forkJoinBackend()],
  ["fork-join with grain size 2", forkJoinBackend({ grainSize: 2 })],
];

describe.each(cases)("sync driver on the %s backend", (_name, backend) => {
  let tracer: DispatchTracer;

  beforeEach(() => {
    tracer = new DispatchTracer(() => {});
    tracer.enable();
  });

  describe("parallelReduce", () => {
    it("sums squares of 1..5 to 55 on the delegated path", () => {
      const driver = createDriver(backend, { tracer });
      const result = driver.parallelReduce(
        arrayRange([1, 2, 3, 4, 5]),
        (x) => x * x,
        (a, b) => a + b,
        0
      );
      expect(result).toBe(55);
      expect(tracer.getRecordsByKind("delegated")).toHaveLength(1);
    });

    it("sums squares of 1..5 to 55 on the sequential path", () => {
      const driver = createDriver(backend, { tracer });
      const result = driver.parallelReduce(
        indivisible(arrayRange([1, 2, 3, 4, 5])),
        (x) => x * x,
        (a, b) => a + b,
        0
      );
      expect(result).toBe(55);
      expect(tracer.getRecordsByKind("sequential")).toHaveLength(1);
    });

    it("matches the sequential fold for a larger range", () => {
      const driver = createDriver(backend, { tracer });
      const expected = Array.from({ length: 100 }, (_, i) => i * 3 + 1).reduce((a, b) => a + b, 0);
      expect(driver.parallelReduce(blockedRange(0, 100), (i) => i * 3 + 1, (a, b) => a + b, 0)).toBe(
        expected
      );
    });

    it("keeps range order for an associative, non-commutative reduction", () => {
      const driver = createDriver(backend, { tracer });
      const result = driver.parallelFold(blockedRange(0, 9), (i) => [i], monoidArray<number>());
      expect(result).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    });

    it("folds with a monoid", () => {
      const driver = createDriver(backend, { tracer });
      expect(driver.parallelFold(zipRange([1, 2, 3], [10, 20, 30]), (a, b) => a * b, monoidNumber)).toBe(
        140
      );
    });

    it("folds bigints past the safe integer range", () => {
      const driver = createDriver(backend, { tracer });
      const range = arrayRange([2n ** 53n, 1n, 1n, 1n]);
      expect(driver.parallelFold(range, (x) => x, monoidBigInt)).toBe(9007199254740995n);
    });

    it("finds the maximum and minimum", () => {
      const driver = createDriver(backend, { tracer });
      const range = arrayRange([3, -7, 12, 5, 0]);
      expect(driver.parallelFold(range, (x) => x, monoidMax)).toBe(12);
      expect(driver.parallelFold(range, (x) => x, monoidMin)).toBe(-7);
    });

    it("falls back to the monoid identity for an empty range", () => {
      const driver = createDriver(backend, { tracer });
      expect(driver.parallelFold(arrayRange<number>([]), (x) => x, monoidMax)).toBe(-Infinity);
      expect(driver.parallelFold(arrayRange<number>([]), (x) => x, monoidMin)).toBe(Infinity);
    });

    it("returns init for an empty range", () => {
      const driver = createDriver(backend, { tracer });
      expect(driver.parallelReduce(blockedRange(0, 0), (i) => i, (a, b) => a + b, 0)).toBe(0);
    });
  });

  describe("parallelFor", () => {
    it("hands tuple fields to the operator as separate arguments", () => {
      const driver = createDriver(backend, { tracer });
      const seen: string[] = [];
      driver.parallelFor(
        tupleRange<[number, string]>([
          [1, "a"],
          [2, "b"],
        ]),
        (n, s) => {
          seen.push(`${n}:${s}`);
        }
      );
      expect(new Set(seen)).toEqual(new Set(["1:a", "2:b"]));
      expect(seen).toHaveLength(2);
    });

    it("fully unpacks cursors to tuples", () => {
      const driver = createDriver(backend, { tracer });
      const handles: Dereferenceable<[number, string]>[] = [
        { deref: () => [1, "a"] },
        { deref: () => [2, "b"] },
        { deref: () => [3, "c"] },
      ];
      const seen: string[] = [];
      driver.parallelFor(handleRange(handles, tuple<[number, string]>()), (n, s) => {
        seen.push(`${n}${s}`);
      });
      expect(seen.sort()).toEqual(["1a", "2b", "3c"]);
    });

    it("invokes the operator once per element on both paths", () => {
      const driver = createDriver(backend, { tracer });
      const delegated: number[] = [];
      const sequential: number[] = [];

      driver.parallelFor(blockedRange(0, 37), (i) => {
        delegated.push(i);
      });
      driver.parallelFor(indivisible(blockedRange(0, 37)), (i) => {
        sequential.push(i);
      });

      expect(sequential).toEqual(Array.from({ length: 37 }, (_, i) => i));
      expect([...delegated].sort((a, b) => a - b)).toEqual(sequential);
    });

    it("never splits an indivisible range", () => {
      const driver = createDriver(backend, { tracer });
      const range = indivisible(blockedRange(0, 64));
      let calls = 0;
      driver.parallelFor(range, () => {
        calls++;
      });
      driver.parallelReduce(range, (i) => i, (a, b) => a + b, 0);

      expect(calls).toBe(64);
      expect(range.log.splits).toBe(0);
      expect(tracer.getRecordsByKind("split")).toHaveLength(0);
      expect(tracer.getRecordsByKind("leaf")).toHaveLength(0);
      expect(tracer.getRecordsByKind("sequential").map((r) => r.operation)).toEqual(["for", "reduce"]);
    });
  });

  describe("failure propagation", () => {
    it("rethrows the operator's error from parallelFor", () => {
      const driver = createDriver(backend, { tracer });
      const boom = new Error("boom at 3");
      let caught: unknown;
      try {
        driver.parallelFor(blockedRange(0, 10), (i) => {
          if (i === 3) throw boom;
        });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBe(boom);
    });

    it("rethrows the operator's error from parallelReduce on the sequential path", () => {
      const driver = createDriver(backend, { tracer });
      const boom = new Error("boom at 2");
      expect(() =>
        driver.parallelReduce(
          indivisible(arrayRange([1, 2, 3])),
          (x) => {
            if (x === 2) throw boom;
            return x;
          },
          (a, b) => a + b,
          0
        )
      ).toThrow(boom);
    });
  });
});

describe("fork-join splitting", () => {
  it("bisects down to single elements with the default grain size", () => {
    const tracer = new DispatchTracer(() => {});
    tracer.enable();
    const range = new InstrumentedRange(blockedRange(0, 50));
    createDriver(forkJoinBackend(), { tracer }).parallelFor(range, () => {});

    expect(range.log.splits).toBe(49);
    expect(tracer.getRecordsByKind("split")).toHaveLength(49);
    expect(tracer.getRecordsByKind("leaf").every((r) => r.size === 1)).toBe(true);
    expect(tracer.getRecordsByKind("leaf")).toHaveLength(50);
  });

  it("stops splitting at the backend grain size", () => {
    const tracer = new DispatchTracer(() => {});
    tracer.enable();
    createDriver(forkJoinBackend({ grainSize: 2 }), { tracer }).parallelFor(blockedRange(0, 8), () => {});

    expect(tracer.getRecordsByKind("split").map((r) => r.depth)).toEqual([0, 1, 1]);
    expect(tracer.getRecordsByKind("leaf").map((r) => r.size)).toEqual([2, 2, 2, 2]);
  });

  it("visits elements in range order", () => {
    const seen: number[] = [];
    createDriver(forkJoinBackend()).parallelFor(blockedRange(0, 12), (i) => {
      seen.push(i);
    });
    expect(seen).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  it("stays on the sequential backend without splitting", () => {
    const tracer = new DispatchTracer(() => {});
    tracer.enable();
    const range = new InstrumentedRange(blockedRange(0, 10));
    createDriver(sequentialBackend, { tracer }).parallelFor(range, () => {});

    expect(range.log.splits).toBe(0);
    expect(tracer.getRecordsByKind("leaf").map((r) => r.size)).toEqual([10]);
  });
});

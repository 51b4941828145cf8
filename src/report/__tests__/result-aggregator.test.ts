import { describe, expect, it } from "vitest";
import { aggregate, isComplete } from "../result-aggregator.ts";
import { AggregationError } from "../types.ts";
import { evidencedResult, failure, notEvidencedResult } from "./helpers.ts";

describe("aggregate", () => {
  it("keeps results in input order", () => {
    const report = aggregate(
      [evidencedResult("D8", "GOOD"), evidencedResult("D6", "LITTLE"), notEvidencedResult("D7", "none")],
      { documentId: "r1" },
    );

    expect(report.documentId).toBe("r1");
    expect(report.entries.map((e) => e.dimensionId)).toEqual(["D8", "D6", "D7"]);
    expect(report.failures).toEqual([]);
    expect(isComplete(report)).toBe(true);
  });

  it("carries failures through", () => {
    const report = aggregate([evidencedResult("D6", "SOME")], { failures: [failure("D7")] });
    expect(report.documentId).toBeNull();
    expect(report.failures.map((f) => f.dimensionId)).toEqual(["D7"]);
    expect(isComplete(report)).toBe(false);
  });

  it("fails with DUPLICATE_DIMENSION for a repeated result", () => {
    try {
      aggregate([evidencedResult("D6", "GOOD"), evidencedResult("D6", "LITTLE")]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AggregationError);
      const aggErr = err as AggregationError;
      expect(aggErr.code).toBe("DUPLICATE_DIMENSION");
      expect(aggErr.dimensionId).toBe("D6");
      expect(aggErr.message).toBe("Dimension D6 appears more than once in the report");
    }
  });

  it("fails with DUPLICATE_DIMENSION when a dimension is both a result and a failure", () => {
    expect(() => aggregate([evidencedResult("D7", "SOME")], { failures: [failure("D7")] })).toThrow(
      AggregationError,
    );
  });

  it("returns a frozen report that does not alias the input", () => {
    const results = [evidencedResult("D1", "GOOD")];
    const report = aggregate(results);
    results.push(evidencedResult("D2", "GOOD"));

    expect(report.entries).toHaveLength(1);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.entries)).toBe(true);
  });

  it("is pure: the same input gives equal reports", () => {
    const results = [evidencedResult("D1", "GOOD"), notEvidencedResult("D7", "none")];
    expect(aggregate(results, { documentId: "x" })).toEqual(aggregate(results, { documentId: "x" }));
  });
});

import { describe, expect, it } from "vitest";
import { reportToJSON } from "../serialize.ts";
import { aggregate } from "../result-aggregator.ts";
import { evidencedResult, failure, notEvidencedResult } from "./helpers.ts";

describe("reportToJSON", () => {
  it("maps dimension ids to tier, rationale, evidence and uncertainty", () => {
    const report = aggregate(
      [
        evidencedResult("D6", "LITTLE", {
          evidence: [{ chunkId: "c02", page: 1, quote: "would have been different", polarity: "negative" }],
          uncertainty: true,
        }),
        notEvidencedResult("D7", "No improvement actions found in the report"),
      ],
      { documentId: "r1", failures: [failure("D8", "Collaborator timed out after 50ms for D8")] },
    );

    expect(reportToJSON(report)).toEqual({
      documentId: "r1",
      dimensions: {
        D6: {
          tier: "LITTLE",
          rationale: "Rationale for D6",
          evidence: [{ chunkId: "c02", page: 1, quote: "would have been different", polarity: "negative" }],
          uncertainty: true,
        },
        D7: {
          tier: "NOT_EVIDENCED",
          rationale: "",
          evidence: [],
          uncertainty: false,
        },
      },
      failures: {
        D8: { code: "COLLABORATOR_UNAVAILABLE", message: "Collaborator timed out after 50ms for D8" },
      },
    });
  });

  it("survives a JSON round trip unchanged", () => {
    const json = reportToJSON(aggregate([evidencedResult("D1", "GOOD")], { documentId: "r" }));
    expect(JSON.parse(JSON.stringify(json))).toEqual(json);
  });
});

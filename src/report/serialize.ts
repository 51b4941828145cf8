import { outcomeLabel } from "../types/evaluation.ts";
import type {
  Report,
  SerializedDimension,
  SerializedFailure,
  SerializedReport,
} from "./types.ts";

/** Plain mapping of dimension id to its result, ready for JSON.stringify. */
export function reportToJSON(report: Report): SerializedReport {
  const dimensions: Record<string, SerializedDimension> = {};
  for (const entry of report.entries) {
    dimensions[entry.dimensionId] = {
      tier: outcomeLabel(entry.outcome),
      rationale: entry.rationale,
      evidence: entry.evidence.map((e) => ({
        chunkId: e.chunkId,
        page: e.page,
        quote: e.quote,
        polarity: e.polarity,
      })),
      uncertainty: entry.uncertainty,
    };
  }

  const failures: Record<string, SerializedFailure> = {};
  for (const failure of report.failures) {
    failures[failure.dimensionId] = {
      code: failure.error.code,
      message: failure.error.message,
    };
  }

  return { documentId: report.documentId, dimensions, failures };
}

import type { EvaluationResult } from "../types/evaluation.ts";
import type { AggregateOptions, Report } from "./types.ts";
import { AggregationError } from "./types.ts";

/**
 * Collect per-dimension results into a Report, preserving input order.
 *
 * @throws AggregationError DUPLICATE_DIMENSION when a dimension id appears
 *   twice among the results, or as both a result and a failure.
 */
export function aggregate(
  results: readonly EvaluationResult[],
  options: AggregateOptions = {},
): Report {
  const failures = options.failures ?? [];
  const seen = new Set<string>();

  const claim = (dimensionId: string) => {
    if (seen.has(dimensionId)) {
      throw new AggregationError(
        `Dimension ${dimensionId} appears more than once in the report`,
        "DUPLICATE_DIMENSION",
        dimensionId,
      );
    }
    seen.add(dimensionId);
  };

  for (const result of results) claim(result.dimensionId);
  for (const failure of failures) claim(failure.dimensionId);

  return Object.freeze({
    documentId: options.documentId ?? null,
    entries: Object.freeze([...results]),
    failures: Object.freeze([...failures]),
  });
}

/** True when the report has no failed dimensions. */
export function isComplete(report: Report): boolean {
  return report.failures.length === 0;
}

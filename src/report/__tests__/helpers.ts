import type { EvaluationResult } from "../../types/evaluation.ts";
import type { EvidenceTierLabel } from "../../types/rubric.ts";
import type { DimensionFailure } from "../../evaluation/types.ts";
import { EvaluationError } from "../../evaluation/types.ts";

export function evidencedResult(
  dimensionId: string,
  tier: EvidenceTierLabel,
  overrides: Partial<EvaluationResult> = {},
): EvaluationResult {
  return {
    dimensionId,
    dimensionName: `Dimension ${dimensionId}`,
    outcome: { kind: "evidenced", tier },
    rationale: `Rationale for ${dimensionId}`,
    evidence: [],
    uncertainty: false,
    ...overrides,
  };
}

export function notEvidencedResult(dimensionId: string, reason: string): EvaluationResult {
  return {
    dimensionId,
    dimensionName: `Dimension ${dimensionId}`,
    outcome: { kind: "not_evidenced", reason },
    rationale: "",
    evidence: [],
    uncertainty: false,
  };
}

export function failure(dimensionId: string, message = "timed out"): DimensionFailure {
  return {
    dimensionId,
    error: new EvaluationError(message, "COLLABORATOR_UNAVAILABLE", dimensionId),
  };
}

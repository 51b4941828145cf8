import type { EvidencePolarity, EvidenceTierLabel } from "./rubric.ts";

// ── Evaluation Document ──────────────────────────────────────────────────────

export interface DocumentChunk {
  /** Stable citation id, e.g. "c03". */
  readonly id: string;
  readonly page: number | null;
  readonly text: string;
}

export interface EvaluationDocument {
  readonly id: string;
  readonly chunks: readonly DocumentChunk[];
}

// ── Evidence ─────────────────────────────────────────────────────────────────

/** Polarity of a cited quote whose evidence type was missing or not recognised. */
export const UNCLASSIFIED_POLARITY = "unclassified";

export type CitedPolarity = EvidencePolarity | typeof UNCLASSIFIED_POLARITY;

export interface EvidenceItem {
  /** Chunk the quote was found in; null when it could not be located. */
  readonly chunkId: string | null;
  readonly page: number | null;
  readonly quote: string;
  readonly polarity: CitedPolarity;
}

// ── Outcome ──────────────────────────────────────────────────────────────────

export type EvaluationOutcome =
  | { readonly kind: "evidenced"; readonly tier: EvidenceTierLabel }
  | { readonly kind: "not_evidenced"; readonly reason: string };

export const NOT_EVIDENCED_LABEL = "NOT_EVIDENCED";

// ── Result ───────────────────────────────────────────────────────────────────

export interface EvaluationResult {
  readonly dimensionId: string;
  readonly dimensionName: string;
  readonly outcome: EvaluationOutcome;
  readonly rationale: string;
  readonly evidence: readonly EvidenceItem[];
  /** Raised by guards when the verdict is not well supported by its evidence. */
  readonly uncertainty: boolean;
}

export function outcomeLabel(
  outcome: EvaluationOutcome,
): EvidenceTierLabel | typeof NOT_EVIDENCED_LABEL {
  return outcome.kind === "evidenced" ? outcome.tier : NOT_EVIDENCED_LABEL;
}

import type { EvaluationResult } from "../types/evaluation.ts";
import type { DimensionFailure } from "../evaluation/types.ts";

// ── Report ──────────────────────────────────────────────────────────────────

export interface Report {
  readonly documentId: string | null;
  /** Ordered, at most one entry per dimension id. */
  readonly entries: readonly EvaluationResult[];
  readonly failures: readonly DimensionFailure[];
}

export interface AggregateOptions {
  readonly documentId?: string;
  readonly failures?: readonly DimensionFailure[];
}

// ── Aggregation Errors ──────────────────────────────────────────────────────

export type AggregationErrorCode = "DUPLICATE_DIMENSION";

export class AggregationError extends Error {
  override readonly name = "AggregationError";

  constructor(
    message: string,
    public readonly code: AggregationErrorCode,
    public readonly dimensionId: string,
  ) {
    super(message);
  }
}

// ── Serialized Form ─────────────────────────────────────────────────────────

export interface SerializedEvidence {
  readonly chunkId: string | null;
  readonly page: number | null;
  readonly quote: string;
  readonly polarity: string;
}

export interface SerializedDimension {
  /** An evidence tier label, or NOT_EVIDENCED. */
  readonly tier: string;
  readonly rationale: string;
  readonly evidence: readonly SerializedEvidence[];
  readonly uncertainty: boolean;
}

export interface SerializedFailure {
  readonly code: string;
  readonly message: string;
}

export interface SerializedReport {
  readonly documentId: string | null;
  readonly dimensions: Readonly<Record<string, SerializedDimension>>;
  readonly failures: Readonly<Record<string, SerializedFailure>>;
}

import type { Dimension } from "../types/rubric.ts";
import type { CitedPolarity, EvaluationDocument, EvaluationResult } from "../types/evaluation.ts";
import type { TokenUsage } from "../collaborator/types.ts";

// ── Text Evaluator (external collaborator) ──────────────────────────────────

export interface EvaluationRequest {
  readonly document: EvaluationDocument;
  readonly dimension: Dimension;
}

export interface CitedEvidence {
  /** Chunk the collaborator attributes the quote to, if any. */
  readonly chunkId?: string;
  readonly quote: string;
  readonly polarity: CitedPolarity;
}

/**
 * What a collaborator returns for one dimension. `tier` is validated by the
 * session against the dimension's declared tiers; it is a plain string here
 * because the collaborator is not trusted to stay inside the enumeration.
 */
export interface CollaboratorVerdict {
  readonly tier: string | null;
  readonly rationale: string;
  readonly evidence: readonly CitedEvidence[];
  /** False when the collaborator judged the dimension's subject matter absent. */
  readonly subjectPresent?: boolean;
  readonly uncertainty?: boolean;
  /** Tokens spent on the call, for collaborators that bill by token. */
  readonly usage?: TokenUsage;
}

export interface TextEvaluator {
  readonly name: string;
  evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<CollaboratorVerdict>;
}

// ── Evaluation Errors ───────────────────────────────────────────────────────

export type EvaluationErrorCode =
  | "COLLABORATOR_UNAVAILABLE"
  | "INVALID_TIER_RETURNED"
  | "RESPONSE_UNPARSEABLE"
  | "RESPONSE_TRUNCATED"
  | "ABORTED";

export class EvaluationError extends Error {
  override readonly name = "EvaluationError";

  constructor(
    message: string,
    public readonly code: EvaluationErrorCode,
    public readonly dimensionId: string | null,
    public override readonly cause?: Error,
  ) {
    super(message);
  }
}

// ── Outcomes ────────────────────────────────────────────────────────────────

export type DimensionOutcome =
  | {
      readonly status: "completed";
      readonly dimensionId: string;
      readonly result: EvaluationResult;
      readonly durationMs: number;
    }
  | {
      readonly status: "failed";
      readonly dimensionId: string;
      readonly error: EvaluationError;
      readonly durationMs: number;
    };

export interface DimensionFailure {
  readonly dimensionId: string;
  readonly error: EvaluationError;
}

export interface SessionOutcome {
  readonly documentId: string;
  /** Completed results in request order. */
  readonly results: readonly EvaluationResult[];
  /** Failed dimensions in request order. */
  readonly failures: readonly DimensionFailure[];
  readonly durationMs: number;
}

// ── Session Config ──────────────────────────────────────────────────────────

export interface SessionConfig {
  readonly maxConcurrency: number;
  readonly timeoutMs: number;
}

export function createDefaultSessionConfig(
  overrides?: Partial<SessionConfig>,
): SessionConfig {
  return {
    maxConcurrency: overrides?.maxConcurrency ?? 4,
    timeoutMs: overrides?.timeoutMs ?? 60_000,
  };
}

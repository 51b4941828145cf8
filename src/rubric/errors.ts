// ── Rubric Error Codes ───────────────────────────────────────────────────────

export type RubricErrorCode =
  | "MALFORMED_DIMENSION"
  | "UNKNOWN_DIMENSION"
  | "READ_FAILED";

// ── Rubric Error ─────────────────────────────────────────────────────────────

export class RubricError extends Error {
  constructor(
    message: string,
    public readonly code: RubricErrorCode,
    public readonly dimensionId?: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = "RubricError";
  }
}

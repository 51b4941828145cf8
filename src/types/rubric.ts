// ── Evidence Tiers ───────────────────────────────────────────────────────────

/** Ordered best to worst. */
export const EVIDENCE_TIERS = ["GOOD", "SOME", "LITTLE"] as const;

export type EvidenceTierLabel = (typeof EVIDENCE_TIERS)[number];

export function isEvidenceTierLabel(value: string): value is EvidenceTierLabel {
  return (EVIDENCE_TIERS as readonly string[]).includes(value);
}

export interface EvidenceTier {
  readonly label: EvidenceTierLabel;
  readonly criteria: string;
}

// ── Polarity ─────────────────────────────────────────────────────────────────

export const EVIDENCE_POLARITIES = ["positive", "negative"] as const;

export type EvidencePolarity = (typeof EVIDENCE_POLARITIES)[number];

/** Lower-cased textual cues that count for or against a positive assessment. */
export interface PolarityCues {
  readonly positive: readonly string[];
  readonly negative: readonly string[];
}

// ── Conditionality ───────────────────────────────────────────────────────────

/**
 * Marks a dimension whose subject matter may be legitimately absent from a
 * report (e.g. improvement actions in an after-action review). `cues` are
 * phrases whose presence shows the subject is there at all.
 */
export interface Conditionality {
  readonly subject: string;
  readonly cues: readonly string[];
}

// ── Dimension ────────────────────────────────────────────────────────────────

export interface Dimension {
  readonly id: string;
  readonly name: string;
  readonly purpose: string;
  readonly tiers: readonly EvidenceTier[];
  readonly polarity: PolarityCues;
  readonly constraints: readonly string[];
  readonly conditionality: Conditionality | null;
  /** Where the definition was loaded from (file path or caller label). */
  readonly source: string;
}

export interface DimensionSourceDocument {
  readonly source: string;
  readonly content: string;
}

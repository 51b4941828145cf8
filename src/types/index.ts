export {
  EVIDENCE_TIERS,
  EVIDENCE_POLARITIES,
  isEvidenceTierLabel,
  type EvidenceTierLabel,
  type EvidenceTier,
  type EvidencePolarity,
  type PolarityCues,
  type Conditionality,
  type Dimension,
  type DimensionSourceDocument,
} from "./rubric.ts";

export {
  NOT_EVIDENCED_LABEL,
  UNCLASSIFIED_POLARITY,
  outcomeLabel,
  type CitedPolarity,
  type DocumentChunk,
  type EvaluationDocument,
  type EvidenceItem,
  type EvaluationOutcome,
  type EvaluationResult,
} from "./evaluation.ts";

import type { Dimension, EvidenceTierLabel } from "../types/rubric.ts";
import type { EvidenceItem } from "../types/evaluation.ts";
import { UNCLASSIFIED_POLARITY } from "../types/evaluation.ts";
import { findCues } from "../document/evidence-resolver.ts";

/**
 * Decide whether an evidenced verdict should be flagged as uncertain.
 *
 * Guards never change the tier or relabel evidence; they only raise the flag
 * when the cited evidence does not plausibly support the rating.
 */
export function assessUncertainty(
  dimension: Dimension,
  tier: EvidenceTierLabel,
  evidence: readonly EvidenceItem[],
  declaredUncertainty: boolean,
): boolean {
  return uncertaintyReasons(dimension, tier, evidence, declaredUncertainty).length > 0;
}

export function uncertaintyReasons(
  dimension: Dimension,
  tier: EvidenceTierLabel,
  evidence: readonly EvidenceItem[],
  declaredUncertainty: boolean,
): string[] {
  const reasons: string[] = [];

  if (declaredUncertainty) {
    reasons.push("collaborator declared uncertainty");
  }

  if (evidence.length === 0) {
    reasons.push("no evidence cited");
    return reasons;
  }

  const best = dimension.tiers[0]?.label;
  const worst = dimension.tiers[dimension.tiers.length - 1]?.label;

  if (tier === best && !evidence.some((e) => e.polarity === "positive")) {
    reasons.push(`${tier} rating without positive evidence`);
  }
  if (tier === worst && !evidence.some((e) => e.polarity === "negative")) {
    reasons.push(`${tier} rating without negative evidence`);
  }

  for (const item of evidence) {
    if (item.chunkId === null) {
      reasons.push(`quote not found in document: "${item.quote}"`);
    }

    if (item.polarity === UNCLASSIFIED_POLARITY) {
      reasons.push(`quote has no evidence type: "${item.quote}"`);
      continue;
    }

    const cues = item.polarity === "positive" ? dimension.polarity.positive : dimension.polarity.negative;
    if (cues.length > 0 && findCues(item.quote, cues).length === 0) {
      reasons.push(`${item.polarity} quote has no ${item.polarity} cue: "${item.quote}"`);
    }
  }

  return reasons;
}

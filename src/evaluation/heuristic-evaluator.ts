import type { Dimension, EvidencePolarity, EvidenceTierLabel } from "../types/rubric.ts";
import { EVIDENCE_TIERS } from "../types/rubric.ts";
import type { DocumentChunk } from "../types/evaluation.ts";
import { documentText } from "../document/evaluation-document.ts";
import { findCues } from "../document/evidence-resolver.ts";
import type {
  CitedEvidence,
  CollaboratorVerdict,
  EvaluationRequest,
  TextEvaluator,
} from "./types.ts";
import { EvaluationError } from "./types.ts";

const MAX_ITEMS_PER_POLARITY = 3;
const MAX_QUOTE_WORDS = 25;

/**
 * Offline evaluator driven by each dimension's polarity cues.
 *
 * Cites the first cue-bearing sentence of each chunk. Negative cues alone give
 * the worst tier, positive cues alone the best, a mix (or nothing) the middle.
 */
export class CueHeuristicEvaluator implements TextEvaluator {
  readonly name = "heuristic";

  async evaluate(request: EvaluationRequest, signal: AbortSignal): Promise<CollaboratorVerdict> {
    if (signal.aborted) {
      throw new EvaluationError("Evaluation aborted", "ABORTED", request.dimension.id);
    }

    const { dimension, document } = request;

    if (dimension.conditionality) {
      const subjectCues = findCues(documentText(document), dimension.conditionality.cues);
      if (subjectCues.length === 0) {
        return {
          tier: null,
          rationale: `No ${dimension.conditionality.subject} found in the report.`,
          evidence: [],
          subjectPresent: false,
        };
      }
    }

    const positive = collectEvidence(document.chunks, dimension.polarity.positive, "positive");
    const negative = collectEvidence(document.chunks, dimension.polarity.negative, "negative");

    return {
      tier: pickDeclared(dimension, chooseTier(positive.items.length, negative.items.length)),
      rationale: buildRationale(dimension, positive, negative),
      evidence: [...positive.items, ...negative.items],
      uncertainty: positive.items.length === 0 && negative.items.length === 0,
    };
  }
}

// ── Evidence Collection ─────────────────────────────────────────────────────

interface Collected {
  readonly items: CitedEvidence[];
  readonly cues: string[];
}

function collectEvidence(
  chunks: readonly DocumentChunk[],
  cues: readonly string[],
  polarity: EvidencePolarity,
): Collected {
  const items: CitedEvidence[] = [];
  const matched = new Set<string>();

  for (const chunk of chunks) {
    if (items.length >= MAX_ITEMS_PER_POLARITY) break;

    for (const sentence of splitSentences(chunk.text)) {
      const found = findCues(sentence, cues);
      if (found.length === 0) continue;

      for (const cue of found) matched.add(cue);
      items.push({ chunkId: chunk.id, quote: truncateWords(sentence, MAX_QUOTE_WORDS), polarity });
      break;
    }
  }

  return { items, cues: [...matched] };
}

function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function truncateWords(text: string, maxWords: number): string {
  const words = text.split(/\s+/);
  return words.length <= maxWords ? text : words.slice(0, maxWords).join(" ");
}

// ── Rating ──────────────────────────────────────────────────────────────────

function chooseTier(positiveCount: number, negativeCount: number): EvidenceTierLabel {
  if (negativeCount > 0 && positiveCount === 0) return "LITTLE";
  if (positiveCount > 0 && negativeCount === 0) return "GOOD";
  return "SOME";
}

/** Nearest tier the dimension actually declares. */
function pickDeclared(dimension: Dimension, wanted: EvidenceTierLabel): EvidenceTierLabel {
  const declared = dimension.tiers.map((t) => t.label);
  if (declared.includes(wanted)) return wanted;

  const wantedRank = EVIDENCE_TIERS.indexOf(wanted);
  let best: EvidenceTierLabel = declared[0] ?? wanted;
  for (const label of declared) {
    const distance = Math.abs(EVIDENCE_TIERS.indexOf(label) - wantedRank);
    if (distance < Math.abs(EVIDENCE_TIERS.indexOf(best) - wantedRank)) {
      best = label;
    }
  }
  return best;
}

function buildRationale(dimension: Dimension, positive: Collected, negative: Collected): string {
  const p = positive.items.length;
  const n = negative.items.length;

  if (p === 0 && n === 0) {
    return `${dimension.name}: no passages match the dimension's cues.`;
  }
  if (p === 0) {
    return `${dimension.name}: ${n} passage(s) match negative cues (${negative.cues.join(", ")}) and none match positive cues.`;
  }
  if (n === 0) {
    return `${dimension.name}: ${p} passage(s) match positive cues (${positive.cues.join(", ")}) and none match negative cues.`;
  }
  return `${dimension.name}: ${p} passage(s) match positive cues (${positive.cues.join(", ")}) and ${n} match negative cues (${negative.cues.join(", ")}).`;
}

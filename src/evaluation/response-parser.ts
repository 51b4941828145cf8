import type { EvidencePolarity } from "../types/rubric.ts";
import { EVIDENCE_POLARITIES } from "../types/rubric.ts";
import { UNCLASSIFIED_POLARITY } from "../types/evaluation.ts";
import type { CitedEvidence, CollaboratorVerdict } from "./types.ts";
import { EvaluationError } from "./types.ts";

/**
 * Parse a model's grading response into a CollaboratorVerdict.
 *
 * Accepts bare JSON, JSON in a fenced code block, or JSON surrounded by prose
 * (first `{` to last `}`). Evidence items without a quote are dropped; an item
 * with a missing or unknown evidence_type is kept as unclassified and marks
 * the verdict uncertain. The rating is upper-cased but not validated here.
 *
 * @throws EvaluationError RESPONSE_UNPARSEABLE when no JSON object can be read.
 */
export function parseVerdict(content: string, dimensionId: string): CollaboratorVerdict {
  const obj = extractJsonObject(content);
  if (!obj) {
    throw new EvaluationError(
      `Collaborator did not return valid JSON for ${dimensionId}`,
      "RESPONSE_UNPARSEABLE",
      dimensionId,
    );
  }

  const rawRating = obj["rating"];
  const tier =
    typeof rawRating === "string" && rawRating.trim().length > 0
      ? rawRating.trim().toUpperCase()
      : null;

  const rawRationale = obj["rationale"];
  const rationale = typeof rawRationale === "string" ? rawRationale.trim() : "";

  const evidence: CitedEvidence[] = [];
  const rawEvidence = obj["evidence"];
  if (Array.isArray(rawEvidence)) {
    for (const item of rawEvidence) {
      const parsed = parseEvidenceItem(item);
      if (parsed) evidence.push(parsed);
    }
  }

  const verdict: CollaboratorVerdict = {
    tier,
    rationale,
    evidence,
    uncertainty:
      obj["uncertainty"] === true || evidence.some((e) => e.polarity === UNCLASSIFIED_POLARITY),
  };

  const subjectPresent = obj["subject_present"];
  return typeof subjectPresent === "boolean" ? { ...verdict, subjectPresent } : verdict;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function extractJsonObject(content: string): Record<string, unknown> | null {
  let text = content.trim();

  const codeBlockMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (codeBlockMatch) {
    text = (codeBlockMatch[1] ?? "").trim();
  }

  const direct = tryParseObject(text);
  if (direct) return direct;

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    return tryParseObject(text.slice(start, end + 1));
  }

  return null;
}

function tryParseObject(text: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

function parseEvidenceItem(item: unknown): CitedEvidence | null {
  if (!isRecord(item)) return null;

  const rawQuote = item["quote"];
  const quote = typeof rawQuote === "string" ? rawQuote.trim() : "";
  if (quote.length === 0) return null;

  const rawType = item["evidence_type"];
  const type = typeof rawType === "string" ? rawType.trim().toLowerCase() : "";
  const polarity = isPolarity(type) ? type : UNCLASSIFIED_POLARITY;

  const rawId = item["id"];
  return typeof rawId === "string" && rawId.trim().length > 0
    ? { chunkId: rawId.trim(), quote, polarity }
    : { quote, polarity };
}

function isPolarity(value: string): value is EvidencePolarity {
  return (EVIDENCE_POLARITIES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

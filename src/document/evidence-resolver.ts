import type { DocumentChunk, EvaluationDocument } from "../types/evaluation.ts";

// ── Text Normalisation ──────────────────────────────────────────────────────

const QUOTE_TRANSLATION: Readonly<Record<string, string>> = {
  "\u201C": '"',
  "\u201D": '"',
  "\u201E": '"',
  "\u201F": '"',
  "\u2018": "'",
  "\u2019": "'",
  "\u201A": "'",
  "\u201B": "'",
  "\u00A0": " ",
};

const HYPHEN_LINEBREAK = /(\w)[-\u2010\u2011]\s*\n\s*(\w)/g;

/**
 * Tolerant normalisation for matching model-supplied quotes against report
 * text: NFKC, straight quotes, joined hyphenated line breaks, collapsed
 * whitespace, lower case.
 */
export function normaliseForMatch(text: string): string {
  if (!text) return "";
  return text
    .normalize("NFKC")
    .replace(/[\u2018-\u201F\u00A0]/g, (ch) => QUOTE_TRANSLATION[ch] ?? ch)
    .replace(/\r\n/g, "\n")
    .replace(HYPHEN_LINEBREAK, "$1$2")
    .replace(/\s+/g, " ")
    .trim()
    .toLowerCase();
}

/**
 * Cues from `cues` that occur in `text` as whole words (both compared
 * normalised). A cue ending in `*` is a stem: `escalat*` matches
 * "escalated" and "escalation".
 */
export function findCues(text: string, cues: readonly string[]): string[] {
  const haystack = normaliseForMatch(text);
  return cues.filter((cue) => {
    const pattern = cuePattern(cue);
    return pattern !== null && pattern.test(haystack);
  });
}

const cachedPatterns = new Map<string, RegExp | null>();

function cuePattern(cue: string): RegExp | null {
  const cached = cachedPatterns.get(cue);
  if (cached !== undefined) return cached;

  const trimmed = cue.trim();
  const isStem = trimmed.endsWith("*");
  const needle = normaliseForMatch(isStem ? trimmed.slice(0, -1) : trimmed);

  const pattern =
    needle.length === 0
      ? null
      : new RegExp(`(?<![\\w])${escapeRegExp(needle)}${isStem ? "" : "(?![\\w])"}`);
  cachedPatterns.set(cue, pattern);
  return pattern;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// ── Evidence Resolution ─────────────────────────────────────────────────────

export interface ResolvedEvidence {
  readonly chunkId: string;
  readonly page: number | null;
}

/**
 * Locate a quote in the document.
 *
 * Trusts the cited chunk when the quote actually appears in it; otherwise
 * searches every chunk, which repairs mis-attributed citations. Returns null
 * when the quote cannot be found anywhere.
 */
export function resolveEvidence(
  doc: EvaluationDocument,
  chunkHint: string | undefined,
  quote: string,
): ResolvedEvidence | null {
  const needle = normaliseForMatch(stripTrailingPunctuation(quote));
  const hinted = chunkHint ? findChunk(doc, chunkHint) : undefined;

  if (hinted) {
    if (needle.length === 0 || normaliseForMatch(hinted.text).includes(needle)) {
      return { chunkId: hinted.id, page: hinted.page };
    }
  }

  if (needle.length === 0) return null;

  for (const chunk of doc.chunks) {
    if (normaliseForMatch(chunk.text).includes(needle)) {
      return { chunkId: chunk.id, page: chunk.page };
    }
  }

  return null;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

/** Accepts "c03", "C03" and "Text c03". */
function findChunk(doc: EvaluationDocument, hint: string): DocumentChunk | undefined {
  const match = hint.trim().match(/\b(c\d+)\b/i);
  if (!match) return undefined;
  const key = (match[1] ?? "").toLowerCase();
  return doc.chunks.find((c) => c.id === key);
}

function stripTrailingPunctuation(text: string): string {
  return text.trim().replace(/[.,;:!?]+$/, "");
}

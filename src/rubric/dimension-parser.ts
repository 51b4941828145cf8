import type {
  Conditionality,
  Dimension,
  DimensionSourceDocument,
  EvidenceTier,
} from "../types/rubric.ts";
import { EVIDENCE_TIERS, isEvidenceTierLabel } from "../types/rubric.ts";
import { RubricError } from "./errors.ts";
import { parseBulletList, parseFrontmatter, splitSections } from "./markdown.ts";

const DIMENSION_ID_PATTERN = /^[A-Za-z][A-Za-z0-9_-]*$/;

const SECTION = {
  purpose: "purpose",
  tiers: "evidence tiers",
  positive: "positive cues",
  negative: "negative cues",
  subject: "subject cues",
  constraints: "constraints",
} as const;

// ── Dimension Parser ─────────────────────────────────────────────────────────

/**
 * Parse one rubric document into a frozen Dimension.
 *
 * Expected layout: frontmatter with `id`, `name` and an optional
 * `conditional_subject`, then `## Purpose`, `## Evidence Tiers`
 * (`- GOOD: …` bullets) and the optional cue and constraint lists.
 */
export function parseDimensionDocument(doc: DimensionSourceDocument): Dimension {
  const { frontmatter, body } = parseFrontmatter(doc.content, doc.source);

  const rawId = frontmatter["id"];
  const id = typeof rawId === "string" ? rawId.trim() : "";
  if (!DIMENSION_ID_PATTERN.test(id)) {
    throw malformed(
      `Rubric document ${doc.source} must declare an alphanumeric 'id' in its frontmatter`,
      doc.source,
    );
  }

  const rawName = frontmatter["name"];
  const name = typeof rawName === "string" && rawName.trim().length > 0 ? rawName.trim() : id;

  const sections = splitSections(body);

  const purpose = collapseWhitespace(sections.get(SECTION.purpose) ?? "");
  if (purpose.length === 0) {
    throw malformed(`Dimension ${id} lacks a purpose section`, doc.source, id);
  }

  const tiers = parseTiers(sections.get(SECTION.tiers) ?? "", id, doc.source);

  const polarity = {
    positive: parseCues(sections.get(SECTION.positive)),
    negative: parseCues(sections.get(SECTION.negative)),
  };

  const conditionality = parseConditionality(
    frontmatter["conditional_subject"],
    sections.get(SECTION.subject),
    id,
    doc.source,
  );

  const constraints = parseBulletList(sections.get(SECTION.constraints) ?? "");

  return deepFreeze({
    id,
    name,
    purpose,
    tiers,
    polarity,
    constraints,
    conditionality,
    source: doc.source,
  });
}

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseTiers(content: string, id: string, source: string): EvidenceTier[] {
  const items = parseBulletList(content);
  if (items.length === 0) {
    throw malformed(`Dimension ${id} lacks evidence tiers`, source, id);
  }

  const byLabel = new Map<string, EvidenceTier>();
  for (const item of items) {
    const colonIndex = item.indexOf(":");
    const label = (colonIndex === -1 ? item : item.slice(0, colonIndex)).trim().toUpperCase();
    const criteria = colonIndex === -1 ? "" : item.slice(colonIndex + 1).trim();

    if (!isEvidenceTierLabel(label)) {
      throw malformed(
        `Dimension ${id} declares unknown evidence tier "${label}" (expected one of: ${EVIDENCE_TIERS.join(", ")})`,
        source,
        id,
      );
    }
    if (byLabel.has(label)) {
      throw malformed(`Dimension ${id} declares evidence tier ${label} more than once`, source, id);
    }
    if (criteria.length === 0) {
      throw malformed(`Dimension ${id} tier ${label} has no criteria text`, source, id);
    }
    byLabel.set(label, { label, criteria });
  }

  // Canonical best-to-worst order regardless of authoring order
  return EVIDENCE_TIERS.flatMap((label) => {
    const tier = byLabel.get(label);
    return tier ? [tier] : [];
  });
}

function parseCues(content: string | undefined): string[] {
  if (!content) return [];
  const seen = new Set<string>();
  for (const cue of parseBulletList(content)) {
    seen.add(cue.toLowerCase());
  }
  return [...seen];
}

function parseConditionality(
  rawSubject: unknown,
  subjectCues: string | undefined,
  id: string,
  source: string,
): Conditionality | null {
  if (rawSubject === undefined || rawSubject === null) return null;

  if (typeof rawSubject !== "string" || rawSubject.trim().length === 0) {
    throw malformed(`Dimension ${id} 'conditional_subject' must be a non-empty string`, source, id);
  }

  const cues = parseCues(subjectCues);
  if (cues.length === 0) {
    throw malformed(
      `Dimension ${id} is conditional on "${rawSubject.trim()}" but has no subject cues`,
      source,
      id,
    );
  }

  return { subject: rawSubject.trim(), cues };
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function malformed(message: string, source: string, id?: string): RubricError {
  return new RubricError(message, "MALFORMED_DIMENSION", id, source);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

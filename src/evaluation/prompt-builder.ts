import type { Dimension } from "../types/rubric.ts";
import type { EvaluationDocument } from "../types/evaluation.ts";

const MAX_QUOTE_WORDS = 25;

// ── Prompt Builder ──────────────────────────────────────────────────────────

export interface EvaluationPrompt {
  readonly systemPrompt: string;
  readonly userMessage: string;
}

export function buildEvaluationPrompt(
  dimension: Dimension,
  document: EvaluationDocument,
): EvaluationPrompt {
  return {
    systemPrompt: buildSystemPrompt(dimension),
    userMessage: buildUserMessage(document),
  };
}

// ── System Prompt ───────────────────────────────────────────────────────────

function buildSystemPrompt(dimension: Dimension): string {
  const sections: string[] = [];

  sections.push(
    [
      "You are an expert reviewer assessing the quality of an incident learning report.",
      "Judge ONE dimension only and base your judgement ONLY on the evidence provided.",
    ].join("\n"),
  );

  sections.push(`## Dimension ${dimension.id}: ${dimension.name}\n\n${dimension.purpose}`);

  sections.push(
    [
      "## Rating Options\n",
      ...dimension.tiers.map((t) => `- ${t.label}: ${t.criteria}`),
    ].join("\n"),
  );

  if (dimension.polarity.positive.length > 0 || dimension.polarity.negative.length > 0) {
    const lines = ["## Polarity Cues\n"];
    if (dimension.polarity.positive.length > 0) {
      lines.push(`- Positive (supports the dimension): ${dimension.polarity.positive.join(", ")}`);
    }
    if (dimension.polarity.negative.length > 0) {
      lines.push(`- Negative (weakens the dimension): ${dimension.polarity.negative.join(", ")}`);
    }
    sections.push(lines.join("\n"));
  }

  if (dimension.conditionality) {
    const { subject } = dimension.conditionality;
    sections.push(
      [
        "## Conditional Subject\n",
        `The ${subject} this dimension judges may legitimately be absent from a report.`,
        `If the report contains no ${subject}, do NOT return the lowest rating for that reason.`,
        `Instead set "subject_present" to false, set "rating" to null and explain the limitation.`,
      ].join("\n"),
    );
  }

  if (dimension.constraints.length > 0) {
    sections.push(["## Constraints\n", ...dimension.constraints.map((c) => `- ${c}`)].join("\n"));
  }

  const ratingChoices = dimension.tiers.map((t) => `"${t.label}"`).join(" | ");
  sections.push(
    [
      "## Response Format\n",
      "Return STRICT JSON ONLY (no markdown, no extra text):",
      "{",
      `  "rating": ${ratingChoices}${dimension.conditionality ? " | null" : ""},`,
      '  "rationale": "string",',
      '  "evidence": [',
      `    { "id": "cNN", "quote": "verbatim excerpt, <= ${MAX_QUOTE_WORDS} words", "evidence_type": "positive" | "negative" }`,
      "  ],",
      ...(dimension.conditionality ? ['  "subject_present": true | false,'] : []),
      '  "uncertainty": true | false',
      "}",
    ].join("\n"),
  );

  sections.push(
    [
      "## Rules\n",
      "- Explain your rationale in detail and say why each cited excerpt supports it.",
      `- Every evidence item MUST include a verbatim quote (<= ${MAX_QUOTE_WORDS} words) and the id of the block it comes from.`,
      '- "positive" evidence supports the dimension; "negative" evidence weakens it.',
      `- If the rating is ${dimension.tiers[0]?.label ?? "the best tier"}, include at least one positive evidence item.`,
      `- If the rating is ${dimension.tiers[dimension.tiers.length - 1]?.label ?? "the worst tier"}, include at least one negative evidence item if such text exists.`,
      "- If you cannot find any relevant excerpt, set evidence to [] and uncertainty to true.",
      "- Do not paraphrase quotes. Do not assess other dimensions.",
    ].join("\n"),
  );

  return sections.join("\n\n");
}

// ── User Message ────────────────────────────────────────────────────────────

function buildUserMessage(document: EvaluationDocument): string {
  const blocks = document.chunks.map((chunk) => {
    const page = chunk.page !== null ? ` | page ${chunk.page}` : "";
    return `[${chunk.id}${page}]\n${chunk.text}`;
  });

  return [
    `## Report: ${document.id}`,
    blocks.length > 0 ? blocks.join("\n\n") : "(The report is empty.)",
  ].join("\n\n");
}

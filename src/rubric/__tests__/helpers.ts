import type { DimensionSourceDocument } from "../../types/rubric.ts";

export interface RubricDocOptions {
  readonly id?: string;
  readonly name?: string;
  readonly conditionalSubject?: string;
  readonly purpose?: string;
  readonly tiers?: readonly string[];
  readonly positive?: readonly string[];
  readonly negative?: readonly string[];
  readonly subjectCues?: readonly string[];
  readonly constraints?: readonly string[];
}

/** Build a rubric markdown document; pass an empty array/string to omit a section. */
export function rubricDoc(options: RubricDocOptions = {}): DimensionSourceDocument {
  const id = options.id ?? "D6";
  const frontmatter = [`id: ${id}`, `name: ${options.name ?? "Test dimension"}`];
  if (options.conditionalSubject) {
    frontmatter.push(`conditional_subject: ${options.conditionalSubject}`);
  }

  const sections: string[] = [];
  const purpose = options.purpose ?? "Tests the rubric loader.";
  if (purpose) sections.push(`## Purpose\n\n${purpose}`);

  const tiers = options.tiers ?? ["GOOD: strong", "SOME: partial", "LITTLE: weak"];
  if (tiers.length > 0) sections.push(`## Evidence Tiers\n\n${bullets(tiers)}`);

  const lists: Array<[string, readonly string[] | undefined]> = [
    ["Positive Cues", options.positive],
    ["Negative Cues", options.negative],
    ["Subject Cues", options.subjectCues],
    ["Constraints", options.constraints],
  ];
  for (const [heading, items] of lists) {
    if (items && items.length > 0) sections.push(`## ${heading}\n\n${bullets(items)}`);
  }

  return {
    source: `${id}.md`,
    content: `---\n${frontmatter.join("\n")}\n---\n\n${sections.join("\n\n")}\n`,
  };
}

function bullets(items: readonly string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

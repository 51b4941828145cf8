import { parse as parseYaml } from "yaml";
import { RubricError } from "./errors.ts";

// ── Frontmatter Parser ───────────────────────────────────────────────────────

export interface ParsedMarkdown {
  readonly frontmatter: Record<string, unknown>;
  readonly body: string;
}

/**
 * Split a markdown string into YAML frontmatter and body.
 * Delimiters must be `---` on their own line so that horizontal rules in the
 * body are not mistaken for the closing fence.
 */
export function parseFrontmatter(markdown: string, source = "<inline>"): ParsedMarkdown {
  const trimmed = markdown.replace(/\r\n/g, "\n").trim();

  const fmPattern = /^---[ \t]*\n([\s\S]*?\n)?---[ \t]*(?:\n([\s\S]*))?$/;
  const match = trimmed.match(fmPattern);

  if (!match) {
    if (/^---[ \t]*\n/.test(trimmed) && !/\n---[ \t]*(\n|$)/.test(trimmed)) {
      throw new RubricError(
        "Malformed frontmatter: missing closing ---",
        "MALFORMED_DIMENSION",
        undefined,
        source,
      );
    }
    return { frontmatter: {}, body: trimmed };
  }

  const frontmatterStr = (match[1] ?? "").trim();
  const body = (match[2] ?? "").trim();

  let raw: unknown;
  try {
    raw = frontmatterStr.length > 0 ? parseYaml(frontmatterStr) : {};
  } catch (err: unknown) {
    throw new RubricError(
      `Malformed frontmatter: ${err instanceof Error ? err.message : String(err)}`,
      "MALFORMED_DIMENSION",
      undefined,
      source,
    );
  }

  if (raw === null || raw === undefined) {
    return { frontmatter: {}, body };
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new RubricError(
      "Malformed frontmatter: expected a mapping of keys to values",
      "MALFORMED_DIMENSION",
      undefined,
      source,
    );
  }

  return { frontmatter: { ...raw }, body };
}

// ── Sections ─────────────────────────────────────────────────────────────────

/**
 * Group body lines under their level-2 headings. Keys are lower-cased heading
 * text; content before the first `##` heading is dropped.
 */
export function splitSections(body: string): Map<string, string> {
  const sections = new Map<string, string>();
  let current: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (current !== null) {
      const existing = sections.get(current);
      const content = buffer.join("\n").trim();
      sections.set(current, existing ? `${existing}\n${content}` : content);
    }
  };

  for (const line of body.split("\n")) {
    const heading = line.match(/^##[ \t]+(.+?)[ \t]*#*[ \t]*$/);
    if (heading) {
      flush();
      current = (heading[1] ?? "").trim().toLowerCase();
      buffer = [];
      continue;
    }
    buffer.push(line);
  }
  flush();

  return sections;
}

// ── Bullet Lists ─────────────────────────────────────────────────────────────

/**
 * Read `- item` / `* item` lines. Indented lines that follow a bullet are
 * folded into it; anything else is ignored.
 */
export function parseBulletList(content: string): string[] {
  const items: string[] = [];

  for (const line of content.split("\n")) {
    const bullet = line.match(/^[ \t]*[-*][ \t]+(.*)$/);
    if (bullet) {
      const text = (bullet[1] ?? "").trim();
      if (text.length > 0) items.push(text);
      continue;
    }

    const continuation = line.match(/^[ \t]+(\S.*)$/);
    if (continuation && items.length > 0) {
      const lastIndex = items.length - 1;
      items[lastIndex] = `${items[lastIndex] ?? ""} ${(continuation[1] ?? "").trim()}`;
    }
  }

  return items;
}

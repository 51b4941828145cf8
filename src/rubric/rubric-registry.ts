import { readFile, readdir } from "node:fs/promises";
import { resolve } from "node:path";
import type { Dimension, DimensionSourceDocument } from "../types/rubric.ts";
import { parseDimensionDocument } from "./dimension-parser.ts";
import { RubricError } from "./errors.ts";

// ── Rubric Registry ──────────────────────────────────────────────────────────

/**
 * Immutable, in-memory set of rubric dimensions.
 *
 * Built once at startup from rubric markdown documents and read-only from
 * then on, so it can be shared across concurrent evaluations without locking.
 */
export class RubricRegistry {
  readonly dimensionIds: readonly string[];
  private readonly byId: ReadonlyMap<string, Dimension>;

  private constructor(dimensions: readonly Dimension[]) {
    const byId = new Map<string, Dimension>();
    for (const dimension of dimensions) {
      byId.set(dimension.id, dimension);
    }
    this.byId = byId;
    this.dimensionIds = Object.freeze([...byId.keys()].sort(compareDimensionIds));
    Object.freeze(this);
  }

  /**
   * Parse and register a set of rubric documents.
   * @throws RubricError MALFORMED_DIMENSION on any invalid document or a repeated id.
   */
  static load(sourceDocuments: readonly DimensionSourceDocument[]): RubricRegistry {
    const dimensions: Dimension[] = [];
    const seen = new Map<string, string>();

    for (const doc of sourceDocuments) {
      const dimension = parseDimensionDocument(doc);
      const previous = seen.get(dimension.id);
      if (previous !== undefined) {
        throw new RubricError(
          `Dimension ${dimension.id} is defined twice (${previous} and ${doc.source})`,
          "MALFORMED_DIMENSION",
          dimension.id,
          doc.source,
        );
      }
      seen.set(dimension.id, doc.source);
      dimensions.push(dimension);
    }

    return new RubricRegistry(dimensions);
  }

  /**
   * Load every `*.md` rubric document in a directory (sorted by file name).
   */
  static async fromDirectory(dir: string): Promise<RubricRegistry> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (err: unknown) {
      throw new RubricError(
        `Failed to read rubric directory ${dir}: ${err instanceof Error ? err.message : String(err)}`,
        "READ_FAILED",
        undefined,
        dir,
      );
    }

    const files = entries.filter((e) => e.toLowerCase().endsWith(".md")).sort();
    const documents: DimensionSourceDocument[] = [];
    for (const file of files) {
      const path = resolve(dir, file);
      try {
        documents.push({ source: path, content: await readFile(path, "utf-8") });
      } catch (err: unknown) {
        throw new RubricError(
          `Failed to read rubric document ${path}: ${err instanceof Error ? err.message : String(err)}`,
          "READ_FAILED",
          undefined,
          path,
        );
      }
    }

    return RubricRegistry.load(documents);
  }

  // ── Query Methods ───────────────────────────────────────────────────────

  /**
   * @throws RubricError UNKNOWN_DIMENSION when the id is not registered.
   */
  get(dimensionId: string): Dimension {
    const dimension = this.byId.get(dimensionId);
    if (!dimension) {
      throw new RubricError(
        `Unknown dimension "${dimensionId}". Known dimensions: ${this.dimensionIds.join(", ") || "(none)"}`,
        "UNKNOWN_DIMENSION",
        dimensionId,
      );
    }
    return dimension;
  }

  has(dimensionId: string): boolean {
    return this.byId.has(dimensionId);
  }

  get dimensions(): readonly Dimension[] {
    return this.dimensionIds.map((id) => this.get(id));
  }

  get size(): number {
    return this.byId.size;
  }
}

/** D2 sorts before D10. */
export function compareDimensionIds(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true, sensitivity: "base" });
}

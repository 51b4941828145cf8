import type { DocumentChunk, EvaluationDocument } from "../types/evaluation.ts";

/**
 * Split report text into citeable chunks.
 *
 * Paragraphs (blank-line separated) become chunks `c01`, `c02`, …. A form feed
 * starts a new page; page numbers are only assigned when the text contains one.
 */
export function createDocument(id: string, text: string): EvaluationDocument {
  const pages = text.split("\f");
  return buildDocument(id, pages, pages.length > 1);
}

/** Like createDocument, for text that already comes split by page (e.g. a PDF). */
export function createPagedDocument(id: string, pages: readonly string[]): EvaluationDocument {
  return buildDocument(id, pages, true);
}

function buildDocument(id: string, pages: readonly string[], paged: boolean): EvaluationDocument {
  const chunks: DocumentChunk[] = [];
  pages.forEach((pageText, pageIndex) => {
    for (const paragraph of pageText.replace(/\r\n/g, "\n").split(/\n[ \t]*\n/)) {
      const trimmed = paragraph.trim();
      if (trimmed.length === 0) continue;
      chunks.push({
        id: formatChunkId(chunks.length + 1),
        page: paged ? pageIndex + 1 : null,
        text: trimmed,
      });
    }
  });

  return Object.freeze({ id, chunks: Object.freeze(chunks) });
}

/** Rejoin chunks into plain text. */
export function documentText(doc: EvaluationDocument): string {
  return doc.chunks.map((c) => c.text).join("\n\n");
}

export function formatChunkId(n: number): string {
  return `c${String(n).padStart(2, "0")}`;
}

import { extractText, getDocumentProxy } from "unpdf";
import type { EvaluationDocument } from "../types/evaluation.ts";
import { errorMessage, toError } from "../collaborator/utils.ts";
import { createPagedDocument } from "./evaluation-document.ts";
import { DocumentError } from "./errors.ts";

/** Text of each page, in page order. */
export async function readPdfPages(data: Uint8Array, source = "PDF"): Promise<string[]> {
  let pages: string[];
  try {
    const pdf = await getDocumentProxy(data);
    const { text } = await extractText(pdf, { mergePages: false });
    pages = Array.isArray(text) ? text : [text];
  } catch (err: unknown) {
    throw new DocumentError(
      `Could not read ${source} as a PDF: ${errorMessage(err)}`,
      "PDF_UNREADABLE",
      toError(err),
    );
  }

  // Scanned reports have pages but no text layer
  if (pages.every((page) => page.trim().length === 0)) {
    throw new DocumentError(`${source} has no extractable text`, "NO_TEXT");
  }
  return pages;
}

/** Chunks every page of a PDF report, keeping page numbers for citations. */
export async function createPdfDocument(
  id: string,
  data: Uint8Array,
  source?: string,
): Promise<EvaluationDocument> {
  return createPagedDocument(id, await readPdfPages(data, source));
}

export {
  createDocument,
  createPagedDocument,
  documentText,
  formatChunkId,
} from "./evaluation-document.ts";
export { createPdfDocument, readPdfPages } from "./pdf-document.ts";
export { DocumentError, type DocumentErrorCode } from "./errors.ts";
export {
  normaliseForMatch,
  findCues,
  resolveEvidence,
  type ResolvedEvidence,
} from "./evidence-resolver.ts";

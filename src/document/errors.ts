export type DocumentErrorCode = "PDF_UNREADABLE" | "NO_TEXT";

export class DocumentError extends Error {
  override readonly name = "DocumentError";

  constructor(
    message: string,
    public readonly code: DocumentErrorCode,
    public override readonly cause?: Error,
  ) {
    super(message);
  }
}

export type ClauseExtractionErrorKind =
  | "NotFound"
  | "PermissionDenied"
  | "MalformedInput"
  | "EmptyExtraction"
  | "NoStructureDetected"
  | "InvalidConfiguration"
  | "UploadTooLarge"
  | "InvalidUpload";

const HTTP_STATUS_BY_KIND: Record<ClauseExtractionErrorKind, number> = {
  NotFound: 404,
  PermissionDenied: 403,
  MalformedInput: 422,
  EmptyExtraction: 422,
  NoStructureDetected: 422,
  InvalidConfiguration: 500,
  UploadTooLarge: 413,
  InvalidUpload: 400,
};

export class ClauseExtractionError extends Error {
  readonly kind: ClauseExtractionErrorKind;

  constructor(kind: ClauseExtractionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ClauseExtractionError";
    this.kind = kind;
  }
}

export const isClauseExtractionError = (value: unknown): value is ClauseExtractionError =>
  value instanceof ClauseExtractionError;

export const httpStatusForError = (kind: ClauseExtractionErrorKind): number =>
  HTTP_STATUS_BY_KIND[kind];

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

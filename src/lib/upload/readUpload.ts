import { ClauseExtractionError } from "@/lib/errors";

export const MAX_UPLOAD_SIZE = 10 * 1024 * 1024;
export const UPLOAD_FIELD = "pdf";

// Multipart framing around the file itself.
const ENVELOPE_ALLOWANCE = 64 * 1024;

export const assertContentLength = (headers: Headers): void => {
  const declared = Number.parseInt(headers.get("content-length") ?? "0", 10);
  if (Number.isFinite(declared) && declared > MAX_UPLOAD_SIZE + ENVELOPE_ALLOWANCE) {
    throw new ClauseExtractionError("UploadTooLarge", "Upload exceeds size limit.");
  }
};

export const readPdfUpload = async (request: Request): Promise<File> => {
  assertContentLength(request.headers);

  let formData: FormData;
  try {
    formData = await request.formData();
  } catch (error) {
    throw new ClauseExtractionError("InvalidUpload", "Failed to parse upload.", { cause: error });
  }

  const pdf = formData.get(UPLOAD_FIELD);
  if (!(pdf instanceof File)) {
    throw new ClauseExtractionError("InvalidUpload", "No PDF file provided.");
  }

  if (pdf.size === 0) {
    throw new ClauseExtractionError("InvalidUpload", "Uploaded file is empty.");
  }

  if (pdf.size > MAX_UPLOAD_SIZE) {
    throw new ClauseExtractionError("UploadTooLarge", "Uploaded file exceeds size limit.");
  }

  return pdf;
};

export const uploadBaseName = (fileName: string): string =>
  fileName.replace(/\.[^./\\]+$/, "").replace(/[^a-zA-Z0-9._-]/g, "_") || "clauses";

import { NextResponse } from "next/server";
import { loadExtractionConfigFromEnv } from "@/lib/config/extractionConfig";
import { httpStatusForError, isClauseExtractionError } from "@/lib/errors";
import { assertPdfRuntimeCompatible } from "@/lib/runtime/pdfRuntime";
import { getDefaultExpiryMs, saveExtraction } from "@/lib/store/extractionStore";
import { readPdfUpload } from "@/lib/upload/readUpload";
import type { ExtractionResult } from "@/types/clauses";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";
export const maxDuration = 60;

const asUint8Array = async (file: File): Promise<Uint8Array> =>
  new Uint8Array(await file.arrayBuffer());

export async function GET() {
  return NextResponse.json(
    { error: "Method not allowed. Use POST /api/extract with a pdf file." },
    {
      status: 405,
      headers: { Allow: "POST" },
    },
  );
}

export async function POST(request: Request) {
  try {
    assertPdfRuntimeCompatible();

    const [{ extractClausesFromPdf, toClauseData }, { toClauseRecords, toClauseTable }, { writeClausesWorkbook }] =
      await Promise.all([
        import("@/lib/clauses/extractClauses"),
        import("@/lib/export/serializeClauses"),
        import("@/lib/export/writeWorkbook"),
      ]);

    const upload = await readPdfUpload(request);
    const config = await loadExtractionConfigFromEnv();
    const { clauses, rows } = toClauseData(
      await extractClausesFromPdf(await asUint8Array(upload), config),
    );

    const extractionId = crypto.randomUUID();
    const expiresAtMs = getDefaultExpiryMs();
    const result: ExtractionResult = {
      id: extractionId,
      fileName: upload.name || "document.pdf",
      expiresAt: new Date(expiresAtMs).toISOString(),
      records: toClauseRecords(clauses),
      table: toClauseTable(rows),
      generatedAt: new Date().toISOString(),
    };

    saveExtraction({
      result,
      workbook: writeClausesWorkbook(rows),
      expiresAtMs,
    });

    return NextResponse.json({
      extractionId,
      result,
      summary: {
        clauses: rows.length - 1,
        rows: rows.length,
      },
    });
  } catch (error) {
    if (isClauseExtractionError(error)) {
      console.warn("Clause extraction rejected upload", { kind: error.kind, message: error.message });
      return NextResponse.json(
        { error: error.message, kind: error.kind },
        { status: httpStatusForError(error.kind) },
      );
    }

    console.error("Failed to extract clauses", error);
    return NextResponse.json(
      { error: "Unable to process the PDF." },
      { status: 500 },
    );
  }
}

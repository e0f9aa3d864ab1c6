import fs from "node:fs/promises";
import path from "node:path";
import { buildClauseTree } from "@/lib/clauses/buildClauseTree";
import { findHeadings } from "@/lib/clauses/headingDetector";
import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import { ClauseExtractionError, describeError } from "@/lib/errors";
import { clausesToRows } from "@/lib/export/serializeClauses";
import { assembleLines } from "@/lib/layout/lines";
import { extractFragments } from "@/lib/pdf/extractFragments";
import type { Clause, ClauseRow, Fragment } from "@/types/clauses";

export type ClauseData = {
  clauses: Clause[];
  rows: ClauseRow[];
};

export const buildClausesFromFragments = (
  fragments: readonly Fragment[],
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Clause[] => {
  const lines = assembleLines(fragments, config);
  if (lines.length === 0) {
    throw new ClauseExtractionError("EmptyExtraction", "No text extracted from PDF.");
  }

  const headings = findHeadings(lines, config);
  const clauses = buildClauseTree(lines, headings, config);
  if (clauses.length === 0) {
    throw new ClauseExtractionError(
      "NoStructureDetected",
      "No clauses were detected in the document.",
    );
  }

  return clauses;
};

export const extractClausesFromPdf = async (
  data: Uint8Array,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Promise<Clause[]> => buildClausesFromFragments(await extractFragments(data, config), config);

const fileErrorCode = (error: unknown): unknown =>
  typeof error === "object" && error !== null && "code" in error ? error.code : undefined;

export const toPdfReadError = (filePath: string, error: unknown): ClauseExtractionError => {
  const code = fileErrorCode(error);
  if (code === "ENOENT" || code === "ENOTDIR") {
    return new ClauseExtractionError("NotFound", `PDF not found: ${filePath}`, { cause: error });
  }

  if (code === "EACCES" || code === "EPERM") {
    return new ClauseExtractionError(
      "PermissionDenied",
      `PDF is not readable: ${filePath}`,
      { cause: error },
    );
  }

  return new ClauseExtractionError(
    "MalformedInput",
    `Unable to read PDF ${filePath}: ${describeError(error)}`,
    { cause: error },
  );
};

const readPdfFile = async (filePath: string): Promise<Uint8Array> => {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (error) {
    throw toPdfReadError(filePath, error);
  }
};

export const extractClausesFromFile = async (
  filePath: string,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Promise<Clause[]> => extractClausesFromPdf(await readPdfFile(path.resolve(filePath)), config);

export const toClauseData = (clauses: Clause[]): ClauseData => ({
  clauses,
  rows: clausesToRows(clauses),
});

export const extractClauseData = async (
  filePath: string,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Promise<ClauseData> => toClauseData(await extractClausesFromFile(filePath, config));

import fs from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { serializeClauseRecords } from "@/lib/export/serializeClauses";
import type { Clause, ClauseRow } from "@/types/clauses";

export const CLAUSE_SHEET_NAME = "Clauses";
export const XLSX_CONTENT_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const COLUMN_WIDTHS = [12, 40, 12, 8, 100];

export const writeClausesWorkbook = (rows: readonly ClauseRow[]): Buffer => {
  // Empty values stay empty cells rather than empty strings.
  const cells = rows.map((row) => row.map((value) => (value ? value : null)));
  const sheet = XLSX.utils.aoa_to_sheet(cells);
  sheet["!cols"] = COLUMN_WIDTHS.map((wch) => ({ wch }));

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, CLAUSE_SHEET_NAME);

  const output: unknown = XLSX.write(workbook, {
    type: "buffer",
    bookType: "xlsx",
    bookSST: false,
    compression: true,
  });
  if (!Buffer.isBuffer(output)) {
    throw new Error("Workbook writer did not return a buffer.");
  }

  return output;
};

export type WrittenClauseOutputs = {
  jsonPath: string;
  xlsxPath: string;
};

export const writeClauseOutputs = async (
  outputDir: string,
  clauses: readonly Clause[],
  rows: readonly ClauseRow[],
): Promise<WrittenClauseOutputs> => {
  await fs.mkdir(outputDir, { recursive: true });

  const jsonPath = path.join(outputDir, "clauses.json");
  const xlsxPath = path.join(outputDir, "clauses.xlsx");
  await Promise.all([
    fs.writeFile(jsonPath, serializeClauseRecords(clauses), "utf8"),
    fs.writeFile(xlsxPath, writeClausesWorkbook(rows)),
  ]);

  return { jsonPath, xlsxPath };
};

import path from "node:path";
import { getHelpText, getValidationError, parseArgs } from "@/cli/args";
import { extractClauseData } from "@/lib/clauses/extractClauses";
import {
  DEFAULT_EXTRACTION_CONFIG,
  loadExtractionConfigFile,
} from "@/lib/config/extractionConfig";
import { isClauseExtractionError } from "@/lib/errors";
import { writeClauseOutputs } from "@/lib/export/writeWorkbook";
import { isPdfRuntimeCompatible, getPdfRuntimeRequirementMessage } from "@/lib/runtime/pdfRuntime";

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export async function runCli(argv: string[], io: CliIo = consoleIo): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    io.stdout(getHelpText());
    return 0;
  }

  const validationError = getValidationError(args);
  if (validationError || !args.pdfPath) {
    io.stderr(validationError ?? "Missing PDF path.");
    io.stderr(getHelpText());
    return 1;
  }

  if (!isPdfRuntimeCompatible()) {
    io.stderr(getPdfRuntimeRequirementMessage());
    return 1;
  }

  try {
    const config = args.configPath
      ? await loadExtractionConfigFile(args.configPath)
      : DEFAULT_EXTRACTION_CONFIG;
    const { clauses, rows } = await extractClauseData(args.pdfPath, config);
    const { jsonPath, xlsxPath } = await writeClauseOutputs(
      path.resolve(args.outputDir),
      clauses,
      rows,
    );

    io.stdout(`Wrote JSON: ${jsonPath}`);
    io.stdout(`Wrote Excel: ${xlsxPath}`);
    return 0;
  } catch (error) {
    if (isClauseExtractionError(error)) {
      io.stderr(error.message);
      return 1;
    }

    throw error;
  }
}

import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import {
  getDocument,
  GlobalWorkerOptions,
  VerbosityLevel,
} from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PDFPageProxy } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import { ClauseExtractionError, describeError } from "@/lib/errors";
import type { Fragment } from "@/types/clauses";

type PositionedRun = {
  text: string;
  x: number;
  baseline: number;
  width: number;
  height: number;
  fontName: string;
};

type FontObjectLookup = {
  has: (id: string) => boolean;
  get: (id: string) => unknown;
};

const INVALID_PAGE_REQUEST_PATTERN = /invalid page request/i;

const PDFJS_ROOT_CANDIDATES = [
  path.join(process.cwd(), "node_modules/pdfjs-dist/legacy/build"),
  path.join(process.cwd(), "node_modules/pdfjs-dist/build"),
];

const configurePdfJsWorker = () => {
  const resolvedPath = PDFJS_ROOT_CANDIDATES.map((dir) => path.join(dir, "pdf.worker.mjs")).find(
    (candidate) => fs.existsSync(candidate),
  );
  if (resolvedPath) {
    GlobalWorkerOptions.workerSrc = pathToFileURL(resolvedPath).href;
  }
};

configurePdfJsWorker();

const resolveStandardFontDataUrl = (): string | undefined => {
  const candidate = path.join(process.cwd(), "node_modules/pdfjs-dist/standard_fonts");
  return fs.existsSync(candidate) ? `${candidate}${path.sep}` : undefined;
};

const isInvalidPageRequestError = (error: unknown): boolean =>
  error instanceof Error && INVALID_PAGE_REQUEST_PATTERN.test(error.message);

const errorName = (error: unknown): string =>
  typeof error === "object" && error !== null && "name" in error && typeof error.name === "string"
    ? error.name
    : "";

export const toPdfLoadError = (error: unknown): ClauseExtractionError => {
  if (errorName(error) === "PasswordException") {
    return new ClauseExtractionError(
      "PermissionDenied",
      "Text extraction is not permitted for this PDF.",
      { cause: error },
    );
  }

  return new ClauseExtractionError(
    "MalformedInput",
    `Failed to parse PDF structure: ${describeError(error)}`,
    { cause: error },
  );
};

export const isBoldFontName = (
  fontName: string,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): boolean => {
  const lowered = fontName.toLowerCase();
  return config.boldFontMarkers.some((marker) => lowered.includes(marker));
};

const isFontObjectLookup = (value: unknown): value is FontObjectLookup =>
  typeof value === "object" &&
  value !== null &&
  "has" in value &&
  typeof value.has === "function" &&
  "get" in value &&
  typeof value.get === "function";

const readFontObjectName = (lookup: FontObjectLookup, id: string): string | null => {
  if (!lookup.has(id)) {
    return null;
  }

  const font = lookup.get(id);
  if (typeof font === "object" && font !== null && "name" in font && typeof font.name === "string") {
    return font.name;
  }

  return null;
};

// Text styles only carry a generic family; the real font name lives on the page's common objects
// once the operator list has been built.
const resolveFontNames = async (
  page: PDFPageProxy,
  styles: Record<string, { fontFamily: string }>,
  pageNumber: number,
): Promise<Map<string, string>> => {
  const names = new Map<string, string>();
  for (const [id, style] of Object.entries(styles)) {
    names.set(id, style.fontFamily);
  }

  try {
    await page.getOperatorList();
  } catch (error) {
    console.warn("Font names unavailable for page; falling back to style families.", {
      pageNumber,
      message: describeError(error),
    });
    return names;
  }

  const lookup: unknown = "commonObjs" in page ? page.commonObjs : null;
  if (!isFontObjectLookup(lookup)) {
    return names;
  }

  for (const id of names.keys()) {
    const name = readFontObjectName(lookup, id);
    if (name) {
      names.set(id, name);
    }
  }

  return names;
};

const readPageRuns = async (page: PDFPageProxy, pageNumber: number): Promise<PositionedRun[]> => {
  const textContent = await page.getTextContent();
  const fontNames = await resolveFontNames(page, textContent.styles, pageNumber);
  const runs: PositionedRun[] = [];

  for (const item of textContent.items) {
    if (!("str" in item) || !("transform" in item)) {
      continue;
    }

    const raw = item.str.replace(/[\r\n\u00a0]/g, " ").replace(/\u0000/g, "");
    if (!raw.trim()) {
      continue;
    }

    const [, , skewY, scaleY, x, baseline] = item.transform.map(Number);
    const height = item.height > 0 ? item.height : Math.hypot(skewY, scaleY);
    runs.push({
      text: raw,
      x,
      baseline,
      width: Math.max(item.width, 0),
      height,
      fontName: fontNames.get(item.fontName) ?? item.fontName,
    });
  }

  return runs;
};

/**
 * Reads positioned text runs from every page and converts them to top-origin fragments.
 * Pages whose text cannot be read are skipped with a warning.
 */
export const extractFragments = async (
  data: Uint8Array,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Promise<Fragment[]> => {
  const loadingTask = getDocument({
    data,
    useSystemFonts: true,
    disableFontFace: true,
    standardFontDataUrl: resolveStandardFontDataUrl(),
    verbosity: VerbosityLevel.ERRORS,
  });

  let pdfDocument;
  try {
    pdfDocument = await loadingTask.promise;
  } catch (error) {
    await loadingTask.destroy();
    throw toPdfLoadError(error);
  }

  const fragments: Fragment[] = [];

  try {
    for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber += 1) {
      let page;
      try {
        page = await pdfDocument.getPage(pageNumber);
      } catch (error) {
        if (isInvalidPageRequestError(error)) {
          break;
        }

        console.warn("Skipping page during PDF extraction.", {
          pageNumber,
          message: describeError(error),
        });
        continue;
      }

      let runs: PositionedRun[];
      try {
        runs = await readPageRuns(page, pageNumber);
      } catch (error) {
        console.warn("Skipping text extraction for page.", {
          pageNumber,
          message: describeError(error),
        });
        continue;
      }

      const pageHeight = page.getViewport({ scale: 1 }).height;
      for (const run of runs) {
        fragments.push({
          page: pageNumber,
          top: Math.max(pageHeight - (run.baseline + run.height), 0),
          left: run.x,
          width: run.width,
          text: run.text,
          fontSize: run.height,
          bold: isBoldFontName(run.fontName, config),
        });
      }
    }
  } finally {
    await loadingTask.destroy();
  }

  return fragments;
};

import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import type { Fragment, Line } from "@/types/clauses";

const LINK_ANNOTATION_PREFIX = "link to page";

const collapseSpaces = (value: string): string => value.replace(/\s+/g, " ").trim();

const byLeft = (a: Fragment, b: Fragment): number => a.left - b.left;

export const lineText = (
  line: Line,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): string => {
  let result = "";
  let previousRightEdge: number | null = null;

  for (const fragment of line.fragments.toSorted(byLeft)) {
    if (!fragment.text) {
      continue;
    }

    if (
      previousRightEdge !== null &&
      fragment.left - previousRightEdge > config.fragmentGapThreshold
    ) {
      result += " ";
    }

    result += fragment.text;
    previousRightEdge = fragment.left + fragment.width;
  }

  return result;
};

export const cleanedLineText = (
  line: Line,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): string => collapseSpaces(lineText(line, config));

export const maxFontSize = (line: Line): number =>
  line.fragments.reduce((max, fragment) => Math.max(max, fragment.fontSize), 0);

export const boldRatio = (line: Line): number => {
  let total = 0;
  let bold = 0;

  for (const fragment of line.fragments) {
    const weight = fragment.text.trim().length;
    total += weight;
    if (fragment.bold) {
      bold += weight;
    }
  }

  return total === 0 ? 0 : bold / total;
};

export const isProminentLine = (line: Line, config: ExtractionConfig): boolean =>
  maxFontSize(line) >= config.headingMinFontSize &&
  boldRatio(line) >= config.headingMinBoldRatio;

const isLinkAnnotation = (text: string): boolean =>
  text.trim().toLowerCase().startsWith(LINK_ANNOTATION_PREFIX);

const compareFragments = (a: Fragment, b: Fragment): number =>
  a.page - b.page || a.top - b.top || a.left - b.left;

const leftmost = (line: Line): number =>
  line.fragments.reduce((min, fragment) => Math.min(min, fragment.left), Number.POSITIVE_INFINITY);

const compareLines = (a: Line, b: Line): number =>
  a.page - b.page || a.top - b.top || leftmost(a) - leftmost(b);

/**
 * Groups fragments that share a page and vertical position into reading-order lines.
 * Empty fragments and link annotations emitted by the layout engine are dropped first.
 * Lines are keyed by (page, top), and top is measured to the top of each run, so runs on one
 * baseline whose heights differ by more than `lineTopTolerance` land on separate lines.
 */
export const assembleLines = (
  fragments: readonly Fragment[],
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Line[] => {
  const usable = fragments
    .filter((fragment) => fragment.text.trim() && !isLinkAnnotation(fragment.text))
    .toSorted(compareFragments);

  const lines: Line[] = [];
  let current: { page: number; top: number; fragments: Fragment[] } | null = null;

  for (const fragment of usable) {
    if (
      current &&
      current.page === fragment.page &&
      fragment.top - current.top <= config.lineTopTolerance
    ) {
      current.fragments.push(fragment);
      continue;
    }

    current = { page: fragment.page, top: fragment.top, fragments: [fragment] };
    lines.push(current);
  }

  return lines
    .map((line) => ({ ...line, fragments: line.fragments.toSorted(byLeft) }))
    .toSorted(compareLines);
};

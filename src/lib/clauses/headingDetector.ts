import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import { matchHeadingNumber, HEADING_NUMBER_REGEX, isTopLevelIdentifier } from "@/lib/clauses/identifier";
import { cleanedLineText, isProminentLine } from "@/lib/layout/lines";
import type { Heading, Line } from "@/types/clauses";

type TitleContinuation = {
  parts: string[];
  consumed: number;
};

/**
 * Reads prominent lines following a bare heading number without committing the scan position.
 * Blank lines are passed over but still counted; the first non-prominent line or the next
 * heading number ends the title and is not consumed.
 */
const peekTitleContinuation = (
  lines: readonly Line[],
  from: number,
  config: ExtractionConfig,
): TitleContinuation => {
  const parts: string[] = [];
  let consumed = 0;

  for (let index = from; index < lines.length; index += 1) {
    const candidate = lines[index];
    const text = cleanedLineText(candidate, config);
    if (!text) {
      consumed += 1;
      continue;
    }

    if (!isProminentLine(candidate, config) || HEADING_NUMBER_REGEX.test(text)) {
      break;
    }

    parts.push(text);
    consumed += 1;
  }

  return { parts, consumed };
};

export const findHeadings = (
  lines: readonly Line[],
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Heading[] => {
  const headings: Heading[] = [];
  let index = 0;

  while (index < lines.length) {
    const line = lines[index];
    const match = matchHeadingNumber(cleanedLineText(line, config));
    if (!match || !isProminentLine(line, config)) {
      index += 1;
      continue;
    }

    let title = match.remainder;
    let lineSpan = 1;
    if (!title) {
      const continuation = peekTitleContinuation(lines, index + 1, config);
      title = continuation.parts.join(" ").trim();
      lineSpan += continuation.consumed;
    }

    // A bare top-level number with no title is a stray page number.
    if (title || !isTopLevelIdentifier(match.identifier)) {
      headings.push({
        identifier: match.identifier,
        title,
        startLineIndex: index,
        lineSpan,
      });
    }

    index += lineSpan;
  }

  return headings;
};

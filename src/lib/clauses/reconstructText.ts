import type { Clause } from "@/types/clauses";

const STARTS_LOWERCASE = /^\p{Ll}/u;

const joinParagraph = (buffer: string[]): string => buffer.join(" ").trim();

/**
 * Folds body lines into paragraphs. Empty lines mark paragraph breaks; a line ending in a
 * hyphen is joined without the hyphen when the next line continues in lower case.
 */
export const reconstructParagraphs = (bodyLines: readonly string[]): string[] => {
  const paragraphs: string[] = [];
  let buffer: string[] = [];

  for (const line of bodyLines) {
    if (!line) {
      if (buffer.length > 0) {
        paragraphs.push(joinParagraph(buffer));
        buffer = [];
      }
      continue;
    }

    const last = buffer.length - 1;
    if (last >= 0 && buffer[last].endsWith("-") && STARTS_LOWERCASE.test(line)) {
      buffer[last] = buffer[last].slice(0, -1) + line;
    } else {
      buffer.push(line);
    }
  }

  if (buffer.length > 0) {
    paragraphs.push(joinParagraph(buffer));
  }

  return paragraphs.filter(Boolean);
};

export const reconstructText = (bodyLines: readonly string[]): string =>
  reconstructParagraphs(bodyLines).join("\n\n");

export const clauseText = (clause: Clause): string => reconstructText(clause.bodyLines);

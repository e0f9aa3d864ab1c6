import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import { boldRatio } from "@/lib/layout/lines";
import type { Line } from "@/types/clauses";

const LEADER_DOTS = "...";
const SEPARATOR_RUN = "--```";
const PAGE_NUMBER_TOKEN = /^\d+$/;
const SENTENCE_PUNCTUATION = /[.,;:!?]/;
const LIST_MARKER_PREFIXES = ["•", "–", "-", "(", ")"];
const MIN_FRAGMENT_WORDS = 2;

const isTableOfContentsLeader = (text: string): boolean => {
  if (!text.includes(LEADER_DOTS)) {
    return false;
  }

  const tokens = text.split(/\s+/);
  return PAGE_NUMBER_TOKEN.test(tokens[tokens.length - 1] ?? "");
};

/** Boilerplate, table-of-contents leaders and separator rules. */
export const shouldSkip = (
  text: string,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): boolean => {
  const stripped = text.trim();
  if (!stripped) {
    return false;
  }

  if (isTableOfContentsLeader(stripped) || stripped.includes(SEPARATOR_RUN)) {
    return true;
  }

  return config.boilerplatePatterns.some((pattern) => pattern.test(stripped));
};

/**
 * Short, unpunctuated, non-bold remnants of running headers and column debris.
 * Bold or punctuated short lines are kept.
 */
export const looksLikeFragment = (
  line: Line,
  text: string,
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): boolean => {
  if (!text) {
    return false;
  }

  if (boldRatio(line) > 0) {
    return false;
  }

  if (LIST_MARKER_PREFIXES.some((prefix) => text.startsWith(prefix))) {
    return false;
  }

  if (SENTENCE_PUNCTUATION.test(text)) {
    return false;
  }

  const words = text.split(/\s+/).filter(Boolean);
  return words.length >= MIN_FRAGMENT_WORDS && words.length <= config.fragmentMaxWords;
};

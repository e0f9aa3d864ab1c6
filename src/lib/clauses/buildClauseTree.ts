import type { ExtractionConfig } from "@/lib/config/extractionConfig";
import { DEFAULT_EXTRACTION_CONFIG } from "@/lib/config/extractionConfig";
import {
  HEADING_NUMBER_REGEX,
  compareIdentifiers,
  isTopLevelIdentifier,
  isWellFormedIdentifier,
  parentIdentifier,
} from "@/lib/clauses/identifier";
import { looksLikeFragment, shouldSkip } from "@/lib/clauses/noiseFilter";
import { cleanedLineText } from "@/lib/layout/lines";
import type { Clause, Heading, Line } from "@/types/clauses";

type ClauseDraft = {
  identifier: string;
  title: string;
  bodyLines: string[];
  childIndices: number[];
};

// Parents own their children through indices into a flat arena.
type ClauseArena = {
  drafts: ClauseDraft[];
  indexById: Map<string, number>;
  rootIndices: number[];
};

const createArena = (): ClauseArena => ({
  drafts: [],
  indexById: new Map<string, number>(),
  rootIndices: [],
});

const addDraft = (arena: ClauseArena, heading: Heading): ClauseDraft => {
  const draft: ClauseDraft = {
    identifier: heading.identifier,
    title: heading.title,
    bodyLines: [],
    childIndices: [],
  };
  const index = arena.drafts.length;
  arena.drafts.push(draft);
  arena.indexById.set(heading.identifier, index);

  const parentId = parentIdentifier(heading.identifier);
  const parentIndex = parentId === null ? undefined : arena.indexById.get(parentId);
  if (parentIndex === undefined) {
    // Orphaned subclauses (parent heading never detected) are promoted to roots.
    arena.rootIndices.push(index);
  } else {
    arena.drafts[parentIndex].childIndices.push(index);
  }

  return draft;
};

const collectBodyLines = (
  draft: ClauseDraft,
  lines: readonly Line[],
  start: number,
  end: number,
  config: ExtractionConfig,
) => {
  let previous: Line | null = null;

  for (let index = start; index < end; index += 1) {
    const line = lines[index];
    const text = cleanedLineText(line, config);
    if (
      shouldSkip(text, config) ||
      HEADING_NUMBER_REGEX.test(text) ||
      looksLikeFragment(line, text, config)
    ) {
      continue;
    }

    if (
      previous &&
      (line.page !== previous.page || line.top - previous.top > config.paragraphGapThreshold)
    ) {
      draft.bodyLines.push("");
    }

    draft.bodyLines.push(text);
    previous = line;
  }
};

const freezeClause = (arena: ClauseArena, index: number): Clause => {
  const draft = arena.drafts[index];
  return Object.freeze({
    identifier: draft.identifier,
    title: draft.title,
    bodyLines: Object.freeze([...draft.bodyLines]),
    children: Object.freeze(draft.childIndices.map((child) => freezeClause(arena, child))),
  });
};

const isKeptRoot = (identifier: string): boolean =>
  isTopLevelIdentifier(identifier) || isWellFormedIdentifier(identifier);

/**
 * Builds the clause forest in one forward pass over the detected headings. The first
 * heading with a given identifier wins; later duplicates and their body lines are dropped.
 */
export const buildClauseTree = (
  lines: readonly Line[],
  headings: readonly Heading[],
  config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG,
): Clause[] => {
  const arena = createArena();

  headings.forEach((heading, position) => {
    if (arena.indexById.has(heading.identifier)) {
      return;
    }

    const draft = addDraft(arena, heading);
    const start = heading.startLineIndex + heading.lineSpan;
    const end = headings[position + 1]?.startLineIndex ?? lines.length;
    collectBodyLines(draft, lines, start, end, config);
  });

  return arena.rootIndices
    .map((index) => freezeClause(arena, index))
    .filter((clause) => isKeptRoot(clause.identifier))
    .toSorted((a, b) => compareIdentifiers(a.identifier, b.identifier));
};

import { clauseText } from "@/lib/clauses/reconstructText";
import type { Clause, ClauseRecord, ClauseRow, ClauseTable } from "@/types/clauses";

export const CLAUSE_TABLE_HEADER: ClauseRow = ["Clause", "Title", "Parent", "Level", "Text"];

export const toClauseRecord = (clause: Clause): ClauseRecord => {
  const record: ClauseRecord = {
    clause: clause.identifier,
    title: clause.title,
    text: clauseText(clause),
  };

  if (clause.children.length > 0) {
    record.subclauses = clause.children.map(toClauseRecord);
  }

  return record;
};

export const toClauseRecords = (clauses: readonly Clause[]): ClauseRecord[] =>
  clauses.map(toClauseRecord);

const flattenClause = (clause: Clause, parent: string, level: number): ClauseRow[] => [
  [clause.identifier, clause.title, parent, String(level), clauseText(clause)],
  ...clause.children.flatMap((child) => flattenClause(child, clause.identifier, level + 1)),
];

/** Depth-first rows with the header row first. */
export const clausesToRows = (clauses: readonly Clause[]): ClauseRow[] => [
  CLAUSE_TABLE_HEADER,
  ...clauses.flatMap((clause) => flattenClause(clause, "", 1)),
];

export const toClauseTable = (rows: readonly ClauseRow[]): ClauseTable => {
  const [header = CLAUSE_TABLE_HEADER, ...body] = rows;
  return { header, rows: body };
};

export const serializeClauseRecords = (clauses: readonly Clause[]): string =>
  JSON.stringify(toClauseRecords(clauses), null, 2);

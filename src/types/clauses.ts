export type Fragment = {
  page: number;
  top: number;
  left: number;
  width: number;
  text: string;
  fontSize: number;
  bold: boolean;
};

export type Line = {
  page: number;
  top: number;
  fragments: readonly Fragment[];
};

export type Heading = {
  identifier: string;
  title: string;
  startLineIndex: number;
  lineSpan: number;
};

export type Clause = {
  readonly identifier: string;
  readonly title: string;
  readonly bodyLines: readonly string[];
  readonly children: readonly Clause[];
};

export type ClauseRecord = {
  clause: string;
  title: string;
  text: string;
  subclauses?: ClauseRecord[];
};

export type ClauseRow = [
  clause: string,
  title: string,
  parent: string,
  level: string,
  text: string,
];

export type ClauseTable = {
  header: ClauseRow;
  rows: ClauseRow[];
};

export type ExtractionSummary = {
  clauses: number;
  rows: number;
};

export type ExtractionResult = {
  id: string;
  fileName: string;
  expiresAt: string;
  records: ClauseRecord[];
  table: ClauseTable;
  generatedAt: string;
};

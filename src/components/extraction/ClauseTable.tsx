import clsx from "clsx";
import type { ClauseRow, ClauseTable as ClauseTableData } from "@/types/clauses";

const TEXT_PREVIEW_LIMIT = 220;

export const truncateText = (
  value: string,
  limit = TEXT_PREVIEW_LIMIT,
): { snippet: string; truncated: boolean } => {
  if (value.length <= limit) {
    return { snippet: value, truncated: false };
  }

  return { snippet: `${value.slice(0, limit).trimEnd()}…`, truncated: true };
};

const rowKey = (row: ClauseRow, index: number): string => `${row[0]}-${index}`;

export const ClauseTable = ({
  table,
  onShowText,
}: {
  table: ClauseTableData;
  onShowText: (row: ClauseRow) => void;
}) => {
  if (table.rows.length === 0) {
    return <p className="text-sm">No clause content detected.</p>;
  }

  return (
    <div className="overflow-x-auto rounded-lg bg-white shadow-sm">
      <table className="w-full min-w-[60rem] border-collapse text-left text-sm">
        <thead>
          <tr>
            {table.header.map((column) => (
              <th
                key={`header-${column}`}
                className="border-b border-[var(--color-border)] px-3 py-3 font-semibold"
                style={{ background: "var(--color-bg-tertiary)" }}
              >
                {column}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>
          {table.rows.map((row, index) => {
            const [clause, title, parent, level, text] = row;
            const { snippet, truncated } = truncateText(text);

            return (
              <tr key={rowKey(row, index)} className="align-top">
                <td className="border-b border-[var(--color-border)] px-3 py-3 font-mono">{clause}</td>
                <td className="border-b border-[var(--color-border)] px-3 py-3">{title}</td>
                <td className="border-b border-[var(--color-border)] px-3 py-3 font-mono">{parent}</td>
                <td className="border-b border-[var(--color-border)] px-3 py-3">{level}</td>
                <td
                  className={clsx(
                    "max-w-[24rem] border-b border-[var(--color-border)] px-3 py-3",
                    !text && "text-[var(--color-text-tertiary)]",
                  )}
                >
                  <span className="inline-block whitespace-pre-wrap">{snippet}</span>
                  {truncated ? (
                    <button
                      type="button"
                      onClick={() => onShowText(row)}
                      className="ml-2 rounded px-3 py-1 text-xs font-medium text-white"
                      style={{ background: "var(--color-accent-secondary)" }}
                    >
                      More
                    </button>
                  ) : null}
                </td>
              </tr>
            );
          })}
        </tbody>
      </table>
    </div>
  );
};

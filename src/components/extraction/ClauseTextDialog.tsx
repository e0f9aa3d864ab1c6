"use client";

import { useEffect } from "react";
import type { ClauseRow } from "@/types/clauses";

export const ClauseTextDialog = ({
  row,
  onClose,
}: {
  row: ClauseRow | null;
  onClose: () => void;
}) => {
  useEffect(() => {
    if (!row) {
      return;
    }

    const onKeyDown = (event: KeyboardEvent) => {
      if (event.key === "Escape") {
        onClose();
      }
    };

    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [row, onClose]);

  if (!row) {
    return null;
  }

  const [clause, title, , , text] = row;

  return (
    <div
      role="presentation"
      className="fixed inset-0 flex items-center justify-center bg-black/60"
      onClick={(event) => {
        if (event.target === event.currentTarget) {
          onClose();
        }
      }}
    >
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="clause-text-title"
        className="max-h-[80vh] max-w-3xl overflow-y-auto rounded-lg bg-white p-6 shadow-xl"
      >
        <header className="mb-4 flex items-center justify-between gap-4">
          <h2 id="clause-text-title" className="text-lg font-semibold">
            {clause} {title}
          </h2>
          <button
            type="button"
            onClick={onClose}
            className="rounded px-4 py-1.5 text-sm text-white"
            style={{ background: "var(--color-accent)" }}
          >
            Close
          </button>
        </header>
        <pre className="m-0 whitespace-pre-wrap font-sans text-sm leading-6">{text}</pre>
      </div>
    </div>
  );
};

"use client";

import { useCallback, useEffect, useRef, useState } from "react";
import type { FormEvent } from "react";
import { ClauseTable } from "@/components/extraction/ClauseTable";
import { ClauseTextDialog } from "@/components/extraction/ClauseTextDialog";
import { LoadingProgress } from "@/components/extraction/LoadingProgress";
import type { ClauseRow, ExtractionResult } from "@/types/clauses";

const MAX_UPLOAD_MIB = 10;

type ApiPayload = Record<string, unknown>;

const isRecord = (value: unknown): value is ApiPayload =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isExtractionResult = (value: unknown): value is ExtractionResult =>
  isRecord(value) &&
  typeof value.id === "string" &&
  typeof value.fileName === "string" &&
  Array.isArray(value.records) &&
  isRecord(value.table);

const parseApiPayload = async (
  response: Response,
): Promise<{ payload: ApiPayload | null; text: string | null }> => {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json")) {
    const body: unknown = await response.json();
    return { payload: isRecord(body) ? body : null, text: null };
  }

  const text = await response.text();
  return { payload: null, text };
};

const toApiError = (
  response: Response,
  payload: ApiPayload | null,
  text: string | null,
): Error => {
  if (payload && typeof payload.error === "string" && payload.error.trim()) {
    return new Error(payload.error);
  }

  if (text && /^<!doctype html/i.test(text.trim())) {
    return new Error(
      `Request failed (${response.status}). API returned HTML instead of JSON.`,
    );
  }

  if (text && text.trim()) {
    return new Error(`Request failed (${response.status}): ${text.slice(0, 220)}`);
  }

  return new Error(`Request failed (${response.status}).`);
};

export const ExtractionWorkspace = () => {
  const [result, setResult] = useState<ExtractionResult | null>(null);
  const [status, setStatus] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);
  const [isExtracting, setIsExtracting] = useState(false);
  const [progressPercent, setProgressPercent] = useState(0);
  const [openRow, setOpenRow] = useState<ClauseRow | null>(null);
  const progressIntervalRef = useRef<number | null>(null);

  const clearProgressTimer = useCallback(() => {
    if (progressIntervalRef.current) {
      window.clearInterval(progressIntervalRef.current);
      progressIntervalRef.current = null;
    }
  }, []);

  const startProgress = useCallback(() => {
    clearProgressTimer();
    setIsExtracting(true);
    setProgressPercent(8);

    const cap = 92;
    progressIntervalRef.current = window.setInterval(() => {
      setProgressPercent((previous) => {
        if (previous >= cap) {
          return previous;
        }

        const step = Math.max(0.4, (cap - previous) * 0.14);
        return Math.min(cap, Number((previous + step).toFixed(1)));
      });
    }, 120);
  }, [clearProgressTimer]);

  const stopProgress = useCallback(() => {
    clearProgressTimer();
    setIsExtracting(false);
    setProgressPercent(0);
  }, [clearProgressTimer]);

  useEffect(() => clearProgressTimer, [clearProgressTimer]);

  const onSubmit = useCallback(
    async (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      const formData = new FormData(event.currentTarget);
      const pdf = formData.get("pdf");
      if (!(pdf instanceof File) || pdf.size === 0) {
        setError("Select a PDF to extract.");
        return;
      }

      setError(null);
      setStatus(null);
      startProgress();

      try {
        const response = await fetch("/api/extract", { method: "POST", body: formData });
        const { payload, text } = await parseApiPayload(response);
        if (!response.ok) {
          throw toApiError(response, payload, text);
        }

        const nextResult = payload?.result;
        if (!isExtractionResult(nextResult)) {
          throw new Error("Extraction response is missing result payload.");
        }

        setResult(nextResult);
        setStatus(
          `Extracted ${nextResult.table.rows.length} clauses from ${nextResult.fileName}.`,
        );
      } catch (requestError) {
        setResult(null);
        setError(
          requestError instanceof Error ? requestError.message : "Unable to extract clauses.",
        );
      } finally {
        stopProgress();
      }
    },
    [startProgress, stopProgress],
  );

  const closeDialog = useCallback(() => setOpenRow(null), []);

  return (
    <main className="mx-auto flex min-h-screen max-w-6xl flex-col gap-6 px-8 py-10">
      <h1 className="text-2xl font-bold" style={{ color: "var(--color-text-primary)" }}>
        Standards Clause Extractor
      </h1>

      <form
        onSubmit={(event) => void onSubmit(event)}
        className="flex flex-col gap-3 rounded-lg bg-white p-6 shadow-sm"
      >
        <label htmlFor="pdf" className="text-sm font-medium">
          Select standards PDF:
        </label>
        <div className="flex items-center gap-3">
          <input id="pdf" name="pdf" type="file" accept="application/pdf" required />
          <button
            type="submit"
            disabled={isExtracting}
            className="rounded px-4 py-1.5 text-sm font-medium text-white disabled:opacity-60"
            style={{ background: "var(--color-accent)" }}
          >
            Extract
          </button>
        </div>
        <p className="text-xs" style={{ color: "var(--color-text-tertiary)" }}>
          Maximum upload size: {MAX_UPLOAD_MIB} MiB
        </p>
      </form>

      {isExtracting ? (
        <LoadingProgress percent={progressPercent} label="Extracting clauses..." />
      ) : null}
      {error ? (
        <p role="alert" className="text-sm" style={{ color: "var(--color-error)" }}>
          {error}
        </p>
      ) : null}
      {status ? <p className="text-sm">{status}</p> : null}

      {result ? (
        <>
          <div className="flex gap-4">
            <a
              href={`/api/extract/${result.id}/export?format=json`}
              className="rounded px-4 py-2 text-sm text-white"
              style={{ background: "var(--color-accent)" }}
            >
              Download JSON
            </a>
            <a
              href={`/api/extract/${result.id}/export?format=xlsx`}
              className="rounded px-4 py-2 text-sm text-white"
              style={{ background: "var(--color-accent)" }}
            >
              Download Excel
            </a>
          </div>
          <ClauseTable table={result.table} onShowText={setOpenRow} />
        </>
      ) : null}

      <ClauseTextDialog row={openRow} onClose={closeDialog} />
    </main>
  );
};

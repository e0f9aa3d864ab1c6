import type { ExtractionResult } from "@/types/clauses";

const GLOBAL_KEY = "__clauseExtractionStore__";

const TWO_HOURS_MS = 2 * 60 * 60 * 1000;

export type StoredExtraction = {
  result: ExtractionResult;
  workbook: Buffer;
  expiresAtMs: number;
};

export type StoredExtractionState =
  | { state: "ok"; record: StoredExtraction }
  | { state: "expired" }
  | { state: "missing" };

type ExtractionStore = Map<string, StoredExtraction>;

type StoreContainer = {
  [GLOBAL_KEY]?: ExtractionStore;
};

const globalContainer = globalThis as typeof globalThis & StoreContainer;

const resolveStore = (): ExtractionStore => {
  const existing = globalContainer[GLOBAL_KEY];
  if (existing) {
    return existing;
  }

  const created: ExtractionStore = new Map<string, StoredExtraction>();
  globalContainer[GLOBAL_KEY] = created;
  return created;
};

const store = resolveStore();

const isExpired = (record: StoredExtraction, now: number): boolean => now >= record.expiresAtMs;

export const purgeExpiredExtractions = (now = Date.now()): void => {
  for (const [id, record] of store.entries()) {
    if (isExpired(record, now)) {
      store.delete(id);
    }
  }
};

export const getDefaultExpiryMs = (now = Date.now()): number => now + TWO_HOURS_MS;

export const saveExtraction = (record: StoredExtraction): void => {
  purgeExpiredExtractions();
  store.set(record.result.id, record);
};

export const getStoredExtractionState = (
  id: string,
  now = Date.now(),
): StoredExtractionState => {
  const record = store.get(id);
  if (!record) {
    purgeExpiredExtractions(now);
    return { state: "missing" };
  }

  if (isExpired(record, now)) {
    store.delete(id);
    purgeExpiredExtractions(now);
    return { state: "expired" };
  }

  purgeExpiredExtractions(now);
  return { state: "ok", record };
};

export type StoreFailureReason = "io" | "invalid_id" | "invalid_value" | "corrupt";

export type StoreResult =
  | { ok: true }
  | { ok: false; reason: StoreFailureReason; message: string };

export const STORE_OK: StoreResult = { ok: true };

export function storeFailure(reason: StoreFailureReason, message: string): StoreResult {
  return { ok: false, reason, message };
}

/** Thrown inside a transaction when the stored record cannot be parsed; aborts the write. */
export class CorruptRecordError extends Error {
  constructor(readonly key: string, detail: string) {
    super(`Stored record "${key}" is corrupt: ${detail}`);
    this.name = "CorruptRecordError";
  }
}

export type StoreFailure = Extract<StoreResult, { ok: false }>;

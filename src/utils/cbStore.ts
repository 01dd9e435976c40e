import { randomBytes } from "node:crypto";
import type { Clock } from "./cache";

// Ephemeral one-shot payloads for callback buttons (callback_data is capped at 64 bytes)
const TTL_MS = 5 * 60 * 1000;

export class PayloadStore<T> {
  private store = new Map<string, { v: T; exp: number }>();

  constructor(
    private ttlMs = TTL_MS,
    private now: Clock = Date.now
  ) {}

  private gc() {
    const now = this.now();
    for (const [k, { exp }] of this.store) if (exp <= now) this.store.delete(k);
  }

  put(value: T): string {
    this.gc();
    const id = randomBytes(9).toString("base64url");
    this.store.set(id, { v: value, exp: this.now() + this.ttlMs });
    return id;
  }

  /** One-time read: a second take of the same id returns null. */
  take(id: string): T | null {
    this.gc();
    const hit = this.store.get(id);
    if (!hit) return null;
    this.store.delete(id);
    return hit.v;
  }

  get size() {
    return this.store.size;
  }
}

export type CacheEntry<T> = { value: T; expires: number };
export type Clock = () => number;

export class TTLCache<T> {
  private store = new Map<string, CacheEntry<T>>();

  constructor(
    private defaultTtlMs = 30_000,
    private now: Clock = Date.now
  ) {}

  get(key: string): T | undefined {
    const hit = this.store.get(key);
    if (!hit) return undefined;
    if (hit.expires <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return hit.value;
  }

  private gc() {
    const now = this.now();
    for (const [k, { expires }] of this.store) if (expires <= now) this.store.delete(k);
  }

  set(key: string, value: T, ttlMs = this.defaultTtlMs) {
    this.gc();
    this.store.set(key, { value, expires: this.now() + ttlMs });
  }

  async with(key: string, fn: () => Promise<T>, ttlMs = this.defaultTtlMs): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;
    const fresh = await fn();
    this.set(key, fresh, ttlMs);
    return fresh;
  }

  delete(key: string) {
    this.store.delete(key);
  }

  get size() {
    return this.store.size;
  }

  clear() {
    this.store.clear();
  }
}

import type { Context, MiddlewareFn } from "telegraf";
import type { Clock } from "../utils/cache";

/**
 * Token-bucket per-chat limiter for model-backed handlers:
 * - capacity: 5 tokens
 * - refill: 1 token every 6s (≈ 5 per 30s)
 * - hard cooldown: 900ms between actions (anti-burst)
 */
type Bucket = { tokens: number; last: number; lastHit: number };

export type RateLimitOptions = {
  capacity?: number;
  refillMs?: number;
  minGapMs?: number;
  now?: Clock;
};

export type RateDecision = { ok: true } | { ok: false; message: string };

export class ChatRateLimiter {
  private buckets = new Map<number, Bucket>();
  private readonly capacity: number;
  private readonly refillMs: number;
  private readonly minGapMs: number;
  private readonly now: Clock;

  constructor(opts: RateLimitOptions = {}) {
    this.capacity = opts.capacity ?? 5;
    this.refillMs = opts.refillMs ?? 6_000;
    this.minGapMs = opts.minGapMs ?? 900;
    this.now = opts.now ?? Date.now;
  }

  take(chatId: number): RateDecision {
    const now = this.now();
    let b = this.buckets.get(chatId);
    if (!b) {
      b = { tokens: this.capacity, last: now, lastHit: -Infinity };
      this.buckets.set(chatId, b);
    }

    // refill
    const add = Math.floor((now - b.last) / this.refillMs);
    if (add > 0) {
      b.tokens = Math.min(this.capacity, b.tokens + add);
      b.last += add * this.refillMs;
    }

    if (now - b.lastHit < this.minGapMs) {
      return { ok: false, message: "⏱ Please slow down a bit…" };
    }

    if (b.tokens <= 0) {
      const secs = Math.ceil((this.refillMs - (now - b.last)) / 1000);
      return { ok: false, message: `⏳ Too many requests. Try again in ~${secs}s.` };
    }

    b.tokens -= 1;
    b.lastHit = now;
    return { ok: true };
  }
}

export function rateLimiter(limiter = new ChatRateLimiter()): MiddlewareFn<Context> {
  return async (ctx, next) => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined) return next();

    const decision = limiter.take(chatId);
    if (!decision.ok) {
      await ctx.reply(decision.message);
      return;
    }
    return next();
  };
}

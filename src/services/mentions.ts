import type { GroupMention } from "../state/settings";

export const KEYWORD_MIN = 2;
export const KEYWORD_MAX = 32;

export type AddMentionOutcome =
  | { ok: true; mentions: GroupMention[] }
  | { ok: false; reason: "too_short" | "too_long" | "duplicate" | "limit" };

const same = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export function addMention(
  current: GroupMention[],
  keyword: string,
  description: string,
  max: number
): AddMentionOutcome {
  const kw = keyword.trim();
  if (kw.length < KEYWORD_MIN) return { ok: false, reason: "too_short" };
  if (kw.length > KEYWORD_MAX) return { ok: false, reason: "too_long" };
  if (current.some((m) => same(m.keyword, kw))) return { ok: false, reason: "duplicate" };
  if (current.length >= max) return { ok: false, reason: "limit" };
  return { ok: true, mentions: [...current, { keyword: kw, description: description.trim() }] };
}

/** Case-insensitive; returns null when nothing matched. */
export function removeMention(current: GroupMention[], keyword: string): GroupMention[] | null {
  const next = current.filter((m) => !same(m.keyword, keyword));
  return next.length === current.length ? null : next;
}

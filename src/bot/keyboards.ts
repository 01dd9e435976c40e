import { Markup } from "telegraf";
import type { GroupMention } from "../state/settings";

// callback_data is capped at 64 bytes; payloads that may not fit go through PayloadStore ids.
export type CallbackAction =
  | { kind: "helped" }
  | { kind: "anon"; id: string }
  | { kind: "delete_mention"; id: string }
  | { kind: "sync"; direction: "push" | "pull" };

const CALLBACK_RE = /^(helped|anon|delm|sync)(?::([\w-]+))?$/;

export function parseCallback(data: string | undefined): CallbackAction | null {
  const m = (data ?? "").match(CALLBACK_RE);
  if (!m) return null;
  const arg = m[2];
  switch (m[1]) {
    case "helped":
      return arg === undefined ? { kind: "helped" } : null;
    case "anon":
      return arg ? { kind: "anon", id: arg } : null;
    case "delm":
      return arg ? { kind: "delete_mention", id: arg } : null;
    case "sync":
      return arg === "push" || arg === "pull" ? { kind: "sync", direction: arg } : null;
    default:
      return null;
  }
}

export function answerKeyboard(anonPayloadId: string) {
  return Markup.inlineKeyboard([
    Markup.button.callback("👍 That helped", "helped"),
    Markup.button.callback("🕵️ Ask anonymously", `anon:${anonPayloadId}`),
  ]);
}

/** One delete button per mention; `idFor` stores what the button should remove. */
export function mentionsKeyboard(mentions: GroupMention[], idFor: (m: GroupMention) => string) {
  return Markup.inlineKeyboard(
    mentions.map((m) => [Markup.button.callback(`🗑 ${m.keyword}`, `delm:${idFor(m)}`)])
  );
}

export function conflictKeyboard() {
  return Markup.inlineKeyboard([
    Markup.button.callback("⬆️ Push local settings to sheet", "sync:push"),
    Markup.button.callback("⬇️ Pull settings from sheet", "sync:pull"),
  ]);
}

export function setupLinkKeyboard(url: string) {
  return Markup.inlineKeyboard([Markup.button.url("Continue in private chat", url)]);
}

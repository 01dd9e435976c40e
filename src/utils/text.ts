import type { SyncStatus } from "../services/configSync";
import type { SettingValue, SettingsRecord } from "../state/settings";

// Pictographs plus the joiners, selectors and modifiers that glue emoji sequences together.
const EMOJI_RE =
  /[\p{Extended_Pictographic}\u{1F1E6}-\u{1F1FF}\u{1F3FB}-\u{1F3FF}\u200D\uFE0F\u20E3]/gu;

export function removeEmojis(text: string): string {
  if (!text) return "";
  return text
    .replace(EMOJI_RE, "")
    .replace(/[ \t]{2,}/g, " ")
    .trim();
}

export const escapeHtml = (s: string) =>
  String(s).replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export function escapeMarkdownV2(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/([_*[\]()~`>#+\-=|{}.!])/g, "\\$1");
}

export const truncate = (s: string, max: number) => (s.length > max ? `${s.slice(0, max)}...` : s);

export function userMentionHtml(userId: number, name: string): string {
  return `<a href="tg://user?id=${userId}">${escapeHtml(name)}</a>`;
}

export type WelcomeUser = { id: number; firstName: string; username?: string };

/** Fills the welcome template; the result is sent with HTML parse mode. */
export function renderWelcome(template: string, user: WelcomeUser, chatTitle?: string): string {
  const mention = user.username ? `@${user.username}` : user.firstName;
  const vars: Record<string, string> = {
    "{username}": escapeHtml(user.firstName),
    "{user_mention_html}": userMentionHtml(user.id, user.firstName),
    "{user_mention}": escapeHtml(mention),
    "{chat_title}": escapeHtml(chatTitle || "the chat"),
  };
  let out = template;
  for (const [placeholder, value] of Object.entries(vars)) {
    out = out.split(placeholder).join(value);
  }
  return out;
}

const valueText = (v: SettingValue) => (typeof v === "string" ? v : JSON.stringify(v));

export function formatSettingsMarkdown(config: SettingsRecord): string {
  const lines = Object.entries(config).map(
    ([key, value]) =>
      `\\- \`${escapeMarkdownV2(key)}\`: \`${escapeMarkdownV2(truncate(valueText(value), 150))}\``
  );
  return ["Current bot settings for this chat:", "", ...lines].join("\n");
}

export function formatSettingsPlain(config: SettingsRecord): string {
  const lines = Object.entries(config).map(
    ([key, value]) => `- ${key}: ${truncate(valueText(value), 200)}`
  );
  return ["Current bot settings for this chat (plain text):", "", ...lines].join("\n");
}

export function syncStatusText(status: SyncStatus): string {
  switch (status) {
    case "synced":
      return "Synced to Google Sheet.";
    case "failed":
      return "Saved locally, but syncing to Google Sheet failed. A sync conflict is flagged; use /refresh to resolve it.";
    case "not_configured":
      return "Saved locally. Google Sheet sync is not configured.";
  }
}

import type { ConnectResult, RefreshResult, SyncStatus } from "../services/configSync";
import type { StoreFailure } from "../state/result";
import type { LinkOutcome } from "../services/anonRelay";

export const START_TEXT = `👋 Hi! I answer questions about this program.

In a group, mention me or reply to one of my messages and I'll look for the answer in the FAQ.
In a private chat, just ask. If the answer doesn't help, you can pass the question to your group anonymously.

Forward any message from your group here to link it for anonymous questions.
Use /help to see every command.`;

export const HELP_TEXT = `🛠 What I can do

For everyone
/start — introduction
/help — this message
/summarize — reply to a message with it to get a short summary
/anon <question> — send a question to your linked group anonymously (private chat)

For group admins
/setfaqsheet — connect a Google Sheet with FAQs and settings
/refresh — reload FAQs and settings from the sheet
/showsettings — show this chat's settings
/setpersonalityprompt <text> — how I should talk
/setwelcomemessage <text> — greeting for new members ({username}, {user_mention_html}, {chat_title})
/seterror <text> — message shown when something goes wrong
/addmention <keyword> [description] — extra word I respond to
/editmentions — remove added keywords
/toggleanonq — turn anonymous questions on or off`;

export const GROUP_ONLY = "This command only works in group chats.";
export const PRIVATE_ONLY = "Send this command to me in a private chat.";
export const FALLBACK_NON_ADMIN = "Sorry, only chat admins can use this command.";
export const FALLBACK_ERROR = "Something went wrong. Please try again later.";

export function saveFailedText(failure: StoreFailure): string {
  return `Could not save the setting: ${failure.message}`;
}

export function refreshText(result: RefreshResult): string {
  if (!result.configured) {
    return "Google Sheet is not configured for this chat. Use /setfaqsheet first.";
  }
  const faqs =
    result.faqCount === null
      ? "FAQs: the FAQ sheet could not be read; the previous list is kept."
      : `FAQs: ${result.faqCount} loaded.`;
  const settings = result.settingsOk
    ? "Settings: pulled from the sheet."
    : "Settings: could not be pulled. A sync conflict is flagged.";
  return `🔄 Refresh finished.\n${faqs}\n${settings}`;
}

export function connectText(result: ConnectResult): string {
  if (result.ok) {
    return result.faqs === null
      ? "✅ Google Sheet connected, but the FAQ sheet could not be read. Fix it and run /refresh in the group."
      : `✅ Google Sheet connected. ${result.faqs.length} FAQs loaded.`;
  }
  switch (result.reason) {
    case "bad_url":
      return "That doesn't look like a Google Sheets link. Send a link like https://docs.google.com/spreadsheets/d/...";
    case "no_access":
      return `❌ ${result.error}`;
    case "write_failed":
      return "❌ Could not write the settings sheet. Check that the bot has Editor access, then run /setfaqsheet again.";
    case "save_failed":
      return `❌ Could not save the sheet link: ${result.message}`;
  }
}

export function setupPromptText(serviceAccountEmail: string | null): string {
  const share = serviceAccountEmail
    ? `First share the spreadsheet with ${serviceAccountEmail} as an Editor.`
    : "First share the spreadsheet with the bot's service account as an Editor.";
  return `Send me the Google Sheets link for the group. ${share}\nThe link is accepted for the next 10 minutes.`;
}

const MEMBER_STATUSES = new Set(["member", "administrator", "restricted"]);
const GONE_STATUSES = new Set(["left", "kicked"]);

/** A `chat_member` update that brings someone into the chat. */
export function isJoin(oldStatus: string, newStatus: string, isMember?: boolean): boolean {
  if (!GONE_STATUSES.has(oldStatus)) return false;
  if (newStatus === "restricted") return isMember === true;
  return MEMBER_STATUSES.has(newStatus);
}

export function mentionErrorText(
  reason: "too_short" | "too_long" | "duplicate" | "limit",
  keyword: string,
  max: number
): string {
  switch (reason) {
    case "too_short":
      return "The mention keyword must be at least 2 characters long.";
    case "too_long":
      return "The mention keyword must be at most 32 characters long.";
    case "duplicate":
      return `The mention keyword "${keyword}" already exists.`;
    case "limit":
      return `This chat already has ${max} mention keywords. Remove one with /editmentions first.`;
  }
}

export function pushText(status: SyncStatus): string {
  switch (status) {
    case "synced":
      return "⬆️ Local settings were written to the Google Sheet. The conflict is cleared.";
    case "failed":
      return "❌ Writing to the Google Sheet failed. The conflict is still flagged.";
    case "not_configured":
      return "Google Sheet is not configured for this chat. Use /setfaqsheet first.";
  }
}

export function linkText(outcome: LinkOutcome): string {
  switch (outcome.status) {
    case "linked":
      return `Great! You're linked to "${outcome.title}". Send /anon <your question> here to ask that group anonymously.`;
    case "not_group":
      return "You can only link group chats for anonymous questions, not channels or private chats.";
    case "unknown_group":
      return "Sorry, I'm not set up in that group. Forward a message from a group where an admin has configured me.";
    case "save_failed":
      return "Sorry, there was an issue saving this link. Please try again later.";
  }
}

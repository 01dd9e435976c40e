import { logger as rootLogger, type Logger } from "../utils/logger";
import { errorMessage } from "../utils/errors";
import { escapeHtml } from "../utils/text";
import type { ChatConfigStore } from "../state/chatConfig";
import type { UserGroupLinkStore } from "../state/userGroupLinks";
import { KEYS, readBool } from "../state/settings";
import type { ResponseGenerator } from "./ai";

/** Sends HTML-formatted messages; the bot's Telegram client in production. */
export interface MessageSender {
  sendHtml(chatId: number, html: string): Promise<void>;
}

/** Where a forwarded message came from, reduced to what linking needs. */
export type ForwardSource =
  | { kind: "chat"; chatId: number; chatType: string; title?: string }
  | { kind: "other" };

type ChatRef = { id: number; type: string; title?: string };

/** Structural view of Telegram's `forward_origin`. */
export type OriginLike = { type: string; sender_chat?: ChatRef; chat?: ChatRef };

export function forwardSourceOf(origin: OriginLike): ForwardSource {
  const chat = origin.type === "chat" ? origin.sender_chat : origin.type === "channel" ? origin.chat : undefined;
  if (!chat) return { kind: "other" };
  return { kind: "chat", chatId: chat.id, chatType: chat.type, title: chat.title };
}

export type LinkOutcome =
  | { status: "linked"; groupId: number; title: string }
  | { status: "not_group" | "unknown_group" | "save_failed" };

export type AskOutcome = "sent" | "blocked" | "no_link" | "disabled" | "bot_removed" | "send_failed";

const GONE_MARKERS = ["bot was kicked", "chat not found", "bot is not a member"];

export function formatAnonQuestion(question: string): string {
  return `<b>🗣️ New Anonymous Question</b>\n\nQuestion:\n<blockquote expandable>${escapeHtml(question)}</blockquote>`;
}

export class AnonRelay {
  constructor(
    private readonly configs: ChatConfigStore,
    private readonly links: UserGroupLinkStore,
    private readonly generator: ResponseGenerator,
    private readonly sender: MessageSender,
    private readonly bossId?: number,
    private readonly log: Logger = rootLogger.child({ module: "anon-relay" })
  ) {}

  /** Links a user to the group a forwarded message came from; the group must already be known. */
  linkFromForward(userId: number, source: ForwardSource): LinkOutcome {
    if (source.kind !== "chat" || (source.chatType !== "group" && source.chatType !== "supergroup")) {
      return { status: "not_group" };
    }
    if (!this.configs.listKnownChatIds().includes(source.chatId)) {
      this.log.warn({ userId, groupId: source.chatId }, "Link attempt to an unconfigured group");
      return { status: "unknown_group" };
    }
    const saved = this.links.set(userId, source.chatId);
    if (!saved.ok) return { status: "save_failed" };

    this.log.info({ userId, groupId: source.chatId }, "User linked to group");
    return { status: "linked", groupId: source.chatId, title: source.title || "the group" };
  }

  async ask(userId: number, question: string): Promise<AskOutcome> {
    if (!(await this.generator.isTextAppropriate(question))) {
      await this.alertBoss(userId, question);
      return "blocked";
    }

    const groupId = this.links.get(userId);
    if (groupId === null) return "no_link";
    if (!readBool(this.configs.get(groupId), KEYS.anonqEnabled, true)) return "disabled";

    try {
      await this.sender.sendHtml(groupId, formatAnonQuestion(question));
      this.log.info({ userId, groupId }, "Anonymous question relayed");
      return "sent";
    } catch (e) {
      const msg = errorMessage(e).toLowerCase();
      this.log.error({ err: e, userId, groupId }, "Relaying anonymous question failed");
      return GONE_MARKERS.some((m) => msg.includes(m)) ? "bot_removed" : "send_failed";
    }
  }

  private async alertBoss(userId: number, question: string): Promise<void> {
    if (this.bossId === undefined) return;
    try {
      await this.sender.sendHtml(
        this.bossId,
        `Potentially inappropriate anonymous question blocked from user <code>${userId}</code>.\n\nMessage:\n${escapeHtml(question)}`
      );
    } catch (e) {
      this.log.error({ err: e }, "Could not alert the owner about a blocked question");
    }
  }
}

export const ASK_OUTCOME_TEXT: Record<AskOutcome, string> = {
  sent: "Your question has been sent anonymously to your linked group.",
  blocked:
    "Your question was deemed potentially inappropriate and was not forwarded.\nPlease rephrase or reconsider your question.",
  no_link:
    "You haven't linked a group for anonymous questions yet. Forward any message from your group to me here to set it up.",
  disabled: "Anonymous questions are turned off in your linked group.",
  bot_removed:
    "I couldn't send your question. I may no longer be a member of your linked group. Forward a message from it again to re-link.",
  send_failed: "Sorry, there was an error sending your anonymous question. Please try again later.",
};

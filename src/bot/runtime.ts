import type { Context } from "telegraf";
import type { ChatConfigStore } from "../state/chatConfig";
import type { UserGroupLinkStore } from "../state/userGroupLinks";
import type { ConfigSyncService } from "../services/configSync";
import type { SheetSync } from "../services/sheets";
import type { FaqResponder } from "../services/faq";
import type { ResponseGenerator } from "../services/ai";
import type { AnonRelay } from "../services/anonRelay";
import type { ChatRateLimiter } from "../middleware/rateLimiter";
import type { AdminChecker } from "../utils/telegram";
import type { TTLCache } from "../utils/cache";
import type { PayloadStore } from "../utils/cbStore";
import type { Logger } from "../utils/logger";
import { KEYS, readString } from "../state/settings";
import { FALLBACK_ERROR } from "./messages";

/** Long-lived services the bot is built from. */
export type BotServices = {
  configs: ChatConfigStore;
  links: UserGroupLinkStore;
  sync: ConfigSyncService;
  sheets: SheetSync;
  responder: FaqResponder;
  generator: ResponseGenerator;
  maxMentionsPerChat: number;
  bossId?: number;
};

export type PendingAnonQuestion = { userId: number; question: string };
export type PendingMentionDelete = { chatId: number; keyword: string };

/** Services plus the per-process state the handlers share. */
export type BotRuntime = BotServices & {
  relay: AnonRelay;
  admins: AdminChecker;
  limiter: ChatRateLimiter;
  /** user id → group id awaiting a sheet link in private chat */
  pendingSetup: TTLCache<number>;
  anonPayloads: PayloadStore<PendingAnonQuestion>;
  mentionPayloads: PayloadStore<PendingMentionDelete>;
  log: Logger;
};

/** Replies with the chat's configured generic error text; a failed reply is only logged. */
export async function replyGenericError(ctx: Context, rt: BotRuntime): Promise<void> {
  const text =
    (ctx.chat && readString(rt.configs.get(ctx.chat.id), KEYS.genericError)) || FALLBACK_ERROR;
  try {
    await ctx.reply(text);
  } catch (e) {
    rt.log.warn({ err: e, chatId: ctx.chat?.id }, "Could not send the error reply");
  }
}

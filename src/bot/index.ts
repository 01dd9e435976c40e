import { Telegraf } from "telegraf";
import { AnonRelay } from "../services/anonRelay";
import { ChatRateLimiter } from "../middleware/rateLimiter";
import { TTLCache } from "../utils/cache";
import { PayloadStore } from "../utils/cbStore";
import { logger } from "../utils/logger";
import { AdminChecker } from "../utils/telegram";
import { onDeleteMention, onSyncChoice, registerAdminHandlers } from "./admin";
import { parseCallback } from "./keyboards";
import {
  replyGenericError,
  type BotRuntime,
  type BotServices,
  type PendingAnonQuestion,
  type PendingMentionDelete,
} from "./runtime";
import { onAskAnon, onHelped, registerUserHandlers } from "./user";

export type { BotServices } from "./runtime";

const SETUP_TTL_MS = 10 * 60 * 1000;

export const ALLOWED_UPDATES = ["message", "callback_query", "chat_member"] as const;

export type TelegramUpdate = Parameters<Telegraf["handleUpdate"]>[0];

export function createBot(token: string, services: BotServices): Telegraf {
  const bot = new Telegraf(token);
  const log = logger.child({ module: "bot" });

  const rt: BotRuntime = {
    ...services,
    relay: new AnonRelay(
      services.configs,
      services.links,
      services.generator,
      {
        sendHtml: async (chatId, html) => {
          await bot.telegram.sendMessage(chatId, html, { parse_mode: "HTML" });
        },
      },
      services.bossId
    ),
    admins: new AdminChecker((chatId, userId) => bot.telegram.getChatMember(chatId, userId)),
    limiter: new ChatRateLimiter(),
    pendingSetup: new TTLCache<number>(SETUP_TTL_MS),
    anonPayloads: new PayloadStore<PendingAnonQuestion>(),
    mentionPayloads: new PayloadStore<PendingMentionDelete>(),
    log,
  };

  // Commands first: the text handler below swallows everything else.
  registerAdminHandlers(bot, rt);
  registerUserHandlers(bot, rt);

  bot.on("callback_query", async (ctx) => {
    const query = ctx.callbackQuery;
    const action = parseCallback("data" in query ? query.data : undefined);
    if (!action) {
      await ctx.answerCbQuery();
      return;
    }
    switch (action.kind) {
      case "helped":
        return onHelped(ctx, rt);
      case "anon":
        return onAskAnon(ctx, rt, action.id);
      case "delete_mention":
        return onDeleteMention(ctx, rt, action.id);
      case "sync":
        return onSyncChoice(ctx, rt, action.direction);
    }
  });

  bot.catch(async (err, ctx) => {
    log.error({ err, updateType: ctx.updateType, chatId: ctx.chat?.id }, "Unhandled bot error");
    await replyGenericError(ctx, rt);
  });

  return bot;
}

/** Long polling until SIGINT/SIGTERM. */
export function startPolling(bot: Telegraf, onStop?: () => void) {
  const log = logger.child({ module: "bot" });
  bot
    .launch({ allowedUpdates: [...ALLOWED_UPDATES], dropPendingUpdates: false }, () => {
      log.info("Bot is polling for updates");
    })
    .catch((e: unknown) => {
      log.fatal({ err: e }, "Polling stopped with an error");
      process.exit(1);
    });

  const stop = (signal: string) => {
    log.info({ signal }, "Stopping bot");
    bot.stop(signal);
    onStop?.();
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

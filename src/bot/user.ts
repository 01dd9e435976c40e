import type { Context, Telegraf } from "telegraf";
import { rateLimiter } from "../middleware/rateLimiter";
import { ASK_OUTCOME_TEXT, forwardSourceOf } from "../services/anonRelay";
import { isAddressedToBot, triggerKeywords } from "../services/faq";
import { KEYS, readBool, readString } from "../state/settings";
import { logInteraction } from "../utils/log";
import { commandArgs, parseSetupPayload } from "../utils/parse";
import { removeEmojis, renderWelcome } from "../utils/text";
import { beginSheetSetup, continueSheetSetup } from "./admin";
import { answerKeyboard } from "./keyboards";
import { HELP_TEXT, PRIVATE_ONLY, START_TEXT, isJoin, linkText } from "./messages";
import type { BotRuntime } from "./runtime";

const DEFAULT_DISPLAY_NAME = "Helper Bot";

async function typing(ctx: Context, rt: BotRuntime) {
  try {
    await ctx.sendChatAction("typing");
  } catch (e) {
    rt.log.debug({ err: e }, "typing indicator failed");
  }
}

export async function onHelped(ctx: Context, rt: BotRuntime): Promise<void> {
  await ctx.answerCbQuery("Glad I could help!");
  try {
    await ctx.editMessageReplyMarkup(undefined);
  } catch (e) {
    rt.log.debug({ err: e }, "could not remove the answer buttons");
  }
}

export async function onAskAnon(ctx: Context, rt: BotRuntime, payloadId: string): Promise<void> {
  const from = ctx.from;
  if (!from) return;
  const pending = rt.anonPayloads.take(payloadId);
  if (!pending || pending.userId !== from.id) {
    await ctx.answerCbQuery(
      "Sorry, I couldn't retrieve your original question. Send /anon <your question> instead.",
      { show_alert: true }
    );
    return;
  }

  const outcome = await rt.relay.ask(from.id, pending.question);
  await ctx.answerCbQuery(ASK_OUTCOME_TEXT[outcome], { show_alert: true });
  if (outcome === "sent") {
    try {
      await ctx.editMessageReplyMarkup(undefined);
    } catch (e) {
      rt.log.debug({ err: e }, "could not remove the answer buttons");
    }
  }
  logInteraction({ chatId: from.id, userId: from.id, type: "anon", input: pending.question, outcome });
}

export function registerUserHandlers(bot: Telegraf, rt: BotRuntime) {
  bot.start(async (ctx) => {
    const groupId = parseSetupPayload(ctx.payload);
    if (groupId !== null && ctx.chat.type === "private") {
      await beginSheetSetup(ctx, rt, groupId);
      return;
    }
    await ctx.reply(START_TEXT);
    logInteraction({ chatId: ctx.chat.id, userId: ctx.from?.id, type: "start", input: "/start" });
  });

  bot.help(async (ctx) => {
    await ctx.reply(HELP_TEXT);
    logInteraction({ chatId: ctx.chat.id, userId: ctx.from?.id, type: "help", input: "/help" });
  });

  bot.on("chat_member", async (ctx) => {
    const update = ctx.chatMember;
    const member = update.new_chat_member;
    if (member.user.is_bot) return;
    const isMember = "is_member" in member ? member.is_member : undefined;
    if (!isJoin(update.old_chat_member.status, member.status, isMember)) return;

    const template = readString(rt.configs.get(update.chat.id), KEYS.welcomeMessage);
    if (!template) return;
    const title = "title" in update.chat ? update.chat.title : undefined;
    const html = renderWelcome(
      template,
      { id: member.user.id, firstName: member.user.first_name, username: member.user.username },
      title
    );
    await ctx.telegram.sendMessage(update.chat.id, html, { parse_mode: "HTML" });
    logInteraction({ chatId: update.chat.id, userId: member.user.id, type: "welcome", input: member.user.first_name });
  });

  bot.command("summarize", rateLimiter(rt.limiter), async (ctx) => {
    const target = ctx.message.reply_to_message;
    const text = !target ? undefined : "text" in target ? target.text : "caption" in target ? target.caption : undefined;
    if (!target || !text) {
      await ctx.reply("Reply to a message with /summarize to get a short summary of it.");
      return;
    }
    const t0 = Date.now();
    await typing(ctx, rt);
    let summary: string | null = null;
    try {
      summary = await rt.generator.summarize(text);
    } catch (e) {
      rt.log.error({ err: e, chatId: ctx.chat.id }, "Summary failed");
    }
    const cleaned = summary ? removeEmojis(summary) : "";
    await ctx.reply(cleaned || "I couldn't summarize that message right now.", {
      reply_parameters: { message_id: target.message_id },
    });
    logInteraction({
      chatId: ctx.chat.id,
      userId: ctx.from?.id,
      type: "summarize",
      input: text,
      outcome: cleaned ? "ok" : "failed",
      latencyMs: Date.now() - t0,
    });
  });

  bot.command("anon", rateLimiter(rt.limiter), async (ctx) => {
    const userId = ctx.from?.id;
    if (ctx.chat.type !== "private" || userId === undefined) {
      await ctx.reply(PRIVATE_ONLY);
      return;
    }
    const question = commandArgs(ctx.message.text);
    if (!question) {
      await ctx.reply("Usage: /anon <your question>");
      return;
    }
    const outcome = await rt.relay.ask(userId, question);
    await ctx.reply(ASK_OUTCOME_TEXT[outcome]);
    logInteraction({ chatId: ctx.chat.id, userId, type: "anon", input: question, outcome });
  });

  // Forwards in private chat link the sender to the forward's group.
  bot.on("message", async (ctx, next) => {
    const userId = ctx.from?.id;
    const message = ctx.message;
    if (
      ctx.chat.type !== "private" ||
      userId === undefined ||
      !("forward_origin" in message) ||
      !message.forward_origin
    ) {
      return next();
    }
    const outcome = rt.relay.linkFromForward(userId, forwardSourceOf(message.forward_origin));
    await ctx.reply(linkText(outcome));
    logInteraction({ chatId: ctx.chat.id, userId, type: "link", input: "forward", outcome: outcome.status });
  });

  bot.on("text", async (ctx) => {
    const text = ctx.message.text;
    if (text.startsWith("/")) return;
    const chat = ctx.chat;
    const isPrivate = chat.type === "private";
    if (isPrivate && (await continueSheetSetup(ctx, rt, text))) return;

    const userId = ctx.from?.id;
    // Private questions are answered from the linked group's FAQ when there is one.
    const linked = isPrivate && userId !== undefined ? rt.links.get(userId) : null;
    const config = rt.configs.get(linked ?? chat.id);

    const original = ctx.message.reply_to_message;
    const repliesToBot = original?.from?.id === ctx.botInfo.id;
    if (
      !isPrivate &&
      !isAddressedToBot({
        text,
        botUsername: ctx.botInfo.username,
        keywords: triggerKeywords(config),
        repliesToBot,
      })
    ) {
      return;
    }

    const decision = rt.limiter.take(chat.id);
    if (!decision.ok) {
      await ctx.reply(decision.message);
      return;
    }

    const t0 = Date.now();
    await typing(ctx, rt);
    const replyTo =
      original && "text" in original
        ? {
            author: repliesToBot
              ? readString(config, KEYS.botDisplayName) ?? DEFAULT_DISPLAY_NAME
              : original.from?.first_name ?? "Someone",
            text: original.text,
          }
        : undefined;
    const answer = await rt.responder.answer(config, {
      text,
      authorName: ctx.from?.first_name ?? "User",
      replyTo,
    });

    const replyParameters = { reply_parameters: { message_id: ctx.message.message_id } };
    if (isPrivate && userId !== undefined && readBool(config, KEYS.anonqEnabled, true)) {
      const id = rt.anonPayloads.put({ userId, question: text });
      await ctx.reply(answer.text, { ...replyParameters, reply_markup: answerKeyboard(id).reply_markup });
    } else {
      await ctx.reply(answer.text, replyParameters);
    }
    logInteraction({
      chatId: chat.id,
      userId,
      type: answer.source === "faq" ? "faq" : "chat",
      input: text,
      outcome: answer.source,
      latencyMs: Date.now() - t0,
    });
  });
}

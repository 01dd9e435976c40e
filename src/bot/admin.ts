import type { Context, Telegraf } from "telegraf";
import { addMention, removeMention } from "../services/mentions";
import { logInteraction } from "../utils/log";
import { commandArgs, isSheetUrl, parseMentionArgs, setupPayload } from "../utils/parse";
import { isGroupChat } from "../utils/telegram";
import {
  formatSettingsMarkdown,
  formatSettingsPlain,
  syncStatusText,
} from "../utils/text";
import {
  KEYS,
  mentionsToValue,
  readBool,
  readMentions,
  readString,
  type GroupMention,
} from "../state/settings";
import { conflictKeyboard, mentionsKeyboard, setupLinkKeyboard } from "./keyboards";
import {
  FALLBACK_NON_ADMIN,
  GROUP_ONLY,
  connectText,
  mentionErrorText,
  pushText,
  refreshText,
  saveFailedText,
  setupPromptText,
} from "./messages";
import type { BotRuntime } from "./runtime";

const TEXT_SETTINGS = [
  { command: "setpersonalityprompt", key: KEYS.personalityPrompt, min: 20, label: "Personality prompt" },
  { command: "setwelcomemessage", key: KEYS.welcomeMessage, min: 10, label: "Welcome message" },
  { command: "seterror", key: KEYS.genericError, min: 10, label: "Error message" },
] as const;

const nonAdminText = (rt: BotRuntime, chatId: number) =>
  readString(rt.configs.get(chatId), KEYS.errorNonAdmin) ?? FALLBACK_NON_ADMIN;

/** Group chat id when the sender is one of its admins; otherwise replies and returns null. */
async function requireGroupAdmin(ctx: Context, rt: BotRuntime): Promise<number | null> {
  const chat = ctx.chat;
  const from = ctx.from;
  if (!chat || !from) return null;
  if (!isGroupChat(chat.type)) {
    await ctx.reply(GROUP_ONLY);
    return null;
  }
  if (!(await rt.admins.isAdmin(chat.id, from.id))) {
    await ctx.reply(nonAdminText(rt, chat.id));
    return null;
  }
  return chat.id;
}

async function typing(ctx: Context, rt: BotRuntime) {
  try {
    await ctx.sendChatAction("typing");
  } catch (e) {
    rt.log.debug({ err: e }, "typing indicator failed");
  }
}

const mentionButtons = (rt: BotRuntime, chatId: number, mentions: GroupMention[]) =>
  mentionsKeyboard(mentions, (m) => rt.mentionPayloads.put({ chatId, keyword: m.keyword }));

/** `/start setfaqsheet_<chatId>` in private chat: arms the next message as the sheet link. */
export async function beginSheetSetup(ctx: Context, rt: BotRuntime, groupId: number): Promise<void> {
  const from = ctx.from;
  if (!from) return;
  if (!(await rt.admins.isAdmin(groupId, from.id))) {
    await ctx.reply(nonAdminText(rt, groupId));
    return;
  }
  rt.pendingSetup.set(String(from.id), groupId);
  await ctx.reply(setupPromptText(rt.sheets.serviceAccountEmail));
  logInteraction({ chatId: groupId, userId: from.id, type: "admin", input: "setfaqsheet:start" });
}

/** Handles a private message while a sheet setup is pending. Returns false when none is. */
export async function continueSheetSetup(ctx: Context, rt: BotRuntime, text: string): Promise<boolean> {
  const from = ctx.from;
  if (!from) return false;
  const key = String(from.id);
  const groupId = rt.pendingSetup.get(key);
  if (groupId === undefined) return false;

  const url = text.trim();
  if (!isSheetUrl(url)) {
    await ctx.reply(connectText({ ok: false, reason: "bad_url" }));
    return true;
  }
  rt.pendingSetup.delete(key);

  const t0 = Date.now();
  await typing(ctx, rt);
  const result = await rt.sync.connectSheet(groupId, url);
  await ctx.reply(connectText(result));
  logInteraction({
    chatId: groupId,
    userId: from.id,
    type: "admin",
    input: "setfaqsheet:url",
    outcome: result.ok ? "ok" : result.reason,
    latencyMs: Date.now() - t0,
  });
  return true;
}

export async function onSyncChoice(ctx: Context, rt: BotRuntime, direction: "push" | "pull"): Promise<void> {
  const chatId = ctx.chat?.id;
  const from = ctx.from;
  if (chatId === undefined || !from) return;
  if (!(await rt.admins.isAdmin(chatId, from.id))) {
    await ctx.answerCbQuery(nonAdminText(rt, chatId), { show_alert: true });
    return;
  }
  await ctx.answerCbQuery(direction === "push" ? "Pushing…" : "Pulling…");

  const text =
    direction === "push"
      ? pushText(await rt.sync.pushToSheet(chatId))
      : refreshText(await rt.sync.refreshFromSheet(chatId));
  try {
    await ctx.editMessageText(text);
  } catch (e) {
    rt.log.debug({ err: e }, "could not edit the conflict prompt");
    await ctx.reply(text);
  }
  logInteraction({ chatId, userId: from.id, type: "admin", input: `sync:${direction}` });
}

export async function onDeleteMention(ctx: Context, rt: BotRuntime, payloadId: string): Promise<void> {
  const chatId = ctx.chat?.id;
  const from = ctx.from;
  if (chatId === undefined || !from) return;
  if (!(await rt.admins.isAdmin(chatId, from.id))) {
    await ctx.answerCbQuery(nonAdminText(rt, chatId), { show_alert: true });
    return;
  }
  const pending = rt.mentionPayloads.take(payloadId);
  if (!pending || pending.chatId !== chatId) {
    await ctx.answerCbQuery("This button has expired. Run /editmentions again.", { show_alert: true });
    return;
  }

  const next = removeMention(readMentions(rt.configs.get(chatId)), pending.keyword);
  if (next === null) {
    await ctx.answerCbQuery(`"${pending.keyword}" was already removed.`);
    return;
  }
  const result = await rt.sync.applySetting(chatId, KEYS.groupMentions, mentionsToValue(next));
  if (!result.saved) {
    await ctx.answerCbQuery(saveFailedText(result.failure), { show_alert: true });
    return;
  }
  await ctx.answerCbQuery(`Removed "${pending.keyword}". ${syncStatusText(result.sync)}`);

  try {
    if (next.length === 0) await ctx.editMessageText("All added mention keywords were removed.");
    else await ctx.editMessageReplyMarkup(mentionButtons(rt, chatId, next).reply_markup);
  } catch (e) {
    rt.log.debug({ err: e }, "could not update the mentions keyboard");
  }
  logInteraction({ chatId, userId: from.id, type: "admin", input: `delmention:${pending.keyword}` });
}

export function registerAdminHandlers(bot: Telegraf, rt: BotRuntime) {
  bot.command("setfaqsheet", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const link = `https://t.me/${ctx.botInfo.username}?start=${setupPayload(chatId)}`;
    await ctx.reply(
      "To connect a Google Sheet, continue in a private chat with me.",
      setupLinkKeyboard(link)
    );
    logInteraction({ chatId, userId: ctx.from?.id, type: "admin", input: "/setfaqsheet" });
  });

  for (const { command, key, min, label } of TEXT_SETTINGS) {
    bot.command(command, async (ctx) => {
      const chatId = await requireGroupAdmin(ctx, rt);
      if (chatId === null) return;
      const text = commandArgs(ctx.message.text);
      if (text.length < min) {
        await ctx.reply(`Usage: /${command} <text>\nThe text must be at least ${min} characters long.`);
        return;
      }
      const result = await rt.sync.applySetting(chatId, key, text);
      await ctx.reply(
        result.saved ? `✅ ${label} updated. ${syncStatusText(result.sync)}` : saveFailedText(result.failure)
      );
      logInteraction({
        chatId,
        userId: ctx.from?.id,
        type: "admin",
        input: `/${command}`,
        outcome: result.saved ? result.sync : result.failure.reason,
      });
    });
  }

  bot.command("addmention", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const args = parseMentionArgs(commandArgs(ctx.message.text));
    if (!args) {
      await ctx.reply(
        "Usage: /addmention <keyword> [description]\nExample: /addmention mentor Questions for the mentors"
      );
      return;
    }
    const current = readMentions(rt.configs.get(chatId));
    const outcome = addMention(current, args.keyword, args.description, rt.maxMentionsPerChat);
    if (!outcome.ok) {
      await ctx.reply(mentionErrorText(outcome.reason, args.keyword, rt.maxMentionsPerChat));
      return;
    }
    const result = await rt.sync.applySetting(chatId, KEYS.groupMentions, mentionsToValue(outcome.mentions));
    await ctx.reply(
      result.saved
        ? `✅ Mention keyword "${args.keyword}" added. ${syncStatusText(result.sync)}`
        : saveFailedText(result.failure)
    );
    logInteraction({ chatId, userId: ctx.from?.id, type: "admin", input: "/addmention" });
  });

  bot.command("editmentions", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const mentions = readMentions(rt.configs.get(chatId));
    if (mentions.length === 0) {
      await ctx.reply("No mention keywords have been added. Add one with /addmention <keyword> [description].");
      return;
    }
    await ctx.reply("Tap a keyword to remove it:", mentionButtons(rt, chatId, mentions));
    logInteraction({ chatId, userId: ctx.from?.id, type: "admin", input: "/editmentions" });
  });

  bot.command("toggleanonq", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const enabled = !readBool(rt.configs.get(chatId), KEYS.anonqEnabled, true);
    const result = await rt.sync.applySetting(chatId, KEYS.anonqEnabled, enabled);
    await ctx.reply(
      result.saved
        ? `Anonymous questions are now ${enabled ? "enabled" : "disabled"} for this chat. ${syncStatusText(result.sync)}`
        : saveFailedText(result.failure)
    );
    logInteraction({ chatId, userId: ctx.from?.id, type: "admin", input: "/toggleanonq", outcome: String(enabled) });
  });

  bot.command("showsettings", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const config = rt.configs.get(chatId);
    try {
      await ctx.reply(formatSettingsMarkdown(config), { parse_mode: "MarkdownV2" });
    } catch (e) {
      rt.log.warn({ err: e, chatId }, "MarkdownV2 settings reply rejected; sending plain text");
      await ctx.reply(formatSettingsPlain(config));
    }
    logInteraction({ chatId, userId: ctx.from?.id, type: "admin", input: "/showsettings" });
  });

  bot.command("refresh", async (ctx) => {
    const chatId = await requireGroupAdmin(ctx, rt);
    if (chatId === null) return;
    const config = rt.configs.get(chatId);
    if (readString(config, KEYS.gsheetUrl) && readBool(config, KEYS.syncConflict, false)) {
      await ctx.reply(
        "⚠️ Local settings and the Google Sheet are out of sync. Which copy should win?",
        conflictKeyboard()
      );
      return;
    }
    const t0 = Date.now();
    await typing(ctx, rt);
    const result = await rt.sync.refreshFromSheet(chatId);
    await ctx.reply(refreshText(result));
    logInteraction({
      chatId,
      userId: ctx.from?.id,
      type: "admin",
      input: "/refresh",
      outcome: result.configured ? (result.settingsOk ? "ok" : "partial") : "not_configured",
      latencyMs: Date.now() - t0,
    });
  });
}

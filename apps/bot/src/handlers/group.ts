import type { Context } from "grammy";
import type { BotDeps } from "../bot.js";
import { isXpMilestone, parseCupArgs } from "../parse.js";
import { TEXTS, displayName, renderCupAdded, renderCups, renderLeaderboard, renderXpMilestone } from "../texts.js";

export function registerGroupHandlers(deps: BotDeps) {
  const { bot, store, settings, logger } = deps;
  const groups = bot.chatType(["group", "supergroup"]);

  async function canManageCups(ctx: Context, chatId: number, userId: number): Promise<boolean> {
    if (store.isAdmin(userId)) return true;
    try {
      const member = await ctx.api.getChatMember(chatId, userId);
      return member.status === "administrator" || member.status === "creator";
    } catch (err) {
      logger.warn({ err, t: "group", chat_id: chatId, user: userId }, "chat member lookup failed");
      return false;
    }
  }

  async function memberName(ctx: Context, chatId: number, userId: number): Promise<string> {
    try {
      const member = await ctx.api.getChatMember(chatId, userId);
      return displayName(member.user);
    } catch (err) {
      logger.debug({ err, t: "group", chat_id: chatId, user: userId }, "member name unavailable");
      return `User ${userId}`;
    }
  }

  groups.command("xp", async (ctx) => {
    const leaderboard = store.xpLeaderboard(ctx.chat.id, settings.xpLeaderboardSize);
    const rows: Array<{ name: string; score: number }> = [];
    for (const entry of leaderboard) {
      rows.push({ name: await memberName(ctx, ctx.chat.id, entry.user_id), score: entry.score });
    }
    await ctx.reply(renderLeaderboard(rows), { parse_mode: "HTML" });
  });

  groups.command("cups", async (ctx) => {
    await ctx.reply(renderCups(store.cupHistory(ctx.chat.id, settings.cupsLeaderboardSize)), { parse_mode: "HTML" });
  });

  groups.command("add_cup", async (ctx) => {
    if (!ctx.from) return;
    if (!(await canManageCups(ctx, ctx.chat.id, ctx.from.id))) return ctx.reply(TEXTS.adminOnly);
    const cup = parseCupArgs(ctx.match);
    if (!cup) return ctx.reply(TEXTS.cupUsage);
    await store.addCup(ctx.chat.id, cup);
    logger.info({ t: "group", step: "cup_added", chat_id: ctx.chat.id, by: ctx.from.id }, "cup added");
    await ctx.reply(renderCupAdded(cup.title), { parse_mode: "HTML" });
  });

  // Every non-command text message earns the configured reward.
  groups.on("message:text", async (ctx) => {
    const user = ctx.from;
    if (!user || user.is_bot || ctx.message.text.startsWith("/")) return;
    const reward = settings.xpMessageReward;
    if (reward <= 0) return;
    const score = await store.addXp(ctx.chat.id, user.id, reward);
    if (isXpMilestone(score, reward)) {
      await ctx.reply(renderXpMilestone(displayName(user), score), { parse_mode: "HTML" });
    }
  });
}

import { Bot } from "grammy";
import type { GuildStore } from "@guildhall/store";
import type { Settings } from "./config.js";
import { registerAdminHandlers } from "./handlers/admins.js";
import { registerDmHandlers } from "./handlers/dm.js";
import { registerGroupHandlers } from "./handlers/group.js";
import { registerReviewHandlers } from "./handlers/review.js";
import type { Logger } from "./logger.js";
import { SlidingWindowLimiter } from "./rateLimit.js";
import { ConversationState } from "./state.js";
import { TEXTS, renderRateLimited } from "./texts.js";

export type BotDeps = {
  bot: Bot;
  store: GuildStore;
  conversations: ConversationState;
  settings: Settings;
  logger: Logger;
};

export const BOT_COMMANDS = [
  { command: "start", description: "apply to join the guild" },
  { command: "status", description: "check your application" },
  { command: "withdraw", description: "withdraw your pending application" },
  { command: "cancel", description: "stop filling in an application" },
  { command: "pending", description: "applications waiting for review (admins)" },
  { command: "admins", description: "list bot admins" },
  { command: "xp", description: "XP leaderboard (groups)" },
  { command: "cups", description: "recent cups (groups)" }
];

const PRUNE_EVERY = 1000;

export function createBot(params: { settings: Settings; store: GuildStore; logger: Logger }): Bot {
  const { settings, store, logger } = params;
  const bot = new Bot(settings.botToken);
  const deps: BotDeps = { bot, store, settings, logger, conversations: new ConversationState() };
  const limiter = new SlidingWindowLimiter(settings.rateLimitIntervalSeconds * 1000, settings.rateLimitBurst);
  let seen = 0;

  // Log commands only, so production logs confirm updates arrive without recording chat content.
  bot.use(async (ctx, next) => {
    const text = ctx.message?.text;
    if (text?.trimStart().startsWith("/")) {
      logger.info(
        {
          t: "cmd",
          update_id: ctx.update.update_id,
          chat_id: ctx.chat?.id,
          chat_type: ctx.chat?.type,
          from_id: ctx.from?.id,
          text: text.slice(0, 120)
        },
        "command"
      );
    }
    await next();
  });

  // Private chats only; group XP is bounded by the reward itself.
  bot.use(async (ctx, next) => {
    if (ctx.chat?.type !== "private" || !ctx.from) return next();
    if (++seen % PRUNE_EVERY === 0) limiter.prune();
    const decision = limiter.hit(ctx.from.id);
    if (decision.allowed) return next();
    logger.warn({ t: "rate_limited", from_id: ctx.from.id, retry_after_ms: decision.retryAfterMs }, "update dropped");
    const text = renderRateLimited(decision.retryAfterMs);
    if (ctx.callbackQuery) await ctx.answerCallbackQuery({ text });
    else await ctx.reply(text);
  });

  // Review first: an admin's note reply must not reach the intake or XP handlers.
  registerReviewHandlers(deps);
  registerAdminHandlers(deps);
  registerDmHandlers(deps);
  registerGroupHandlers(deps);

  bot.catch(async (err) => {
    const ctx = err.ctx;
    logger.error({ err: err.error, t: "bot_error", update_id: ctx.update.update_id }, "update failed");
    if (!ctx.chat) return;
    try {
      await ctx.reply(TEXTS.errorGeneric);
    } catch (replyErr) {
      logger.warn({ err: replyErr, t: "bot_error", chat_id: ctx.chat.id }, "apology not delivered");
    }
  });

  return bot;
}

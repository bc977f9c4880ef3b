import type { BotDeps } from "../bot.js";
import { parseUserIdArg } from "../parse.js";
import { TEXTS, renderAdmins } from "../texts.js";

export function registerAdminHandlers(deps: BotDeps) {
  const { bot, store, settings, logger } = deps;

  bot.command("admins", async (ctx) => {
    await ctx.reply(renderAdmins(store.adminDetails()), { parse_mode: "HTML" });
  });

  bot.command("promote", async (ctx) => {
    if (!ctx.from) return;
    if (ctx.from.id !== settings.ownerId) return ctx.reply(TEXTS.ownerOnly);
    const userId = parseUserIdArg(ctx.match);
    if (userId === null) return ctx.reply(TEXTS.userIdRequired);
    const added = await store.addAdmin(userId);
    logger.info({ t: "admin", step: "promote", user: userId, changed: added }, "promote");
    await ctx.reply(added ? `User ${userId} is now an admin.` : `User ${userId} is already an admin.`);
  });

  bot.command("demote", async (ctx) => {
    if (!ctx.from) return;
    if (ctx.from.id !== settings.ownerId) return ctx.reply(TEXTS.ownerOnly);
    const userId = parseUserIdArg(ctx.match);
    if (userId === null) return ctx.reply(TEXTS.userIdRequired);
    if (userId === settings.ownerId) return ctx.reply(TEXTS.ownerStays);
    const removed = await store.removeAdmin(userId);
    logger.info({ t: "admin", step: "demote", user: userId, changed: removed }, "demote");
    await ctx.reply(removed ? `User ${userId} is no longer an admin.` : `User ${userId} is not an admin.`);
  });
}

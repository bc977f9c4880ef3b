import type { BotDeps } from "../bot.js";
import { answerIntake, startIntake } from "../intake.js";
import { CB, welcomeKeyboard } from "../keyboards.js";
import { TEXTS, displayName, renderStatus } from "../texts.js";
import { postForReview } from "./review.js";

export function registerDmHandlers(deps: BotDeps) {
  const { bot, store, conversations, settings, logger } = deps;
  const dm = bot.chatType("private");

  dm.command("start", async (ctx) => {
    await ctx.reply(TEXTS.welcome, { parse_mode: "HTML", reply_markup: welcomeKeyboard() });
  });

  bot.callbackQuery(CB.apply, async (ctx) => {
    await ctx.answerCallbackQuery();
    const user = ctx.from;
    if (store.isAdmin(user.id)) return ctx.editMessageText(TEXTS.adminsCannotApply);
    if (store.hasApplication(user.id) || store.isUnderReview(user.id)) return ctx.editMessageText(TEXTS.duplicate);
    if (store.applicationStatus(user.id)?.status === "approved") return ctx.editMessageText(TEXTS.alreadyMember);

    const { session, question } = startIntake(user.language_code ?? null);
    conversations.setIntake(user.id, session);
    logger.info({ t: "intake", step: "started", user: user.id }, "intake started");
    await ctx.editMessageText(TEXTS.intakeStarted);
    await ctx.reply(question.prompt);
  });

  dm.command("cancel", async (ctx) => {
    if (!ctx.from) return;
    await ctx.reply(conversations.cancelIntake(ctx.from.id) ? TEXTS.intakeCancelled : TEXTS.nothingToCancel);
  });

  dm.command("status", async (ctx) => {
    if (!ctx.from) return;
    const entry = store.applicationStatus(ctx.from.id);
    if (!entry) return ctx.reply(TEXTS.noStatus);
    await ctx.reply(renderStatus(entry), { parse_mode: "HTML" });
  });

  dm.command("withdraw", async (ctx) => {
    if (!ctx.from) return;
    conversations.cancelIntake(ctx.from.id);
    const outcome = await store.withdrawApplication(ctx.from.id);
    await ctx.reply(outcome.ok ? TEXTS.withdrawn : TEXTS.nothingToWithdraw);
  });

  dm.on("message:text", async (ctx) => {
    const user = ctx.from;
    const text = ctx.message.text;
    if (!user || text.startsWith("/")) return;
    const session = conversations.intakeFor(user.id);
    if (!session) return ctx.reply(TEXTS.dmHint);

    const step = answerIntake(session, text);
    if (step.kind === "invalid") {
      return ctx.reply(`${step.reason === "too_short" ? TEXTS.tooShort : TEXTS.tooLong}\n\n${step.question.prompt}`);
    }
    if (step.kind === "next") {
      conversations.setIntake(user.id, step.session);
      return ctx.reply(step.question.prompt);
    }

    const outcome = await store.submitApplication({
      user_id: user.id,
      full_name: displayName(user),
      username: user.username ?? null,
      language_code: session.languageCode,
      answers: { kind: "structured", responses: step.responses }
    });
    conversations.cancelIntake(user.id);
    if (!outcome.ok) {
      logger.warn({ t: "intake", step: "rejected", user: user.id, reason: outcome.reason }, "submission refused");
      return ctx.reply(outcome.reason === "already_approved" ? TEXTS.alreadyMember : TEXTS.duplicate);
    }
    logger.info({ t: "intake", step: "submitted", user: user.id }, "application submitted");
    await ctx.reply(TEXTS.received);
    if (settings.reviewChatId !== null) {
      await postForReview({ api: ctx.api, chatId: settings.reviewChatId, application: outcome.application, logger });
    }
  });
}

import type { Api, Context } from "grammy";
import type { Application, ApplicationHistoryEntry, DecisionStatus } from "@guildhall/shared";
import type { BotDeps } from "../bot.js";
import { CB, NOTE_SKIP, REVIEW_ACTION, noteKeyboard, reviewKeyboard } from "../keyboards.js";
import type { Logger } from "../logger.js";
import type { PendingDecision } from "../state.js";
import {
  TEXTS,
  renderApplication,
  renderDecisionForAdmin,
  renderDecisionForApplicant,
  renderNotePrompt
} from "../texts.js";

const PENDING_PAGE_SIZE = 5;

export async function postForReview(params: { api: Api; chatId: number; application: Application; logger: Logger }) {
  const { api, chatId, application, logger } = params;
  try {
    await api.sendMessage(chatId, renderApplication(application), {
      parse_mode: "HTML",
      reply_markup: reviewKeyboard(application.user_id)
    });
  } catch (err) {
    // the application is stored either way; admins still see it under /pending
    logger.error({ err, t: "review", step: "post", chat_id: chatId, applicant: application.user_id }, "review post failed");
  }
}

export function registerReviewHandlers(deps: BotDeps) {
  const { bot, store, conversations, logger } = deps;

  async function finalize(ctx: Context, adminId: number, decision: PendingDecision, note: string | null) {
    let entry: ApplicationHistoryEntry;
    try {
      entry = await store.recordDecision(decision.applicantId, decision.status, {
        note,
        language_code: decision.languageCode
      });
    } catch (err) {
      // the application is already off the pending set; keep the prompt so the admin can retry
      conversations.awaitNote(adminId, decision);
      throw err;
    }
    logger.info(
      { t: "review", step: "decided", admin: adminId, applicant: decision.applicantId, status: decision.status },
      "decision recorded"
    );
    await ctx.reply(renderDecisionForAdmin(decision.status, decision.applicantName, entry.note), { parse_mode: "HTML" });
    try {
      await ctx.api.sendMessage(decision.applicantId, renderDecisionForApplicant(decision.status, entry.note));
    } catch (err) {
      logger.warn({ err, t: "review", step: "notify", applicant: decision.applicantId }, "applicant not notified");
    }
  }

  bot.command("pending", async (ctx) => {
    if (!ctx.from) return;
    if (!store.isAdmin(ctx.from.id)) return ctx.reply(TEXTS.adminOnly);
    const pending = store.pendingApplications();
    if (!pending.length) return ctx.reply(TEXTS.noPending);
    for (const application of pending.slice(0, PENDING_PAGE_SIZE)) {
      await ctx.reply(renderApplication(application), {
        parse_mode: "HTML",
        reply_markup: reviewKeyboard(application.user_id)
      });
    }
  });

  bot.callbackQuery(CB.reviewSkip, async (ctx) => {
    if (!store.isAdmin(ctx.from.id)) return ctx.answerCallbackQuery({ text: TEXTS.adminOnly, show_alert: true });
    await ctx.answerCallbackQuery();
    await ctx.editMessageReplyMarkup();
  });

  // Phase one: take the application off the pending set and ask for an optional note.
  bot.callbackQuery(REVIEW_ACTION, async (ctx) => {
    const adminId = ctx.from.id;
    if (!store.isAdmin(adminId)) return ctx.answerCallbackQuery({ text: TEXTS.adminOnly, show_alert: true });
    if (conversations.hasNotePrompt(adminId)) {
      return ctx.answerCallbackQuery({ text: TEXTS.finishOpenDecision, show_alert: true });
    }
    const applicantId = Number(ctx.match[1]);
    const status: DecisionStatus = ctx.match[2] === "approve" ? "approved" : "denied";
    await ctx.answerCallbackQuery();

    const application = await store.popApplication(applicantId);
    if (!application) return ctx.editMessageText(TEXTS.noLongerPending);

    conversations.awaitNote(adminId, {
      applicantId,
      applicantName: application.full_name,
      status,
      languageCode: application.language_code,
      chatId: ctx.chat?.id ?? adminId
    });
    logger.info({ t: "review", step: "popped", admin: adminId, applicant: applicantId, status }, "awaiting note");
    await ctx.editMessageText(`${renderApplication(application)}\n\n${renderNotePrompt(status, application.full_name)}`, {
      parse_mode: "HTML",
      reply_markup: noteKeyboard(applicantId)
    });
  });

  // Phase two, without a note.
  bot.callbackQuery(NOTE_SKIP, async (ctx) => {
    const adminId = ctx.from.id;
    const decision = conversations.takeNotePrompt(adminId, { applicantId: Number(ctx.match[1]) });
    if (!decision) return ctx.answerCallbackQuery({ text: TEXTS.noLongerPending });
    await ctx.answerCallbackQuery();
    await ctx.editMessageReplyMarkup();
    await finalize(ctx, adminId, decision, null);
  });

  // Phase two, with the admin's next text message in the prompt's chat as the note.
  bot.on("message:text", async (ctx, next) => {
    const admin = ctx.from;
    if (!admin || ctx.message.text.startsWith("/")) return next();
    const decision = conversations.takeNotePrompt(admin.id, { chatId: ctx.chat.id });
    if (!decision) return next();
    await finalize(ctx, admin.id, decision, ctx.message.text);
  });
}

import { InlineKeyboard } from "grammy";
import { TEXTS } from "./texts.js";

export const CB = {
  apply: "apply",
  reviewSkip: "review:skip"
} as const;

export const REVIEW_ACTION = /^review:(-?\d+):(approve|deny)$/;
export const NOTE_SKIP = /^note:(-?\d+):skip$/;

export function welcomeKeyboard() {
  return new InlineKeyboard().text(TEXTS.applyButton, CB.apply);
}

export function reviewKeyboard(userId: number) {
  return new InlineKeyboard()
    .text(TEXTS.approveButton, `review:${userId}:approve`)
    .text(TEXTS.denyButton, `review:${userId}:deny`)
    .row()
    .text(TEXTS.skipButton, CB.reviewSkip);
}

export function noteKeyboard(applicantId: number) {
  return new InlineKeyboard().text(TEXTS.noteButton, `note:${applicantId}:skip`);
}

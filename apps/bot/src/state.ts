import type { DecisionStatus } from "@guildhall/shared";
import type { IntakeSession } from "./intake.js";

// In-memory conversation state. Restarting the bot clears it; applications already submitted live in the store.

export type PendingDecision = {
  applicantId: number;
  applicantName: string;
  status: DecisionStatus;
  languageCode: string | null;
  /** Chat that showed the prompt; only a reply there is taken as the note. */
  chatId: number;
};

export class ConversationState {
  private readonly intake = new Map<number, IntakeSession>();
  private readonly notePrompts = new Map<number, PendingDecision>();

  intakeFor(userId: number): IntakeSession | undefined {
    return this.intake.get(userId);
  }

  setIntake(userId: number, session: IntakeSession) {
    this.intake.set(userId, session);
  }

  /** Returns whether an intake was in progress. */
  cancelIntake(userId: number): boolean {
    return this.intake.delete(userId);
  }

  /** Keyed by the reviewing admin: one open note prompt per admin. */
  awaitNote(adminId: number, decision: PendingDecision) {
    this.notePrompts.set(adminId, decision);
  }

  hasNotePrompt(adminId: number): boolean {
    return this.notePrompts.has(adminId);
  }

  takeNotePrompt(adminId: number, match: { applicantId?: number; chatId?: number } = {}): PendingDecision | null {
    const decision = this.notePrompts.get(adminId);
    if (!decision) return null;
    if (match.applicantId !== undefined && decision.applicantId !== match.applicantId) return null;
    if (match.chatId !== undefined && decision.chatId !== match.chatId) return null;
    this.notePrompts.delete(adminId);
    return decision;
  }
}

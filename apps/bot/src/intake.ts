import type { ApplicationResponse } from "@guildhall/shared";

export type IntakeQuestion = {
  id: string;
  prompt: string;
  minLength: number;
  maxLength: number;
};

export const INTAKE_QUESTIONS: readonly IntakeQuestion[] = [
  { id: "about", prompt: "Tell us a little about yourself.", minLength: 10, maxLength: 600 },
  { id: "experience", prompt: "Which games or communities have you been part of before?", minLength: 3, maxLength: 600 },
  { id: "motivation", prompt: "Why do you want to join the guild?", minLength: 10, maxLength: 800 }
];

export type IntakeSession = {
  step: number;
  responses: ApplicationResponse[];
  languageCode: string | null;
};

export type IntakeStep =
  | { kind: "invalid"; reason: "too_short" | "too_long"; question: IntakeQuestion }
  | { kind: "next"; session: IntakeSession; question: IntakeQuestion }
  | { kind: "complete"; responses: ApplicationResponse[] };

export function startIntake(
  languageCode: string | null,
  questions: readonly IntakeQuestion[] = INTAKE_QUESTIONS
): { session: IntakeSession; question: IntakeQuestion } {
  const question = questions[0];
  if (!question) throw new Error("intake needs at least one question");
  return { session: { step: 0, responses: [], languageCode }, question };
}

export function currentQuestion(
  session: IntakeSession,
  questions: readonly IntakeQuestion[] = INTAKE_QUESTIONS
): IntakeQuestion | null {
  return questions[session.step] ?? null;
}

/** Applies one answer. Never mutates `session`; the caller keeps whichever session the step returns. */
export function answerIntake(
  session: IntakeSession,
  text: string,
  questions: readonly IntakeQuestion[] = INTAKE_QUESTIONS
): IntakeStep {
  const question = currentQuestion(session, questions);
  if (!question) return { kind: "complete", responses: session.responses };

  const answer = text.trim();
  if (answer.length < question.minLength) return { kind: "invalid", reason: "too_short", question };
  if (answer.length > question.maxLength) return { kind: "invalid", reason: "too_long", question };

  const responses = [...session.responses, { question_id: question.id, question: question.prompt, answer }];
  const next = questions[session.step + 1];
  if (!next) return { kind: "complete", responses };
  return { kind: "next", session: { ...session, step: session.step + 1, responses }, question: next };
}

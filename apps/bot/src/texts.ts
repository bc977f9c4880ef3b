import {
  displayTimestamp,
  escapeHtml,
  type AdminRecord,
  type Application,
  type ApplicationHistoryEntry,
  type ApplicationStatus,
  type CupRecord,
  type DecisionStatus
} from "@guildhall/shared";

export const TEXTS = {
  welcome: "<b>Welcome to the guild hall!</b>\n\nTap the button below to apply for membership.",
  applyButton: "Apply to join",
  intakeStarted: "Your application has started. Answer each question in a single message, or send /cancel to stop.",
  intakeCancelled: "Application cancelled.",
  nothingToCancel: "There is no application in progress.",
  tooShort: "That answer is a bit short, please tell us more.",
  tooLong: "That answer is too long, please shorten it.",
  received: "Thank you! Your application was received and will be reviewed soon.",
  duplicate: "You already have an application waiting for review.",
  alreadyMember: "You are already a member of the guild.",
  adminsCannotApply: "Admins do not need to apply.",
  adminOnly: "This action is for admins only.",
  ownerOnly: "Only the bot owner can run this command.",
  noPending: "There are no applications waiting for review.",
  noLongerPending: "This application is no longer pending.",
  noStatus: "You have not applied yet. Send /start to begin.",
  withdrawn: "Your application was withdrawn.",
  nothingToWithdraw: "You have no pending application to withdraw.",
  finishOpenDecision: "Finish your open decision first: reply with a note or tap \"No note\".",
  dmHint: "Send /start to apply, /status to check your application or /withdraw to take it back.",
  ownerStays: "The owner cannot be demoted.",
  noteButton: "No note",
  skipButton: "Skip",
  approveButton: "Approve",
  denyButton: "Deny",
  approvedUser: "Your application was approved. Welcome to the guild!",
  deniedUser: "Sorry, your application was not accepted this time.",
  noAdmins: "No admins are registered.",
  userIdRequired: "Please give a numeric user id, for example /promote 123456.",
  noData: "Nothing recorded yet.",
  cupUsage: "Usage: /add_cup title | description | first, second, third",
  xpTitle: "<b>XP leaderboard</b>",
  cupsTitle: "<b>Guild cups</b>",
  errorGeneric: "Something went wrong. Please try again later."
} as const;

const STATUS_LABELS: Record<ApplicationStatus, string> = {
  pending: "Pending review",
  approved: "Approved",
  denied: "Denied",
  withdrawn: "Withdrawn"
};

export type DisplayUser = {
  id: number;
  first_name?: string | undefined;
  last_name?: string | undefined;
  username?: string | undefined;
};

export function displayName(user: DisplayUser): string {
  const full = [user.first_name, user.last_name].filter(Boolean).join(" ").trim();
  return full || user.username || String(user.id);
}

export function renderApplication(app: Application): string {
  const lines = [
    `<b>Applicant:</b> ${escapeHtml(app.full_name)} (<code>${app.user_id}</code>)`,
    app.username ? `<b>Username:</b> @${escapeHtml(app.username)}` : null,
    app.language_code ? `<b>Language:</b> ${escapeHtml(app.language_code)}` : null
  ];
  if (app.responses.length) {
    for (const r of app.responses) lines.push(`<b>${escapeHtml(r.question)}</b>\n${escapeHtml(r.answer)}`);
  } else {
    lines.push(`<b>Answer:</b> ${escapeHtml(app.answer || "-")}`);
  }
  lines.push(`<b>Submitted:</b> ${displayTimestamp(app.created_at)}`);
  return lines.filter((line): line is string => line !== null).join("\n");
}

export function renderStatus(entry: ApplicationHistoryEntry): string {
  const lines = [`<b>Status:</b> ${STATUS_LABELS[entry.status]}`, `<b>Updated:</b> ${displayTimestamp(entry.updated_at)}`];
  if (entry.note) lines.push(`<b>Note:</b> ${escapeHtml(entry.note)}`);
  return lines.join("\n");
}

export function renderDecisionForApplicant(status: DecisionStatus, note: string | null): string {
  const base = status === "approved" ? TEXTS.approvedUser : TEXTS.deniedUser;
  return note ? `${base}\n\nNote from the reviewers: ${note}` : base;
}

export function renderDecisionForAdmin(status: DecisionStatus, applicantName: string, note: string | null): string {
  const verb = status === "approved" ? "approved" : "denied";
  const line = `Application from ${escapeHtml(applicantName)} ${verb}.`;
  return note ? `${line}\n<b>Note:</b> ${escapeHtml(note)}` : line;
}

export function renderNotePrompt(status: DecisionStatus, applicantName: string): string {
  const verb = status === "approved" ? "Approving" : "Denying";
  return `${verb} ${escapeHtml(applicantName)}. Reply with a note for the applicant, or tap "${TEXTS.noteButton}".`;
}

export function renderAdmins(admins: AdminRecord[]): string {
  if (!admins.length) return TEXTS.noAdmins;
  const lines = admins.map((admin) => {
    const label = [admin.full_name, admin.username ? `@${admin.username}` : null].filter(Boolean).join(" ");
    return label ? `• ${escapeHtml(label)} (<code>${admin.user_id}</code>)` : `• <code>${admin.user_id}</code>`;
  });
  return ["<b>Admins</b>", ...lines].join("\n");
}

export function renderXpMilestone(name: string, score: number): string {
  return `${escapeHtml(name)} now has ${score} XP!`;
}

export function renderLeaderboard(rows: Array<{ name: string; score: number }>): string {
  if (!rows.length) return TEXTS.noData;
  return [TEXTS.xpTitle, ...rows.map((row, i) => `${i + 1}. <b>${escapeHtml(row.name)}</b> - <code>${row.score}</code>`)].join(
    "\n"
  );
}

export function renderCups(cups: CupRecord[]): string {
  if (!cups.length) return TEXTS.noData;
  const blocks = cups.map((cup) => {
    const podium = cup.podium.filter(Boolean).map(escapeHtml).join(", ") || "-";
    const head = cup.description ? `<b>${escapeHtml(cup.title)}</b> - ${escapeHtml(cup.description)}` : `<b>${escapeHtml(cup.title)}</b>`;
    return `${head}\n🥇 ${podium}`;
  });
  return [TEXTS.cupsTitle, ...blocks].join("\n\n");
}

export function renderCupAdded(title: string): string {
  return `New cup recorded: <b>${escapeHtml(title)}</b>`;
}

export function renderRateLimited(retryAfterMs: number): string {
  const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
  return `You are sending requests too quickly. Please wait ${seconds}s and try again.`;
}

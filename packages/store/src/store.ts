import { Mutex } from "async-mutex";
import {
  formatTimestamp,
  type AdminProfile,
  type AdminRecord,
  type Application,
  type ApplicationHistoryEntry,
  type ApplicationResponse,
  type ApplicationStatistics,
  type ApplicationStatus,
  type CupRecord,
  type DecisionStatus,
  type LeaderboardEntry
} from "@guildhall/shared";
import type { Cipher } from "./cipher.js";
import { SnapshotFile, type SnapshotFs, type StoreLogger } from "./persistence.js";
import type { SnapshotDocument } from "./schema.js";
import { StateModel } from "./state.js";

export type ApplicationAnswers =
  | { kind: "text"; answer: string }
  | { kind: "structured"; responses: ApplicationResponse[] };

export interface SubmissionInput {
  user_id: number;
  full_name: string;
  username?: string | null;
  language_code?: string | null;
  answers: ApplicationAnswers;
}

export type SubmitOutcome =
  | { ok: true; application: Application; entry: ApplicationHistoryEntry }
  | { ok: false; reason: "duplicate" | "in_review" | "already_approved" };

export type WithdrawOutcome = { ok: true; entry: ApplicationHistoryEntry } | { ok: false; reason: "not_found" };

export type DecideOutcome =
  | { ok: true; application: Application; entry: ApplicationHistoryEntry }
  | { ok: false; reason: "not_found" };

export interface DecisionDetails {
  note?: string | null;
  language_code?: string | null;
}

export interface NewCup {
  title: string;
  description: string;
  podium: string[];
}

export interface GuildStoreOptions {
  path: string;
  cipher: Cipher;
  logger?: StoreLogger;
  clock?: () => Date;
  fs?: SnapshotFs;
}

type Mutation<T> = { result: T; changed: boolean };

export function summarizeResponses(responses: ApplicationResponse[]): string {
  return responses.map((r) => `${r.question}: ${r.answer}`).join("\n");
}

function cleanText(value: string | null | undefined): string | null {
  const s = value?.trim();
  return s ? s : null;
}

/**
 * Process-wide store: admins, application lifecycle and engagement ledger over one encrypted snapshot.
 *
 * Every mutation runs under one mutex as `mutate -> save`. If the save fails the in-memory state is rolled
 * back to the pre-mutation copy and the `PersistenceError` is re-thrown, so memory never runs ahead of disk
 * once the lock is released. Reads are synchronous and see the current in-memory state.
 */
export class GuildStore {
  private readonly mutex = new Mutex();
  private readonly file: SnapshotFile;
  private readonly logger: StoreLogger | undefined;
  private readonly clock: () => Date;
  private state = StateModel.empty();
  // Popped for review, decision not yet recorded. Memory only: a restart abandons the review.
  private inReview = new Set<number>();

  constructor(options: GuildStoreOptions) {
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.file = new SnapshotFile(options.path, options.cipher, { fs: options.fs, logger: options.logger });
  }

  get path(): string {
    return this.file.filePath;
  }

  async load(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const doc = await this.file.load();
      this.state = doc ? StateModel.fromDocument(doc) : StateModel.empty();
      this.inReview = new Set();
      this.logger?.info(
        {
          admins: this.state.admins.length,
          pending: this.state.applications.size,
          history: this.state.history.size,
          chats: this.state.xp.size
        },
        "store loaded"
      );
    });
  }

  /** Persists the current state as-is (e.g. on shutdown). */
  async save(): Promise<void> {
    await this.mutex.runExclusive(() => this.file.save(this.state.toDocument()));
  }

  snapshot(): SnapshotDocument {
    return this.state.toDocument();
  }

  private async mutate<T>(op: string, fn: (state: StateModel) => Mutation<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const before = this.state.clone();
      const reviewsBefore = new Set(this.inReview);
      let outcome: Mutation<T>;
      try {
        outcome = fn(this.state);
      } catch (err) {
        this.state = before;
        this.inReview = reviewsBefore;
        throw err;
      }
      const { result, changed } = outcome;
      if (!changed) return result;
      try {
        await this.file.save(this.state.toDocument());
      } catch (err) {
        this.state = before;
        this.inReview = reviewsBefore;
        this.logger?.error({ err, op }, "snapshot save failed, in-memory change rolled back");
        throw err;
      }
      return result;
    });
  }

  private now(): string {
    return formatTimestamp(this.clock());
  }

  // --- Admins ---

  /** Adds the admin or merges newer profile details. Resolves to whether anything changed. */
  async addAdmin(userId: number, profile: Partial<AdminProfile> = {}): Promise<boolean> {
    return this.mutate("addAdmin", (state) => {
      let changed = false;
      if (!state.admins.includes(userId)) {
        state.admins.push(userId);
        changed = true;
      }
      const current = state.adminProfiles.get(userId) ?? { username: null, full_name: null };
      const merged: AdminProfile = {
        username: cleanText(profile.username?.trim().replace(/^@/, "")) ?? current.username,
        full_name: cleanText(profile.full_name) ?? current.full_name
      };
      if (merged.username !== current.username || merged.full_name !== current.full_name) {
        state.adminProfiles.set(userId, merged);
        changed = true;
      }
      return { result: changed, changed };
    });
  }

  async removeAdmin(userId: number): Promise<boolean> {
    return this.mutate<boolean>("removeAdmin", (state) => {
      const index = state.admins.indexOf(userId);
      if (index < 0) return { result: false, changed: false };
      state.admins.splice(index, 1);
      state.adminProfiles.delete(userId);
      return { result: true, changed: true };
    });
  }

  isAdmin(userId: number): boolean {
    return this.state.admins.includes(userId);
  }

  listAdmins(): number[] {
    return [...this.state.admins];
  }

  adminDetails(): AdminRecord[] {
    return this.state.adminDetails();
  }

  // --- Application lifecycle ---

  async submitApplication(input: SubmissionInput): Promise<SubmitOutcome> {
    return this.mutate<SubmitOutcome>("submitApplication", (state) => {
      if (state.applications.has(input.user_id)) {
        return { result: { ok: false, reason: "duplicate" }, changed: false };
      }
      if (this.inReview.has(input.user_id)) {
        return { result: { ok: false, reason: "in_review" }, changed: false };
      }
      if (state.history.get(input.user_id)?.status === "approved") {
        return { result: { ok: false, reason: "already_approved" }, changed: false };
      }

      const created_at = this.now();
      const language_code = cleanText(input.language_code);
      const responses = input.answers.kind === "structured" ? input.answers.responses.map((r) => ({ ...r })) : [];
      const application: Application = {
        user_id: input.user_id,
        full_name: input.full_name,
        username: cleanText(input.username),
        answer: input.answers.kind === "structured" ? summarizeResponses(responses) : input.answers.answer,
        responses,
        created_at,
        language_code
      };
      const entry: ApplicationHistoryEntry = { status: "pending", updated_at: created_at, note: null, language_code };

      state.applications.set(input.user_id, application);
      state.history.set(input.user_id, entry);
      return { result: { ok: true, application: { ...application }, entry: { ...entry } }, changed: true };
    });
  }

  async withdrawApplication(userId: number): Promise<WithdrawOutcome> {
    return this.mutate<WithdrawOutcome>("withdrawApplication", (state) => {
      const application = state.applications.get(userId);
      if (!application) return { result: { ok: false, reason: "not_found" }, changed: false };
      state.applications.delete(userId);
      const entry = this.writeHistory(state, userId, "withdrawn", { language_code: application.language_code });
      return { result: { ok: true, entry: { ...entry } }, changed: true };
    });
  }

  /**
   * First phase of a review: take the application off the pending set. The user cannot submit again
   * until `recordDecision` closes the review.
   */
  async popApplication(userId: number): Promise<Application | null> {
    return this.mutate<Application | null>("popApplication", (state) => {
      const application = state.applications.get(userId);
      if (!application) return { result: null, changed: false };
      state.applications.delete(userId);
      this.inReview.add(userId);
      return { result: application, changed: true };
    });
  }

  /**
   * Second phase of a review: write the decision (and optional moderation note) to history.
   * A terminal status also clears an application that is still pending for the user.
   */
  async recordDecision(
    userId: number,
    status: ApplicationStatus,
    details: DecisionDetails = {}
  ): Promise<ApplicationHistoryEntry> {
    return this.mutate("recordDecision", (state) => {
      if (status !== "pending") state.applications.delete(userId);
      this.inReview.delete(userId);
      const entry = this.writeHistory(state, userId, status, details);
      return { result: { ...entry }, changed: true };
    });
  }

  async decideApplication(userId: number, decision: DecisionStatus, details: DecisionDetails = {}): Promise<DecideOutcome> {
    return this.mutate<DecideOutcome>("decideApplication", (state) => {
      const application = state.applications.get(userId);
      if (!application) return { result: { ok: false, reason: "not_found" }, changed: false };
      state.applications.delete(userId);
      const entry = this.writeHistory(state, userId, decision, {
        note: details.note,
        language_code: details.language_code ?? application.language_code
      });
      return { result: { ok: true, application, entry: { ...entry } }, changed: true };
    });
  }

  private writeHistory(
    state: StateModel,
    userId: number,
    status: ApplicationStatus,
    details: DecisionDetails
  ): ApplicationHistoryEntry {
    const previous = state.history.get(userId);
    const entry: ApplicationHistoryEntry = {
      status,
      updated_at: this.now(),
      note: cleanText(details.note),
      language_code: cleanText(details.language_code) ?? previous?.language_code ?? null
    };
    state.history.set(userId, entry);
    return entry;
  }

  /** Whether an application was popped for review and its decision is still outstanding. */
  isUnderReview(userId: number): boolean {
    return this.inReview.has(userId);
  }

  hasApplication(userId: number): boolean {
    return this.state.applications.has(userId);
  }

  getApplication(userId: number): Application | null {
    const application = this.state.applications.get(userId);
    return application ? { ...application, responses: application.responses.map((r) => ({ ...r })) } : null;
  }

  pendingApplications(): Application[] {
    return this.state.pendingApplications();
  }

  applicationStatus(userId: number): ApplicationHistoryEntry | null {
    const entry = this.state.history.get(userId);
    return entry ? { ...entry } : null;
  }

  applicationStatistics(): ApplicationStatistics {
    return this.state.statistics();
  }

  // --- Engagement ledger ---

  async addXp(chatId: number, userId: number, amount: number): Promise<number> {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new RangeError(`XP amount must be a non-negative integer, got ${amount}`);
    }
    return this.mutate("addXp", (state) => {
      let scores = state.xp.get(chatId);
      if (!scores) {
        scores = new Map();
        state.xp.set(chatId, scores);
      }
      const total = (scores.get(userId) ?? 0) + amount;
      const changed = amount > 0 || !scores.has(userId);
      scores.set(userId, total);
      return { result: total, changed };
    });
  }

  xpLeaderboard(chatId: number, limit: number): LeaderboardEntry[] {
    return this.state.leaderboard(chatId, limit);
  }

  async addCup(chatId: number, cup: NewCup): Promise<CupRecord> {
    return this.mutate("addCup", (state) => {
      const record: CupRecord = {
        title: cup.title,
        description: cup.description,
        podium: [...cup.podium],
        created_at: this.now()
      };
      const cups = state.cups.get(chatId) ?? [];
      cups.push(record);
      state.cups.set(chatId, cups);
      return { result: { ...record, podium: [...record.podium] }, changed: true };
    });
  }

  cupHistory(chatId: number, limit: number): CupRecord[] {
    return this.state.cupHistory(chatId, limit);
  }
}

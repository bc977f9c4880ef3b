import {
  compareTimestampsDesc,
  type AdminProfile,
  type AdminRecord,
  type Application,
  type ApplicationHistoryEntry,
  type ApplicationStatistics,
  type ApplicationStatus,
  type CupRecord,
  type LeaderboardEntry
} from "@guildhall/shared";
import type { SnapshotDocument } from "./schema.js";

const RECENT_UPDATES_LIMIT = 5;

function copyApplication(app: Application): Application {
  return { ...app, responses: app.responses.map((r) => ({ ...r })) };
}

function copyCup(cup: CupRecord): CupRecord {
  return { ...cup, podium: [...cup.podium] };
}

function entriesByIntKey<T>(record: Record<string, T>): Array<[number, T]> {
  return Object.entries(record).map(([k, v]): [number, T] => [Number(k), v]);
}

function takeLimit<T>(items: T[], limit: number): T[] {
  if (!(limit > 0)) return [];
  return Number.isFinite(limit) ? items.slice(0, Math.floor(limit)) : items;
}

/**
 * In-memory state: plain maps plus derived views. Holds no lock and does no I/O;
 * `GuildStore` owns mutation ordering and persistence.
 */
export class StateModel {
  readonly admins: number[] = [];
  readonly adminProfiles = new Map<number, AdminProfile>();
  readonly applications = new Map<number, Application>();
  readonly history = new Map<number, ApplicationHistoryEntry>();
  readonly xp = new Map<number, Map<number, number>>();
  readonly cups = new Map<number, CupRecord[]>();

  static empty(): StateModel {
    return new StateModel();
  }

  static fromDocument(doc: SnapshotDocument): StateModel {
    const state = new StateModel();
    for (const id of doc.admins) {
      if (!state.admins.includes(id)) state.admins.push(id);
    }
    for (const [id, profile] of entriesByIntKey(doc.admin_profiles)) {
      state.adminProfiles.set(id, { ...profile });
    }
    for (const [id, app] of entriesByIntKey(doc.applications)) {
      state.applications.set(id, copyApplication({ ...app, user_id: id }));
    }
    for (const [id, entry] of entriesByIntKey(doc.application_history)) {
      state.history.set(id, { ...entry });
    }
    for (const [chatId, scores] of entriesByIntKey(doc.xp)) {
      state.xp.set(chatId, new Map(entriesByIntKey(scores)));
    }
    for (const [chatId, cups] of entriesByIntKey(doc.cups)) {
      state.cups.set(chatId, cups.map(copyCup));
    }
    // Files written before history tracking existed have pending applications without an entry.
    for (const [id, app] of state.applications) {
      if (!state.history.has(id)) {
        state.history.set(id, {
          status: "pending",
          updated_at: app.created_at,
          note: null,
          language_code: app.language_code
        });
      }
    }
    return state;
  }

  toDocument(): SnapshotDocument {
    const doc: SnapshotDocument = {
      admins: [...this.admins],
      admin_profiles: {},
      applications: {},
      application_history: {},
      xp: {},
      cups: {}
    };
    for (const [id, profile] of this.adminProfiles) doc.admin_profiles[String(id)] = { ...profile };
    for (const [id, app] of this.applications) doc.applications[String(id)] = copyApplication(app);
    for (const [id, entry] of this.history) doc.application_history[String(id)] = { ...entry };
    for (const [chatId, scores] of this.xp) {
      const table: Record<string, number> = {};
      for (const [userId, score] of scores) table[String(userId)] = score;
      doc.xp[String(chatId)] = table;
    }
    for (const [chatId, cups] of this.cups) doc.cups[String(chatId)] = cups.map(copyCup);
    return doc;
  }

  clone(): StateModel {
    return StateModel.fromDocument(this.toDocument());
  }

  adminDetails(): AdminRecord[] {
    return this.admins.map((user_id) => {
      const profile = this.adminProfiles.get(user_id);
      return { user_id, username: profile?.username ?? null, full_name: profile?.full_name ?? null };
    });
  }

  pendingApplications(): Application[] {
    return [...this.applications.values()]
      .sort((a, b) => -compareTimestampsDesc(a.created_at, b.created_at))
      .map(copyApplication);
  }

  leaderboard(chatId: number, limit: number): LeaderboardEntry[] {
    const scores = this.xp.get(chatId);
    if (!scores) return [];
    const sorted = [...scores.entries()]
      .map(([user_id, score]) => ({ user_id, score }))
      .sort((a, b) => b.score - a.score || a.user_id - b.user_id);
    return takeLimit(sorted, limit);
  }

  cupHistory(chatId: number, limit: number): CupRecord[] {
    const cups = this.cups.get(chatId) ?? [];
    const sorted = cups
      .map((cup, index) => ({ cup, index }))
      .sort((a, b) => compareTimestampsDesc(a.cup.created_at, b.cup.created_at) || b.index - a.index)
      .map(({ cup }) => copyCup(cup));
    return takeLimit(sorted, limit);
  }

  statistics(): ApplicationStatistics {
    const status_counts: Record<ApplicationStatus, number> = { pending: 0, approved: 0, denied: 0, withdrawn: 0 };
    const language_counts: Record<string, number> = {};
    for (const entry of this.history.values()) {
      status_counts[entry.status] += 1;
      const lang = entry.language_code || "unknown";
      language_counts[lang] = (language_counts[lang] ?? 0) + 1;
    }

    const answers = [...this.applications.values()].map((app) => app.answer.length);
    const average = answers.length ? answers.reduce((sum, n) => sum + n, 0) / answers.length : 0;

    const most_recent_updates = [...this.history.entries()]
      .sort(([, a], [, b]) => compareTimestampsDesc(a.updated_at, b.updated_at))
      .slice(0, RECENT_UPDATES_LIMIT)
      .map(([user_id, entry]) => ({ user_id, ...entry }));

    return {
      total: this.history.size,
      pending_count: this.applications.size,
      status_counts,
      language_counts,
      average_answer_length: Math.round(average * 100) / 100,
      most_recent_updates
    };
  }
}

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Cipher } from "../cipher.js";
import { PersistenceError } from "../errors.js";
import type { SnapshotFs } from "../persistence.js";
import { GuildStore, type GuildStoreOptions } from "../store.js";

const key = Cipher.generateKey();

// Each call advances one second from 2024-05-01T00:00:00Z.
function tickingClock(): () => Date {
  let t = Date.parse("2024-05-01T00:00:00.000Z");
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

describe("GuildStore", () => {
  let dir: string;
  let filePath: string;

  function openStore(overrides: Partial<GuildStoreOptions> = {}): GuildStore {
    return new GuildStore({ path: filePath, cipher: new Cipher(key), clock: tickingClock(), ...overrides });
  }

  async function freshStore(overrides: Partial<GuildStoreOptions> = {}): Promise<GuildStore> {
    const store = openStore(overrides);
    await store.load();
    return store;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "guildhall-store-"));
    filePath = path.join(dir, "store.enc");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("admins", () => {
    it("adds and removes idempotently", async () => {
      const store = await freshStore();
      expect(store.listAdmins()).toEqual([]);
      expect(await store.addAdmin(1)).toBe(true);
      expect(await store.addAdmin(1)).toBe(false);
      expect(store.isAdmin(1)).toBe(true);
      expect(await store.removeAdmin(1)).toBe(true);
      expect(await store.removeAdmin(1)).toBe(false);
      expect(store.isAdmin(1)).toBe(false);
    });

    it("merges profile details without overwriting them with empty values", async () => {
      const store = await freshStore();
      await store.addAdmin(7, { username: "@keeper", full_name: "Gate Keeper" });
      expect(await store.addAdmin(7, { username: "", full_name: null })).toBe(false);
      expect(await store.addAdmin(7, { username: "@" })).toBe(false);
      expect(await store.addAdmin(7, { full_name: "Head Keeper" })).toBe(true);
      expect(store.adminDetails()).toEqual([{ user_id: 7, username: "keeper", full_name: "Head Keeper" }]);
    });

    it("drops the profile on demotion", async () => {
      const store = await freshStore();
      await store.addAdmin(7, { username: "keeper" });
      await store.removeAdmin(7);
      await store.addAdmin(7);
      expect(store.adminDetails()).toEqual([{ user_id: 7, username: null, full_name: null }]);
    });
  });

  describe("application lifecycle", () => {
    it("submits, withdraws and accepts a re-application", async () => {
      const store = await freshStore();
      const first = await store.submitApplication({ user_id: 10, full_name: "User", answers: { kind: "text", answer: "Answer" } });
      expect(first.ok).toBe(true);
      expect(store.applicationStatus(10)?.status).toBe("pending");

      expect(await store.withdrawApplication(10)).toEqual({
        ok: true,
        entry: { status: "withdrawn", updated_at: "2024-05-01T00:00:01.000Z", note: null, language_code: null }
      });
      expect(store.applicationStatus(10)?.status).toBe("withdrawn");
      expect(store.hasApplication(10)).toBe(false);

      const again = await store.submitApplication({ user_id: 10, full_name: "User", answers: { kind: "text", answer: "Answer" } });
      expect(again.ok).toBe(true);
    });

    it("stamps the application and its history entry identically", async () => {
      const store = await freshStore();
      const outcome = await store.submitApplication({
        user_id: 10,
        full_name: "User",
        username: "user10",
        language_code: "fa",
        answers: { kind: "text", answer: "Answer" }
      });
      expect(outcome).toEqual({
        ok: true,
        application: {
          user_id: 10,
          full_name: "User",
          username: "user10",
          answer: "Answer",
          responses: [],
          created_at: "2024-05-01T00:00:00.000Z",
          language_code: "fa"
        },
        entry: { status: "pending", updated_at: "2024-05-01T00:00:00.000Z", note: null, language_code: "fa" }
      });
    });

    it("reports a second pending submission as duplicate", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "User", answers: { kind: "text", answer: "one" } });
      expect(
        await store.submitApplication({ user_id: 10, full_name: "User", answers: { kind: "text", answer: "two" } })
      ).toEqual({ ok: false, reason: "duplicate" });
      expect(store.getApplication(10)?.answer).toBe("one");
    });

    it("refuses re-application once approved but allows it after a denial", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "A", answers: { kind: "text", answer: "x" } });
      await store.decideApplication(10, "approved");
      expect(await store.submitApplication({ user_id: 10, full_name: "A", answers: { kind: "text", answer: "x" } })).toEqual({
        ok: false,
        reason: "already_approved"
      });

      await store.submitApplication({ user_id: 11, full_name: "B", answers: { kind: "text", answer: "y" } });
      await store.decideApplication(11, "denied", { note: "too vague" });
      const retry = await store.submitApplication({ user_id: 11, full_name: "B", answers: { kind: "text", answer: "y2" } });
      expect(retry.ok).toBe(true);
      expect(store.applicationStatus(11)).toEqual({
        status: "pending",
        updated_at: "2024-05-01T00:00:04.000Z",
        note: null,
        language_code: null
      });
    });

    it("flattens structured responses into the answer summary", async () => {
      const store = await freshStore();
      const outcome = await store.submitApplication({
        user_id: 12,
        full_name: "Structured",
        answers: {
          kind: "structured",
          responses: [
            { question_id: "about", question: "About you", answer: "Builder" },
            { question_id: "why", question: "Why join", answer: "Raids" }
          ]
        }
      });
      expect(outcome.ok && outcome.application.answer).toBe("About you: Builder\nWhy join: Raids");
      expect(store.getApplication(12)?.responses).toHaveLength(2);
    });

    it("keeps the language code when withdrawing", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", language_code: "de", answers: { kind: "text", answer: "a" } });
      const outcome = await store.withdrawApplication(10);
      expect(outcome.ok && outcome.entry.language_code).toBe("de");
    });

    it("reports not_found for withdrawals and decisions without a pending application", async () => {
      const store = await freshStore();
      expect(await store.withdrawApplication(99)).toEqual({ ok: false, reason: "not_found" });
      expect(await store.decideApplication(99, "approved")).toEqual({ ok: false, reason: "not_found" });
      expect(store.applicationStatus(99)).toBeNull();
    });

    it("supports the two-phase pop then record review", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", language_code: "en", answers: { kind: "text", answer: "a" } });

      const popped = await store.popApplication(10);
      expect(popped?.user_id).toBe(10);
      expect(await store.popApplication(10)).toBeNull();
      expect(store.applicationStatus(10)?.status).toBe("pending");

      const entry = await store.recordDecision(10, "denied", { note: "  come back later  ", language_code: "fa" });
      expect(entry).toEqual({
        status: "denied",
        updated_at: "2024-05-01T00:00:01.000Z",
        note: "come back later",
        language_code: "fa"
      });
    });

    it("refuses a new submission while a popped application awaits its decision", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "first" } });
      await store.popApplication(10);
      expect(store.isUnderReview(10)).toBe(true);
      expect(
        await store.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "second" } })
      ).toEqual({ ok: false, reason: "in_review" });

      await store.recordDecision(10, "denied");
      expect(store.isUnderReview(10)).toBe(false);
      const again = await store.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "second" } });
      expect(again.ok).toBe(true);
      expect(store.getApplication(10)?.answer).toBe("second");
    });

    it("lets the user apply again after a restart abandons an unfinished review", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "first" } });
      await store.popApplication(10);

      const reopened = await freshStore();
      expect(reopened.applicationStatus(10)?.status).toBe("pending");
      expect(reopened.isUnderReview(10)).toBe(false);
      const outcome = await reopened.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "again" } });
      expect(outcome.ok).toBe(true);
    });

    it("does not mark a review open when the pop cannot be saved", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "first" } });
      const failing = await freshStore({
        fs: {
          ...fs,
          rename: async () => {
            throw new Error("EIO: i/o error");
          }
        }
      });
      await expect(failing.popApplication(10)).rejects.toBeInstanceOf(PersistenceError);
      expect(failing.isUnderReview(10)).toBe(false);
      expect(failing.hasApplication(10)).toBe(true);
    });

    it("keeps the previous language code when a decision gives none", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 10, full_name: "U", language_code: "en", answers: { kind: "text", answer: "a" } });
      await store.popApplication(10);
      expect((await store.recordDecision(10, "approved")).language_code).toBe("en");
    });

    it("lists pending applications oldest first", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 30, full_name: "C", answers: { kind: "text", answer: "c" } });
      await store.submitApplication({ user_id: 20, full_name: "B", answers: { kind: "text", answer: "b" } });
      expect(store.pendingApplications().map((a) => a.user_id)).toEqual([30, 20]);
    });
  });

  describe("engagement ledger", () => {
    it("accumulates XP and ranks it", async () => {
      const store = await freshStore();
      expect(await store.addXp(100, 1, 5)).toBe(5);
      expect(await store.addXp(100, 1, 5)).toBe(10);
      expect(store.xpLeaderboard(100, 5)).toEqual([{ user_id: 1, score: 10 }]);
    });

    it("keeps per-user sums equal to everything added", async () => {
      const store = await freshStore();
      const grants: Array<[number, number]> = [
        [1, 5],
        [2, 3],
        [1, 7],
        [3, 0],
        [2, 11],
        [1, 1]
      ];
      for (const [user, amount] of grants) await store.addXp(100, user, amount);
      const board = store.xpLeaderboard(100, Number.POSITIVE_INFINITY);
      expect(board.reduce((sum, e) => sum + e.score, 0)).toBe(27);
      expect(board).toEqual([
        { user_id: 2, score: 14 },
        { user_id: 1, score: 13 },
        { user_id: 3, score: 0 }
      ]);
    });

    it("breaks score ties by ascending user id and honours the limit", async () => {
      const store = await freshStore();
      await store.addXp(100, 9, 5);
      await store.addXp(100, 4, 5);
      await store.addXp(100, 6, 8);
      expect(store.xpLeaderboard(100, 2)).toEqual([
        { user_id: 6, score: 8 },
        { user_id: 4, score: 5 }
      ]);
      expect(store.xpLeaderboard(100, 0)).toEqual([]);
      expect(store.xpLeaderboard(200, 5)).toEqual([]);
    });

    it("rejects negative or fractional XP without touching state", async () => {
      const store = await freshStore();
      await expect(store.addXp(100, 1, -1)).rejects.toBeInstanceOf(RangeError);
      await expect(store.addXp(100, 1, 1.5)).rejects.toBeInstanceOf(RangeError);
      expect(store.xpLeaderboard(100, 5)).toEqual([]);
    });

    it("appends cups and lists them newest first", async () => {
      const store = await freshStore();
      await store.addCup(100, { title: "Cup", description: "Desc", podium: ["A", "B", "C"] });
      const cups = store.cupHistory(100, 5);
      expect(cups).toHaveLength(1);
      expect(cups[0]?.title).toBe("Cup");
      expect(cups[0]?.podium).toEqual(["A", "B", "C"]);

      await store.addCup(100, { title: "Second", description: "", podium: [] });
      await store.addCup(100, { title: "Third", description: "", podium: [] });
      expect(store.cupHistory(100, 2).map((c) => c.title)).toEqual(["Third", "Second"]);
    });

    it("orders cups added within the same instant by insertion, newest first", async () => {
      const store = await freshStore({ clock: () => new Date("2024-05-01T00:00:00.000Z") });
      await store.addCup(100, { title: "First", description: "", podium: [] });
      await store.addCup(100, { title: "Second", description: "", podium: [] });
      expect(store.cupHistory(100, 5).map((c) => c.title)).toEqual(["Second", "First"]);
    });
  });

  describe("persistence", () => {
    it("reproduces the snapshot in a fresh instance", async () => {
      const store = await freshStore();
      await store.addAdmin(1, { username: "owner" });
      await store.submitApplication({ user_id: 10, full_name: "User", answers: { kind: "text", answer: "Answer" } });
      await store.submitApplication({ user_id: 11, full_name: "Other", answers: { kind: "text", answer: "Other" } });
      await store.decideApplication(11, "denied", { note: "no" });
      await store.addXp(100, 1, 5);
      await store.addXp(-1001, 2, 3);
      await store.addCup(100, { title: "Cup", description: "Desc", podium: ["A", "B", "C"] });

      const reopened = await freshStore();
      expect(reopened.snapshot()).toEqual(store.snapshot());
      expect(reopened.xpLeaderboard(-1001, 5)).toEqual([{ user_id: 2, score: 3 }]);
      expect(reopened.applicationStatus(11)?.note).toBe("no");
    });

    it("rolls memory back and surfaces the error when a save fails", async () => {
      const store = await freshStore();
      await store.addXp(100, 1, 5);
      const onDisk = await fs.readFile(filePath);

      let failRename = true;
      const flakyFs: SnapshotFs = {
        ...fs,
        rename: async (from, to) => {
          if (failRename) throw new Error("EIO: i/o error");
          await fs.rename(from, to);
        }
      };
      const flaky = await freshStore({ fs: flakyFs });
      await expect(flaky.addXp(100, 1, 5)).rejects.toBeInstanceOf(PersistenceError);
      expect(flaky.xpLeaderboard(100, 5)).toEqual([{ user_id: 1, score: 5 }]);
      await expect(
        flaky.submitApplication({ user_id: 10, full_name: "U", answers: { kind: "text", answer: "a" } })
      ).rejects.toBeInstanceOf(PersistenceError);
      expect(flaky.hasApplication(10)).toBe(false);
      expect((await fs.readFile(filePath)).equals(onDisk)).toBe(true);

      failRename = false;
      expect(await flaky.addXp(100, 1, 5)).toBe(10);
      expect((await freshStore()).xpLeaderboard(100, 5)).toEqual([{ user_id: 1, score: 10 }]);
    });

    it("serializes concurrent mutations", async () => {
      const store = await freshStore();
      await Promise.all(Array.from({ length: 25 }, (_, i) => store.addXp(100, (i % 3) + 1, 2)));
      expect(store.xpLeaderboard(100, 10)).toEqual([
        { user_id: 1, score: 18 },
        { user_id: 2, score: 16 },
        { user_id: 3, score: 16 }
      ]);
      expect((await freshStore()).snapshot()).toEqual(store.snapshot());
    });

    it("does not write when nothing changed", async () => {
      const store = await freshStore();
      await store.addAdmin(1);
      const stat = await fs.stat(filePath);
      const before = await fs.readFile(filePath);
      expect(await store.addAdmin(1)).toBe(false);
      expect(await store.withdrawApplication(5)).toEqual({ ok: false, reason: "not_found" });
      expect((await fs.readFile(filePath)).equals(before)).toBe(true);
      expect((await fs.stat(filePath)).mtimeMs).toBe(stat.mtimeMs);
    });
  });

  describe("statistics", () => {
    it("aggregates history and pending answers", async () => {
      const store = await freshStore();
      await store.submitApplication({ user_id: 1, full_name: "A", language_code: "en", answers: { kind: "text", answer: "abcd" } });
      await store.submitApplication({ user_id: 2, full_name: "B", language_code: "fa", answers: { kind: "text", answer: "ab" } });
      await store.submitApplication({ user_id: 3, full_name: "C", answers: { kind: "text", answer: "abc" } });
      await store.decideApplication(3, "approved");

      const stats = store.applicationStatistics();
      expect(stats.total).toBe(3);
      expect(stats.pending_count).toBe(2);
      expect(stats.status_counts).toEqual({ pending: 2, approved: 1, denied: 0, withdrawn: 0 });
      expect(stats.language_counts).toEqual({ en: 1, fa: 1, unknown: 1 });
      expect(stats.average_answer_length).toBe(3);
      expect(stats.most_recent_updates.map((u) => [u.user_id, u.status])).toEqual([
        [3, "approved"],
        [2, "pending"],
        [1, "pending"]
      ]);
    });
  });
});

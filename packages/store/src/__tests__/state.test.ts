import { describe, expect, it } from "vitest";
import { SnapshotDocumentSchema } from "../schema.js";
import { StateModel } from "../state.js";

function stateFrom(raw: unknown): StateModel {
  return StateModel.fromDocument(SnapshotDocumentSchema.parse(raw));
}

describe("StateModel", () => {
  it("gives pending applications from older files a history entry", () => {
    const state = stateFrom({
      applications: {
        "10": { user_id: 10, full_name: "User", answer: "hi", created_at: "2024-05-01T09:30:00", language_code: "en" }
      }
    });
    expect(state.history.get(10)).toEqual({
      status: "pending",
      updated_at: "2024-05-01T09:30:00.000Z",
      note: null,
      language_code: "en"
    });
  });

  it("drops duplicate admin ids", () => {
    expect(stateFrom({ admins: [3, 1, 3] }).admins).toEqual([3, 1]);
  });

  it("clones deeply", () => {
    const state = stateFrom({ xp: { "100": { "1": 4 } }, cups: { "100": [{ title: "T", description: "", podium: ["A"], created_at: "2024-01-01" }] } });
    const copy = state.clone();
    copy.xp.get(100)?.set(1, 99);
    copy.cups.get(100)?.[0]?.podium.push("B");
    expect(state.leaderboard(100, 5)).toEqual([{ user_id: 1, score: 4 }]);
    expect(state.cupHistory(100, 5)[0]?.podium).toEqual(["A"]);
  });

  it("counts every status and rounds the average answer length", () => {
    const state = stateFrom({
      applications: {
        "1": { user_id: 1, full_name: "A", answer: "ab", created_at: "2024-05-01T00:00:00Z" },
        "2": { user_id: 2, full_name: "B", answer: "a", created_at: "2024-05-01T00:00:01Z" },
        "3": { user_id: 3, full_name: "C", answer: "a", created_at: "2024-05-01T00:00:02Z" }
      },
      application_history: {
        "4": { status: "withdrawn", updated_at: "2024-04-01T00:00:00Z", language_code: "en" },
        "5": { status: "denied", updated_at: "2024-04-02T00:00:00Z", note: "no", language_code: "en" }
      }
    });
    const stats = state.statistics();
    expect(stats.total).toBe(5);
    expect(stats.pending_count).toBe(3);
    expect(stats.status_counts).toEqual({ pending: 3, approved: 0, denied: 1, withdrawn: 1 });
    expect(stats.language_counts).toEqual({ en: 2, unknown: 3 });
    expect(stats.average_answer_length).toBe(1.33);
    expect(stats.most_recent_updates.map((u) => u.user_id)).toEqual([3, 2, 1, 5, 4]);
  });

  it("returns nothing for a non-positive limit", () => {
    const state = stateFrom({ xp: { "100": { "1": 4 } } });
    expect(state.leaderboard(100, 0)).toEqual([]);
    expect(state.leaderboard(100, -3)).toEqual([]);
    expect(state.leaderboard(100, Number.NaN)).toEqual([]);
  });
});

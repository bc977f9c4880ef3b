import type { NewCup } from "@guildhall/store";

export function parseUserIdArg(raw: string): number | null {
  const token = raw.trim().split(/\s+/)[0] ?? "";
  if (!/^-?\d+$/.test(token)) return null;
  const id = Number(token);
  return Number.isSafeInteger(id) ? id : null;
}

/** `/add_cup title | description | first, second, third` */
export function parseCupArgs(raw: string): NewCup | null {
  const parts = raw.split("|").map((part) => part.trim());
  if (parts.length !== 3) return null;
  const [title = "", description = "", podiumRaw = ""] = parts;
  if (!title) return null;
  const podium = podiumRaw
    .split(/[,،]/)
    .map((slot) => slot.trim())
    .filter(Boolean);
  return { title, description, podium };
}

/** A milestone every five message rewards. */
export function isXpMilestone(score: number, reward: number): boolean {
  return reward > 0 && score > 0 && score % (reward * 5) === 0;
}

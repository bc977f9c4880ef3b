// Canonical timestamps: UTC ISO-8601 with milliseconds, e.g. "2024-05-01T09:30:00.000Z".
// Older snapshots carry naive "2024-05-01T09:30:00.123456" strings (no zone, microseconds) which are read as UTC.

const ISO_LIKE = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2}))?(?:[.,](\d+))?)?\s*(Z|UTC|GMT|[+-]\d{2}(?::?\d{2})?)?$/i;

function cleanRaw(raw: string): string {
  return raw.replace(/[\r\n]+/g, " ").trim();
}

function parseCandidate(candidate: string): Date | null {
  const m = ISO_LIKE.exec(candidate);
  if (!m) return null;
  const date = m[1];
  const hhmm = m[2] ?? "00:00";
  const ss = m[3] ?? "00";
  const ms = (m[4] ?? "").slice(0, 3).padEnd(3, "0");
  let zone = m[5] ?? "Z";
  if (["Z", "UTC", "GMT"].includes(zone.toUpperCase())) {
    zone = "Z";
  } else if (zone.length === 3) {
    zone = `${zone}:00`;
  } else if (!zone.includes(":")) {
    zone = `${zone.slice(0, 3)}:${zone.slice(3)}`;
  }
  const d = new Date(`${date}T${hhmm}:${ss}.${ms}${zone}`);
  return Number.isNaN(d.getTime()) ? null : d;
}

export function parseTimestamp(raw: string): Date | null {
  const s = cleanRaw(raw);
  if (!s) return null;
  const candidates = [s];
  const first = s.split(/\s+/)[0];
  if (first && first !== s) candidates.push(first);
  for (const candidate of candidates) {
    const parsed = parseCandidate(candidate);
    if (parsed) return parsed;
  }
  return null;
}

export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

/** Parse-or-pass-through: recognised formats become canonical, anything else is kept (trimmed) as written. */
export function normalizeTimestamp(raw: string): string {
  const parsed = parseTimestamp(raw);
  return parsed ? formatTimestamp(parsed) : cleanRaw(raw);
}

/** Newest first. Unparseable values sort after parseable ones. */
export function compareTimestampsDesc(a: string, b: string): number {
  const ta = parseTimestamp(a)?.getTime() ?? Number.NEGATIVE_INFINITY;
  const tb = parseTimestamp(b)?.getTime() ?? Number.NEGATIVE_INFINITY;
  if (ta === tb) return 0;
  return ta > tb ? -1 : 1;
}

export function displayTimestamp(raw: string | null | undefined): string {
  if (!raw) return "Unknown";
  const parsed = parseTimestamp(raw);
  if (!parsed) return cleanRaw(raw) || "Unknown";
  const iso = parsed.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} UTC`;
}

import { z } from "zod";
import { APPLICATION_STATUSES, normalizeTimestamp } from "@guildhall/shared";

// On-disk state document. Integer keys (user and chat IDs) are strings; older files lack
// `admin_profiles` and `application_history` and carry naive timestamps.

const Timestamp = z.string().transform(normalizeTimestamp);
const OptionalText = z
  .string()
  .nullish()
  .transform((v) => (v ? v : null));
const IntegerKey = z.string().regex(/^-?\d+$/);
const Integer = z.coerce.number().int();

export const AdminProfileSchema = z.object({
  username: OptionalText,
  full_name: OptionalText
});

export const ApplicationResponseSchema = z.object({
  question_id: z.string(),
  question: z.string(),
  answer: z.string()
});

export const ApplicationSchema = z.object({
  user_id: Integer,
  full_name: z.string(),
  username: OptionalText,
  answer: z.string().default(""),
  responses: z.array(ApplicationResponseSchema).default([]),
  created_at: Timestamp,
  language_code: OptionalText
});

export const HistoryEntrySchema = z.object({
  status: z.enum(APPLICATION_STATUSES),
  updated_at: Timestamp,
  note: OptionalText,
  language_code: OptionalText
});

export const CupSchema = z.object({
  title: z.string(),
  description: z.string().default(""),
  podium: z.array(z.string()).default([]),
  created_at: Timestamp
});

export const SnapshotDocumentSchema = z.object({
  admins: z.array(Integer).default([]),
  admin_profiles: z.record(IntegerKey, AdminProfileSchema).default({}),
  applications: z.record(IntegerKey, ApplicationSchema).default({}),
  application_history: z.record(IntegerKey, HistoryEntrySchema).default({}),
  xp: z.record(IntegerKey, z.record(IntegerKey, Integer)).default({}),
  cups: z.record(IntegerKey, z.array(CupSchema)).default({})
});

export type SnapshotDocument = z.output<typeof SnapshotDocumentSchema>;

// Shared domain types. Field names follow the on-disk snapshot document.

export const APPLICATION_STATUSES = ["pending", "approved", "denied", "withdrawn"] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];
export type DecisionStatus = Extract<ApplicationStatus, "approved" | "denied">;

export interface AdminProfile {
  username: string | null;
  full_name: string | null;
}

export interface AdminRecord extends AdminProfile {
  user_id: number;
}

export interface ApplicationResponse {
  question_id: string;
  question: string;
  answer: string;
}

export interface Application {
  user_id: number;
  full_name: string;
  username: string | null;
  /** Free-text answer; for structured submissions a flattened summary of `responses`. */
  answer: string;
  responses: ApplicationResponse[];
  created_at: string;
  language_code: string | null;
}

export interface ApplicationHistoryEntry {
  status: ApplicationStatus;
  updated_at: string;
  note: string | null;
  language_code: string | null;
}

export interface CupRecord {
  title: string;
  description: string;
  podium: string[];
  created_at: string;
}

export interface LeaderboardEntry {
  user_id: number;
  score: number;
}

export interface RecentUpdate extends ApplicationHistoryEntry {
  user_id: number;
}

export interface ApplicationStatistics {
  total: number;
  pending_count: number;
  status_counts: Record<ApplicationStatus, number>;
  language_counts: Record<string, number>;
  average_answer_length: number;
  most_recent_updates: RecentUpdate[];
}

export function isApplicationStatus(value: unknown): value is ApplicationStatus {
  return APPLICATION_STATUSES.some((status) => status === value);
}

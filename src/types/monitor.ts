import type { RecordedError } from "../domain/errors.js";

export type RunStatus = "success" | "failure";

export interface AnnouncementCandidate {
  text: string;
  pdf_url: string | null;
}

export interface MatchResult {
  candidate: AnnouncementCandidate | null;
  score: number;
}

export interface StoredAnnouncement {
  text: string;
  pdf_url: string | null;
  first_detected: string;
}

/**
 * The persisted state document. Field names are snake_case because the file is
 * read as-is by the status page.
 */
export interface MonitorState {
  monitoring_enabled: boolean;
  last_run_time: string | null;
  last_run_status: RunStatus | null;
  last_error_message: string | null;
  last_error_signature: string | null;
  last_error_time: string | null;
  last_announcement: StoredAnnouncement | null;
}

export interface CycleReport {
  status: RunStatus | "disabled";
  candidateCount: number;
  match: MatchResult;
  isNewAnnouncement: boolean;
  announcementNotified: boolean;
  alertSent: boolean;
  errors: RecordedError[];
  persisted: boolean;
  state: MonitorState;
}

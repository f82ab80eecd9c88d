/**
 * Core domain types for the standup bot
 */

export interface UpdateFields {
  progress: string;
  blockers: string;
  goals: string;
}

/**
 * One participant's status contribution. `author` is the Slack user ID and
 * keys the update; `authorName` is the handle at submission time.
 */
export interface Update extends UpdateFields {
  author: string;
  authorName: string | null;
  submittedAt: Date;
}

export interface MeetingDetails {
  title?: string | null;
  link?: string | null;
}

/**
 * Aggregate root. `updates` is keyed by author ID; Map iteration order is
 * first-insertion order and `set` on an existing key keeps its position.
 */
export interface Meeting {
  id: string;
  createdBy: string;
  createdAt: Date;
  title: string | null;
  link: string | null;
  updates: ReadonlyMap<string, Update>;
  closed: boolean;
  closedAt: Date | null;
  closedBy: string | null;
}

export type MeetingState = 'open' | 'closed';

export interface MeetingSummary {
  id: string;
  title: string | null;
  createdBy: string;
  createdAt: Date;
  updateCount: number;
}

// JSON projection (what is written to disk, the database and the archive)

export interface UpdateRecord {
  author: string;
  author_name: string | null;
  progress: string;
  blockers: string;
  goals: string;
  submitted_at: string;
}

export interface MeetingRecord {
  id: string;
  created_by: string;
  created_at: string;
  title: string | null;
  link: string | null;
  updates: UpdateRecord[];
  is_closed: boolean;
  closed_at: string | null;
  closed_by: string | null;
}

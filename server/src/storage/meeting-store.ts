import type { Meeting } from '../types.js';

export type MeetingStoreKind = 'file' | 'postgres';

/**
 * Durable, key-addressed persistence for meetings.
 *
 * `put` is a full overwrite and must be atomic: a concurrent `get` sees
 * either the previous record or the new one, never a partial write.
 * Mutual exclusion between writers is the lifecycle engine's job.
 */
export interface MeetingStore {
  readonly kind: MeetingStoreKind;
  get(meetingId: string): Promise<Meeting | null>;
  put(meeting: Meeting): Promise<void>;
  exists(meetingId: string): Promise<boolean>;
  /** All stored meeting IDs, sorted ascending (chronological) */
  list(): Promise<string[]>;
}

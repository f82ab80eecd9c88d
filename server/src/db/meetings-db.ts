import { query } from './client.js';
import { fromRecord, toRecord } from '../meetings/meeting.js';
import { isValidMeetingId } from '../meetings/meeting-id.js';
import type { Meeting } from '../types.js';
import type { MeetingStore } from '../storage/meeting-store.js';

/**
 * Meeting store backed by the standup_meetings table.
 * `put` is a single-statement upsert, so readers see the old or new row.
 */
export class PostgresMeetingStore implements MeetingStore {
  readonly kind = 'postgres';

  async get(meetingId: string): Promise<Meeting | null> {
    if (!isValidMeetingId(meetingId)) {
      return null;
    }

    const result = await query<{ record: unknown }>(
      'SELECT record FROM standup_meetings WHERE id = $1',
      [meetingId]
    );

    const row = result.rows[0];
    return row ? fromRecord(row.record) : null;
  }

  async put(meeting: Meeting): Promise<void> {
    const record = toRecord(meeting);

    await query(
      `INSERT INTO standup_meetings (id, record, is_closed, created_at, updated_at)
       VALUES ($1, $2, $3, $4, NOW())
       ON CONFLICT (id) DO UPDATE SET
         record = EXCLUDED.record,
         is_closed = EXCLUDED.is_closed,
         updated_at = NOW()`,
      [meeting.id, JSON.stringify(record), meeting.closed, meeting.createdAt]
    );
  }

  async exists(meetingId: string): Promise<boolean> {
    if (!isValidMeetingId(meetingId)) {
      return false;
    }

    const result = await query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM standup_meetings WHERE id = $1) AS exists',
      [meetingId]
    );
    return result.rows[0]?.exists === true;
  }

  async list(): Promise<string[]> {
    const result = await query<{ id: string }>(
      'SELECT id FROM standup_meetings ORDER BY id'
    );
    return result.rows.map((row) => row.id);
  }
}

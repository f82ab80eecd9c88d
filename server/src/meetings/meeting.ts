/**
 * Meeting aggregate operations and the JSON projection.
 *
 * Every operation returns a new Meeting; inputs are never mutated, so a
 * reader holding a previous snapshot never observes a partial change.
 */

import { z } from 'zod';
import type {
  Meeting,
  MeetingDetails,
  MeetingRecord,
  MeetingState,
  MeetingSummary,
  Update,
  UpdateFields,
  UpdateRecord,
} from '../types.js';
import { normalizeIdentity, normalizeMeetingDetails, normalizeUpdateFields } from './validation.js';
import { MEETING_ID_PATTERN } from './meeting-id.js';

export function createMeeting(id: string, createdBy: string, now: Date, details?: MeetingDetails): Meeting {
  const creator = normalizeIdentity(createdBy, 'creator');
  const { title, link } = normalizeMeetingDetails(details);
  return {
    id,
    createdBy: creator,
    createdAt: now,
    title,
    link,
    updates: new Map(),
    closed: false,
    closedAt: null,
    closedBy: null,
  };
}

/**
 * Build a validated Update. Throws ValidationError; never clamps or truncates.
 * `author` is the stable key (the Slack user ID); `authorName` is only shown.
 */
export function createUpdate(
  author: string,
  fields: UpdateFields,
  submittedAt: Date,
  authorName: string | null = null
): Update {
  const key = normalizeIdentity(author, 'author');
  const normalized = normalizeUpdateFields(fields);
  return { author: key, authorName: authorName?.trim() || null, ...normalized, submittedAt };
}

/**
 * Name to show for an update's author
 */
export function displayAuthor(update: Update): string {
  return update.authorName ?? update.author;
}

/**
 * Put an author's update into the meeting. An existing update for the same
 * author is replaced in place; otherwise the update is appended.
 * Callers are responsible for checking the meeting is open.
 */
export function withUpdate(meeting: Meeting, update: Update): Meeting {
  const updates = new Map(meeting.updates);
  updates.set(update.author, update);
  return { ...meeting, updates };
}

export function withClosed(meeting: Meeting, closedBy: string, now: Date): Meeting {
  const closer = normalizeIdentity(closedBy, 'closer');
  return {
    ...meeting,
    updates: new Map(meeting.updates),
    closed: true,
    closedAt: now,
    closedBy: closer,
  };
}

export function getMeetingState(meeting: Meeting): MeetingState {
  return meeting.closed ? 'closed' : 'open';
}

export function listUpdates(meeting: Meeting): Update[] {
  return [...meeting.updates.values()];
}

export function summarizeMeeting(meeting: Meeting): MeetingSummary {
  return {
    id: meeting.id,
    title: meeting.title,
    createdBy: meeting.createdBy,
    createdAt: meeting.createdAt,
    updateCount: meeting.updates.size,
  };
}

// ============== JSON projection ==============

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Invalid timestamp',
});

const UpdateRecordSchema = z.object({
  author: z.string().min(1),
  author_name: z.string().nullable().default(null),
  progress: z.string(),
  blockers: z.string(),
  goals: z.string(),
  submitted_at: isoTimestamp,
});

export const MeetingRecordSchema = z
  .object({
    id: z.string().regex(MEETING_ID_PATTERN),
    created_by: z.string().min(1),
    created_at: isoTimestamp,
    title: z.string().nullable().default(null),
    link: z.string().nullable().default(null),
    updates: z.array(UpdateRecordSchema).default([]),
    is_closed: z.boolean().default(false),
    closed_at: isoTimestamp.nullable().default(null),
    closed_by: z.string().nullable().default(null),
  })
  .superRefine((record, ctx) => {
    const seen = new Set<string>();
    record.updates.forEach((update, index) => {
      if (seen.has(update.author)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['updates', index, 'author'],
          message: `Duplicate update for author ${update.author}`,
        });
      }
      seen.add(update.author);
    });

    if (record.is_closed && record.closed_at === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['closed_at'],
        message: 'Closed meetings must have a closing timestamp',
      });
    }
    if (!record.is_closed && record.closed_at !== null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['closed_at'],
        message: 'Open meetings cannot have a closing timestamp',
      });
    }
  });

function updateToRecord(update: Update): UpdateRecord {
  return {
    author: update.author,
    author_name: update.authorName,
    progress: update.progress,
    blockers: update.blockers,
    goals: update.goals,
    submitted_at: update.submittedAt.toISOString(),
  };
}

export function toRecord(meeting: Meeting): MeetingRecord {
  return {
    id: meeting.id,
    created_by: meeting.createdBy,
    created_at: meeting.createdAt.toISOString(),
    title: meeting.title,
    link: meeting.link,
    updates: listUpdates(meeting).map(updateToRecord),
    is_closed: meeting.closed,
    closed_at: meeting.closedAt ? meeting.closedAt.toISOString() : null,
    closed_by: meeting.closedBy,
  };
}

/**
 * Rebuild a Meeting from its JSON projection. Update content is revalidated,
 * so a tampered record fails with ValidationError rather than loading.
 */
export function fromRecord(input: unknown): Meeting {
  const record = MeetingRecordSchema.parse(input);

  const updates = new Map<string, Update>();
  for (const entry of record.updates) {
    const update = createUpdate(
      entry.author,
      { progress: entry.progress, blockers: entry.blockers, goals: entry.goals },
      new Date(entry.submitted_at),
      entry.author_name
    );
    updates.set(update.author, update);
  }

  return {
    id: record.id,
    createdBy: record.created_by,
    createdAt: new Date(record.created_at),
    title: record.title,
    link: record.link,
    updates,
    closed: record.is_closed,
    closedAt: record.closed_at ? new Date(record.closed_at) : null,
    closedBy: record.closed_by,
  };
}

export function serializeMeeting(meeting: Meeting): string {
  return JSON.stringify(toRecord(meeting), null, 2);
}

export function parseMeeting(json: string): Meeting {
  return fromRecord(JSON.parse(json));
}

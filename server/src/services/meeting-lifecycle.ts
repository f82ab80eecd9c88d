/**
 * Meeting Lifecycle Engine
 *
 * Owns the Open -> Closed state machine and the one-update-per-author
 * policy. Mutations on a meeting run under that meeting's lock for the
 * whole load + validate + mutate + persist sequence; rendering and
 * archival run after the lock is released and cannot fail a close.
 */

import { createLogger } from '../logger.js';
import {
  AlreadyClosedError,
  MeetingClosedError,
  NotFoundError,
} from '../errors.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import {
  createMeeting,
  createUpdate,
  serializeMeeting,
  summarizeMeeting,
  withClosed,
  withUpdate,
} from '../meetings/meeting.js';
import { generateMeetingId } from '../meetings/meeting-id.js';
import type { MeetingStore } from '../storage/meeting-store.js';
import type { ArchivalOutcome } from './archival-publisher.js';
import type {
  Meeting,
  MeetingDetails,
  MeetingSummary,
  Update,
  UpdateFields,
} from '../types.js';

const logger = createLogger('meeting-lifecycle');

const MAX_ID_ATTEMPTS = 5;

export interface MeetingReportRenderer {
  render(meeting: Meeting): string;
}

export interface MeetingArchivePublisher {
  publish(meetingId: string, snapshotJson: string, document: string | null): Promise<ArchivalOutcome>;
}

export interface MeetingLifecycleDeps {
  store: MeetingStore;
  renderer: MeetingReportRenderer;
  publisher: MeetingArchivePublisher;
  clock?: () => Date;
  generateId?: (now: Date) => string;
}

export class MeetingLifecycle {
  private readonly store: MeetingStore;
  private readonly renderer: MeetingReportRenderer;
  private readonly publisher: MeetingArchivePublisher;
  private readonly clock: () => Date;
  private readonly generateId: (now: Date) => string;
  private readonly locks = new KeyedMutex();
  private readonly pendingArchives = new Set<Promise<void>>();

  constructor(deps: MeetingLifecycleDeps) {
    this.store = deps.store;
    this.renderer = deps.renderer;
    this.publisher = deps.publisher;
    this.clock = deps.clock ?? (() => new Date());
    this.generateId = deps.generateId ?? generateMeetingId;
  }

  /**
   * Open a new meeting owned by `creator`
   */
  async create(creator: string, details?: MeetingDetails): Promise<Meeting> {
    const now = this.clock();

    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId(now);
      const meeting = createMeeting(id, creator, now, details);

      const created = await this.locks.runExclusive(id, async () => {
        if (await this.store.exists(id)) {
          return false;
        }
        await this.store.put(meeting);
        return true;
      });

      if (created) {
        logger.info({ meetingId: id, creator: meeting.createdBy }, 'Meeting created');
        return meeting;
      }

      logger.warn({ meetingId: id, attempt }, 'Meeting ID collision, regenerating');
    }

    throw new Error(`Could not allocate a unique meeting ID after ${MAX_ID_ATTEMPTS} attempts`);
  }

  /**
   * Record `author`'s status. Replaces the author's previous update in
   * place, or appends when this is their first. `authorName` is stored for
   * display only.
   */
  async submitUpdate(
    meetingId: string,
    author: string,
    fields: UpdateFields,
    authorName?: string | null
  ): Promise<Update> {
    return this.locks.runExclusive(meetingId, async () => {
      const meeting = await this.store.get(meetingId);
      if (!meeting) {
        throw new NotFoundError(meetingId);
      }
      if (meeting.closed) {
        throw new MeetingClosedError(meetingId);
      }

      const update = createUpdate(author, fields, this.clock(), authorName);
      const replaced = meeting.updates.has(update.author);
      await this.store.put(withUpdate(meeting, update));

      logger.info(
        { meetingId, author: update.author, replaced, updateCount: replaced ? meeting.updates.size : meeting.updates.size + 1 },
        replaced ? 'Update replaced' : 'Update added'
      );
      return update;
    });
  }

  /**
   * Close the meeting. Report rendering and archival start once the
   * closed state is persisted and the lock released.
   */
  async close(meetingId: string, closer: string): Promise<Meeting> {
    const closed = await this.locks.runExclusive(meetingId, async () => {
      const meeting = await this.store.get(meetingId);
      if (!meeting) {
        throw new NotFoundError(meetingId);
      }
      if (meeting.closed) {
        throw new AlreadyClosedError(meetingId);
      }

      const next = withClosed(meeting, closer, this.clock());
      await this.store.put(next);
      return next;
    });

    logger.info({ meetingId, closer: closed.closedBy, updateCount: closed.updates.size }, 'Meeting closed');
    this.startArchival(closed);
    return closed;
  }

  async getMeeting(meetingId: string): Promise<Meeting> {
    const meeting = await this.store.get(meetingId);
    if (!meeting) {
      throw new NotFoundError(meetingId);
    }
    return meeting;
  }

  /**
   * Open meetings, oldest first. Carries counts only, never update content.
   * A meeting whose stored record cannot be read is logged and left out.
   */
  async listOpenMeetings(): Promise<MeetingSummary[]> {
    const ids = await this.store.list();
    const summaries: MeetingSummary[] = [];

    for (const id of ids) {
      let meeting: Meeting | null;
      try {
        meeting = await this.store.get(id);
      } catch (error) {
        logger.warn({ err: error, meetingId: id }, 'Skipping unreadable meeting');
        continue;
      }
      if (meeting && !meeting.closed) {
        summaries.push(summarizeMeeting(meeting));
      }
    }
    return summaries;
  }

  /**
   * Wait for every in-flight post-close pipeline
   */
  async drain(): Promise<void> {
    while (this.pendingArchives.size > 0) {
      await Promise.all([...this.pendingArchives]);
    }
  }

  private startArchival(meeting: Meeting): void {
    const task = this.archive(meeting)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({ err: error, meetingId: meeting.id }, 'Post-close pipeline failed');
      })
      .finally(() => {
        this.pendingArchives.delete(task);
      });
    this.pendingArchives.add(task);
  }

  private async archive(meeting: Meeting): Promise<ArchivalOutcome> {
    let document: string | null = null;
    try {
      document = this.renderer.render(meeting);
    } catch (error) {
      logger.error({ err: error, meetingId: meeting.id }, 'Report rendering failed; archiving snapshot only');
    }

    return this.publisher.publish(meeting.id, serializeMeeting(meeting), document);
  }
}

import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../logger.js';
import { parseMeeting, serializeMeeting } from '../meetings/meeting.js';
import { isValidMeetingId } from '../meetings/meeting-id.js';
import type { Meeting } from '../types.js';
import type { MeetingStore } from './meeting-store.js';

const logger = createLogger('file-meeting-store');

const MEETING_FILENAME = 'meeting.json';

/**
 * Stores each meeting as `<root>/<meeting-id>/meeting.json`.
 * Writes go to a temp file in the same directory and are renamed into place.
 */
export class FileMeetingStore implements MeetingStore {
  readonly kind = 'file';
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private meetingPath(meetingId: string): string {
    return path.join(this.root, meetingId, MEETING_FILENAME);
  }

  async get(meetingId: string): Promise<Meeting | null> {
    if (!isValidMeetingId(meetingId)) {
      return null;
    }

    let contents: string;
    try {
      contents = await fs.readFile(this.meetingPath(meetingId), 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }

    return parseMeeting(contents);
  }

  async put(meeting: Meeting): Promise<void> {
    if (!isValidMeetingId(meeting.id)) {
      throw new Error(`Refusing to store meeting with invalid id: ${meeting.id}`);
    }

    const target = this.meetingPath(meeting.id);
    const dir = path.dirname(target);
    const tempPath = path.join(dir, `.${MEETING_FILENAME}.${uuidv4()}.tmp`);

    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(tempPath, serializeMeeting(meeting), 'utf-8');
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }

    logger.debug({ meetingId: meeting.id, closed: meeting.closed }, 'Meeting saved');
  }

  async exists(meetingId: string): Promise<boolean> {
    if (!isValidMeetingId(meetingId)) {
      return false;
    }

    try {
      await fs.access(this.meetingPath(meetingId));
      return true;
    } catch {
      return false;
    }
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.root);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    const ids: string[] = [];
    for (const entry of entries.filter(isValidMeetingId)) {
      if (await this.exists(entry)) {
        ids.push(entry);
      }
    }
    return ids.sort();
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

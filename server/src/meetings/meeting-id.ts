import { v4 as uuidv4 } from 'uuid';

/**
 * Meeting IDs look like `2026-10-19-3f9a0c2e`: the UTC creation date,
 * zero padded so IDs sort chronologically, then 8 hex characters.
 */
export const MEETING_ID_PATTERN = /^\d{4}-\d{2}-\d{2}-[0-9a-f]{8}$/;

export function generateMeetingId(now: Date): string {
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const day = String(now.getUTCDate()).padStart(2, '0');
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
  return `${year}-${month}-${day}-${suffix}`;
}

export function isValidMeetingId(id: string): boolean {
  return MEETING_ID_PATTERN.test(id);
}

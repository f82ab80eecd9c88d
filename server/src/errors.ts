/**
 * Error taxonomy for the standup bot.
 *
 * Caller-fault errors (validation, not found, closed) are thrown by the
 * lifecycle engine and shown to the invoking user. Render and archival
 * errors only ever surface in logs.
 */

export type StandupErrorCode =
  | 'validation_failed'
  | 'not_found'
  | 'meeting_closed'
  | 'already_closed'
  | 'render_failed'
  | 'archival_failed';

export abstract class StandupError extends Error {
  abstract readonly code: StandupErrorCode;
}

export type UpdateField = 'progress' | 'blockers' | 'goals';
export type MeetingField = 'title' | 'link';
export type IdentityField = 'author' | 'creator' | 'closer';
export type ValidatedField = UpdateField | MeetingField | IdentityField;

export type ValidationRule = 'required' | 'max_length' | 'invalid_url';

export interface ValidationIssue {
  field: ValidatedField;
  rule: ValidationRule;
  message: string;
}

export class ValidationError extends StandupError {
  readonly code = 'validation_failed';
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => issue.message).join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }

  /** Issues keyed by field, first issue per field */
  byField(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const issue of this.issues) {
      if (!result[issue.field]) {
        result[issue.field] = issue.message;
      }
    }
    return result;
  }
}

export class NotFoundError extends StandupError {
  readonly code = 'not_found';
  readonly meetingId: string;

  constructor(meetingId: string) {
    super(`Meeting ${meetingId} not found`);
    this.name = 'NotFoundError';
    this.meetingId = meetingId;
  }
}

export class MeetingClosedError extends StandupError {
  readonly code = 'meeting_closed';
  readonly meetingId: string;

  constructor(meetingId: string) {
    super(`Meeting ${meetingId} is closed and cannot be updated`);
    this.name = 'MeetingClosedError';
    this.meetingId = meetingId;
  }
}

export class AlreadyClosedError extends StandupError {
  readonly code = 'already_closed';
  readonly meetingId: string;

  constructor(meetingId: string) {
    super(`Meeting ${meetingId} is already closed`);
    this.name = 'AlreadyClosedError';
    this.meetingId = meetingId;
  }
}

export type RenderErrorKind = 'missing_template' | 'data_binding';

export class RenderError extends StandupError {
  readonly code = 'render_failed';
  readonly kind: RenderErrorKind;
  readonly cause: unknown;

  constructor(kind: RenderErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'RenderError';
    this.kind = kind;
    this.cause = cause;
  }
}

export type ArchivalOperation = 'upload_snapshot' | 'upload_report' | 'presign_report_url' | 'check_connection';

export class ArchivalError extends StandupError {
  readonly code = 'archival_failed';
  readonly meetingId: string | null;
  readonly operation: ArchivalOperation;
  readonly cause: unknown;

  constructor(operation: ArchivalOperation, meetingId: string | null, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Archival ${operation} failed${meetingId ? ` for meeting ${meetingId}` : ''}: ${reason}`);
    this.name = 'ArchivalError';
    this.operation = operation;
    this.meetingId = meetingId;
    this.cause = cause;
  }
}

/**
 * Check if an error belongs to the standup error taxonomy
 */
export function isStandupError(error: unknown): error is StandupError {
  return error instanceof StandupError;
}

import type { UpdateFields, MeetingDetails } from '../types.js';
import {
  ValidationError,
  type IdentityField,
  type UpdateField,
  type ValidationIssue,
} from '../errors.js';

export const MAX_UPDATE_FIELD_LENGTH = 500;
export const MAX_TITLE_LENGTH = 50;
export const MAX_LINK_LENGTH = 500;

const FIELD_LABELS: Record<UpdateField, string> = {
  progress: 'Progress',
  blockers: 'Blockers',
  goals: 'Goals',
};

const IDENTITY_LABELS: Record<IdentityField, string> = {
  author: 'Author',
  creator: 'Creator',
  closer: 'Closer',
};

export const UPDATE_FIELDS: readonly UpdateField[] = ['progress', 'blockers', 'goals'];

/**
 * Check update fields and collect every violation.
 * Length is measured in characters (code points) of the trimmed value.
 */
export function validateUpdateFields(fields: UpdateFields): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const field of UPDATE_FIELDS) {
    const label = FIELD_LABELS[field];
    const value = fields[field].trim();

    if (value.length === 0) {
      issues.push({ field, rule: 'required', message: `${label} field is required` });
    } else if (characterCount(value) > MAX_UPDATE_FIELD_LENGTH) {
      issues.push({
        field,
        rule: 'max_length',
        message: `${label} field must be ${MAX_UPDATE_FIELD_LENGTH} characters or less`,
      });
    }
  }

  return issues;
}

/**
 * Trim and validate update fields, throwing ValidationError on any violation
 */
export function normalizeUpdateFields(fields: UpdateFields): UpdateFields {
  const issues = validateUpdateFields(fields);
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return {
    progress: fields.progress.trim(),
    blockers: fields.blockers.trim(),
    goals: fields.goals.trim(),
  };
}

/**
 * Trim a creator, author or closer identity. Blank identities are rejected.
 */
export function normalizeIdentity(value: string, field: IdentityField): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new ValidationError([
      { field, rule: 'required', message: `${IDENTITY_LABELS[field]} is required` },
    ]);
  }
  return trimmed;
}

/**
 * Trim and validate the optional title/link supplied when a meeting is created.
 * Blank values become null.
 */
export function normalizeMeetingDetails(details: MeetingDetails = {}): { title: string | null; link: string | null } {
  const issues: ValidationIssue[] = [];
  const title = details.title?.trim() || null;
  const link = details.link?.trim() || null;

  if (title && characterCount(title) > MAX_TITLE_LENGTH) {
    issues.push({
      field: 'title',
      rule: 'max_length',
      message: `Title must be ${MAX_TITLE_LENGTH} characters or less`,
    });
  }

  if (link) {
    if (characterCount(link) > MAX_LINK_LENGTH) {
      issues.push({
        field: 'link',
        rule: 'max_length',
        message: `Link must be ${MAX_LINK_LENGTH} characters or less`,
      });
    } else if (!isHttpUrl(link)) {
      issues.push({
        field: 'link',
        rule: 'invalid_url',
        message: 'Link must be an http or https URL',
      });
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  return { title, link };
}

function characterCount(value: string): number {
  return [...value].length;
}

function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

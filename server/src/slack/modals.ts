/**
 * Modal views for creating a meeting and submitting an update
 */

import { z } from 'zod';
import type { ModalView } from '@slack/bolt';
import {
  MAX_LINK_LENGTH,
  MAX_TITLE_LENGTH,
  MAX_UPDATE_FIELD_LENGTH,
} from '../meetings/validation.js';
import type { Update } from '../types.js';
import type { ModalStateValues } from './types.js';

export const CREATE_MEETING_CALLBACK_ID = 'standup_create_meeting';
export const SUBMIT_UPDATE_CALLBACK_ID = 'standup_submit_update';

/** Every input uses this action_id; the block_id names the field */
export const INPUT_ACTION_ID = 'value';

const CreateMetadataSchema = z.object({
  channelId: z.string(),
});

const UpdateMetadataSchema = z.object({
  meetingId: z.string(),
  channelId: z.string(),
});

export type CreateMeetingMetadata = z.infer<typeof CreateMetadataSchema>;
export type SubmitUpdateMetadata = z.infer<typeof UpdateMetadataSchema>;

export function parseCreateMetadata(raw: string): CreateMeetingMetadata {
  return CreateMetadataSchema.parse(JSON.parse(raw));
}

export function parseUpdateMetadata(raw: string): SubmitUpdateMetadata {
  return UpdateMetadataSchema.parse(JSON.parse(raw));
}

/**
 * Read one input's value from submitted modal state. Missing or blank -> ''.
 */
export function readInput(values: ModalStateValues, blockId: string): string {
  return values[blockId]?.[INPUT_ACTION_ID]?.value ?? '';
}

export function buildCreateMeetingModal(metadata: CreateMeetingMetadata): ModalView {
  return {
    type: 'modal',
    callback_id: CREATE_MEETING_CALLBACK_ID,
    private_metadata: JSON.stringify(metadata),
    title: { type: 'plain_text', text: 'Create Meeting' },
    submit: { type: 'plain_text', text: 'Create' },
    close: { type: 'plain_text', text: 'Cancel' },
    blocks: [
      {
        type: 'input',
        block_id: 'title',
        optional: true,
        label: { type: 'plain_text', text: 'Name' },
        element: {
          type: 'plain_text_input',
          action_id: INPUT_ACTION_ID,
          max_length: MAX_TITLE_LENGTH,
          placeholder: { type: 'plain_text', text: 'What is the name of the meeting?' },
        },
      },
      {
        type: 'input',
        block_id: 'link',
        optional: true,
        label: { type: 'plain_text', text: 'Link' },
        element: {
          type: 'plain_text_input',
          action_id: INPUT_ACTION_ID,
          max_length: MAX_LINK_LENGTH,
          placeholder: { type: 'plain_text', text: 'What is the link to the meeting?' },
        },
      },
    ],
  };
}

const UPDATE_INPUTS = [
  { field: 'progress', label: 'Progress', placeholder: 'What have you accomplished since the last update?' },
  { field: 'blockers', label: 'Blockers', placeholder: 'What is blocking your progress?' },
  { field: 'goals', label: 'Goals', placeholder: 'What are your goals for the next period?' },
] as const;

/**
 * Update form. Pre-filled with the caller's current update, if any, since
 * submitting replaces it.
 */
export function buildUpdateModal(metadata: SubmitUpdateMetadata, existing?: Update): ModalView {
  return {
    type: 'modal',
    callback_id: SUBMIT_UPDATE_CALLBACK_ID,
    private_metadata: JSON.stringify(metadata),
    title: { type: 'plain_text', text: 'Meeting Update' },
    submit: { type: 'plain_text', text: existing ? 'Replace' : 'Submit' },
    close: { type: 'plain_text', text: 'Cancel' },
    blocks: [
      {
        type: 'context',
        elements: [
          {
            type: 'mrkdwn',
            text: existing
              ? `Meeting \`${metadata.meetingId}\`. Submitting replaces your current update.`
              : `Meeting \`${metadata.meetingId}\``,
          },
        ],
      },
      ...UPDATE_INPUTS.map(({ field, label, placeholder }) => ({
        type: 'input' as const,
        block_id: field,
        label: { type: 'plain_text' as const, text: label },
        element: {
          type: 'plain_text_input' as const,
          action_id: INPUT_ACTION_ID,
          multiline: true,
          max_length: MAX_UPDATE_FIELD_LENGTH,
          placeholder: { type: 'plain_text' as const, text: placeholder },
          ...(existing ? { initial_value: existing[field] } : {}),
        },
      })),
    ],
  };
}

/**
 * Slack adapter types
 */

import type { KnownBlock } from '@slack/bolt';

export type SlackBlock = KnownBlock;

/**
 * Reply to a slash command. Always ephemeral: meeting content is only
 * ever shown to the user who asked for it.
 */
export interface CommandResponse {
  response_type: 'ephemeral';
  text: string;
  blocks?: SlackBlock[];
}

/**
 * The parts of a slash command payload the adapter uses
 */
export interface SlashCommandInput {
  text: string;
  userId: string;
  userName: string;
  channelId: string;
  triggerId: string;
}

/**
 * Submitted modal state: block_id -> action_id -> value
 */
export type ModalStateValues = Record<string, Record<string, { value?: string | null }>>;

export interface ModalSubmissionInput {
  userId: string;
  userName: string;
  values: ModalStateValues;
  privateMetadata: string;
}

/**
 * Private message delivered after a modal closes
 */
export interface PrivateNotice {
  channelId: string;
  userId: string;
  text: string;
  blocks?: SlackBlock[];
}

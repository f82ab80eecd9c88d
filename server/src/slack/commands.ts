/**
 * Slack slash command and modal submission handlers
 *
 * Translates `/standup` interactions into lifecycle calls and builds the
 * private replies. Nothing here talks to Slack directly; bolt-app.ts
 * delivers the outcomes.
 */

import { createLogger } from '../logger.js';
import { isStandupError, ValidationError, type StandupError } from '../errors.js';
import { formatTimestamp } from '../services/report-renderer.js';
import { escapeSlackMrkdwn } from '../utils/html-entities.js';
import type { MeetingLifecycle } from '../services/meeting-lifecycle.js';
import type { Meeting, MeetingSummary, Update } from '../types.js';
import {
  buildCreateMeetingModal,
  buildUpdateModal,
  parseCreateMetadata,
  parseUpdateMetadata,
  readInput,
  type SubmitUpdateMetadata,
} from './modals.js';
import type {
  CommandResponse,
  ModalSubmissionInput,
  PrivateNotice,
  SlackBlock,
  SlashCommandInput,
} from './types.js';
import type { ModalView } from '@slack/bolt';

const logger = createLogger('slack-commands');

export type CommandOutcome =
  | { type: 'respond'; response: CommandResponse }
  | { type: 'open_modal'; view: ModalView };

/**
 * `errors` keeps the modal open with messages under the fields; `notify`
 * closes it and sends the notice privately
 */
export type SubmissionOutcome =
  | { type: 'errors'; errors: Record<string, string> }
  | { type: 'notify'; notice: PrivateNotice };

export interface ReportLinkProvider {
  isAvailable(): boolean;
  getReportUrl(meetingId: string): Promise<string | null>;
}

const GENERIC_FAILURE = 'Something went wrong. Please try again.';

export class StandupCommandHandler {
  constructor(
    private readonly lifecycle: MeetingLifecycle,
    private readonly reports: ReportLinkProvider,
    private readonly commandName: string = '/standup'
  ) {}

  /**
   * Route a slash command to its subcommand
   */
  async handleCommand(input: SlashCommandInput): Promise<CommandOutcome> {
    const [rawSubcommand = 'help', rawMeetingId] = input.text.trim().split(/\s+/);
    const subcommand = rawSubcommand.toLowerCase() || 'help';
    const meetingId = rawMeetingId ? normalizeMeetingId(rawMeetingId) : undefined;

    logger.info(
      { subcommand, meetingId, userId: input.userId, userName: input.userName },
      'Processing Slack command'
    );

    try {
      switch (subcommand) {
        case 'new':
          return {
            type: 'open_modal',
            view: buildCreateMeetingModal({ channelId: input.channelId }),
          };
        case 'update':
          if (!meetingId) {
            return respond(errorText(`Meeting ID is required. Usage: \`${this.commandName} update <meeting-id>\``));
          }
          return await this.openUpdateModal(meetingId, input);
        case 'close':
          if (!meetingId) {
            return respond(errorText(`Meeting ID is required. Usage: \`${this.commandName} close <meeting-id>\``));
          }
          return respond(await this.closeMeeting(meetingId, input));
        case 'list':
          return respond(buildOpenMeetingsResponse(await this.lifecycle.listOpenMeetings()));
        case 'help':
        default:
          return respond(this.buildHelpResponse());
      }
    } catch (error) {
      return respond(errorText(this.describeError(error, 'command', subcommand)));
    }
  }

  /**
   * "Create Meeting" modal submitted
   */
  async handleCreateSubmission(input: ModalSubmissionInput): Promise<SubmissionOutcome> {
    try {
      const { channelId } = parseCreateMetadata(input.privateMetadata);
      const meeting = await this.lifecycle.create(displayNameOf(input), {
        title: readInput(input.values, 'title'),
        link: readInput(input.values, 'link'),
      });

      return {
        type: 'notify',
        notice: {
          channelId,
          userId: input.userId,
          ...buildCreatedNotice(meeting, this.commandName),
        },
      };
    } catch (error) {
      return this.submissionErrors(error, 'title');
    }
  }

  /**
   * "Meeting Update" modal submitted
   */
  async handleUpdateSubmission(input: ModalSubmissionInput): Promise<SubmissionOutcome> {
    let metadata: SubmitUpdateMetadata;
    try {
      metadata = parseUpdateMetadata(input.privateMetadata);
    } catch (error) {
      return this.submissionErrors(error, 'progress');
    }

    const { meetingId, channelId } = metadata;
    try {
      const update = await this.lifecycle.submitUpdate(
        meetingId,
        input.userId,
        {
          progress: readInput(input.values, 'progress'),
          blockers: readInput(input.values, 'blockers'),
          goals: readInput(input.values, 'goals'),
        },
        input.userName
      );

      return {
        type: 'notify',
        notice: {
          channelId,
          userId: input.userId,
          ...buildUpdateNotice(meetingId, update),
        },
      };
    } catch (error) {
      // The meeting was closed (or removed) while the modal was open
      if (isStandupError(error) && !(error instanceof ValidationError)) {
        return {
          type: 'notify',
          notice: { channelId, userId: input.userId, text: `:x: ${describeStandupError(error)}` },
        };
      }
      return this.submissionErrors(error, 'progress');
    }
  }

  private async openUpdateModal(meetingId: string, input: SlashCommandInput): Promise<CommandOutcome> {
    const meeting = await this.lifecycle.getMeeting(meetingId);
    if (meeting.closed) {
      return respond(errorText(`Meeting \`${meeting.id}\` is closed and cannot be updated.`));
    }

    const existing = meeting.updates.get(input.userId);
    return {
      type: 'open_modal',
      view: buildUpdateModal({ meetingId: meeting.id, channelId: input.channelId }, existing),
    };
  }

  private async closeMeeting(meetingId: string, input: SlashCommandInput): Promise<CommandResponse> {
    const meeting = await this.lifecycle.close(meetingId, displayNameOf(input));
    const reportUrl = this.reports.isAvailable() ? await this.reports.getReportUrl(meeting.id) : null;
    return buildClosedResponse(meeting, reportUrl);
  }

  private buildHelpResponse(): CommandResponse {
    const cmd = this.commandName;
    return {
      response_type: 'ephemeral',
      text: 'Standup commands',
      blocks: [
        {
          type: 'header',
          text: { type: 'plain_text', text: 'Standup commands', emoji: true },
        },
        {
          type: 'section',
          text: { type: 'mrkdwn', text: `*\`${cmd} new\`*\nOpen a new meeting` },
        },
        {
          type: 'section',
          text: {
            type: 'mrkdwn',
            text: `*\`${cmd} update <meeting-id>\`*\nSubmit your progress, blockers and goals. Submitting again replaces your update.`,
          },
        },
        {
          type: 'section',
          text: { type: 'mrkdwn', text: `*\`${cmd} close <meeting-id>\`*\nClose a meeting and publish its report` },
        },
        {
          type: 'section',
          text: { type: 'mrkdwn', text: `*\`${cmd} list\`*\nShow open meetings` },
        },
      ],
    };
  }

  private submissionErrors(error: unknown, fallbackBlock: string): SubmissionOutcome {
    if (error instanceof ValidationError) {
      return { type: 'errors', errors: error.byField() };
    }
    return { type: 'errors', errors: { [fallbackBlock]: this.describeError(error, 'submission', fallbackBlock) } };
  }

  private describeError(error: unknown, phase: string, context: string): string {
    if (isStandupError(error)) {
      return describeStandupError(error);
    }
    logger.error({ err: error, phase, context }, 'Slack interaction failed');
    return GENERIC_FAILURE;
  }
}

/**
 * User-facing text for caller-fault errors
 */
export function describeStandupError(error: StandupError): string {
  switch (error.code) {
    case 'validation_failed':
      return error instanceof ValidationError
        ? `Validation error: ${error.issues.map((issue) => issue.message).join('; ')}`
        : error.message;
    case 'not_found':
    case 'meeting_closed':
    case 'already_closed':
      return `${error.message}.`;
    default:
      return GENERIC_FAILURE;
  }
}

function respond(response: CommandResponse): CommandOutcome {
  return { type: 'respond', response };
}

function errorText(message: string): CommandResponse {
  return { response_type: 'ephemeral', text: `:x: ${message}` };
}

/**
 * Accept IDs pasted with the backticks we display them in
 */
export function normalizeMeetingId(raw: string): string {
  return raw.replace(/^`+|`+$/g, '').trim().toLowerCase();
}

/**
 * Name recorded as a meeting's creator or closer: the Slack handle, falling
 * back to the user ID. Updates are keyed by user ID instead, since handles
 * can change.
 */
function displayNameOf(input: { userName: string; userId: string }): string {
  return input.userName || input.userId;
}

export function buildCreatedNotice(meeting: Meeting, commandName: string): { text: string; blocks: SlackBlock[] } {
  const heading = meeting.title
    ? `:white_check_mark: *New meeting created:* ${escapeSlackMrkdwn(meeting.title)}`
    : ':white_check_mark: *New meeting created*';

  return {
    text: `New meeting created: ${meeting.id}`,
    blocks: [
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `${heading}\nMeeting ID: \`${meeting.id}\`` },
      },
      {
        type: 'section',
        fields: [
          { type: 'mrkdwn', text: `*Created by:*\n${escapeSlackMrkdwn(meeting.createdBy)}` },
          { type: 'mrkdwn', text: `*Created at:*\n${formatTimestamp(meeting.createdAt)}` },
        ],
      },
      {
        type: 'context',
        elements: [
          { type: 'mrkdwn', text: `Use \`${commandName} update ${meeting.id}\` to add updates` },
        ],
      },
    ],
  };
}

export function buildUpdateNotice(meetingId: string, update: Update): { text: string; blocks: SlackBlock[] } {
  return {
    text: `Your update has been saved to meeting ${meetingId}`,
    blocks: [
      {
        type: 'section',
        text: {
          type: 'mrkdwn',
          text: `:white_check_mark: *Update saved* to meeting \`${meetingId}\`\nOnly you can see this until the meeting is closed.`,
        },
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Progress*\n${escapeSlackMrkdwn(update.progress)}` },
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Blockers*\n${escapeSlackMrkdwn(update.blockers)}` },
      },
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Goals*\n${escapeSlackMrkdwn(update.goals)}` },
      },
    ],
  };
}

export function buildClosedResponse(meeting: Meeting, reportUrl: string | null): CommandResponse {
  const blocks: SlackBlock[] = [
    {
      type: 'section',
      text: { type: 'mrkdwn', text: `:lock: *Meeting closed*\nMeeting \`${meeting.id}\` has been closed.` },
    },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Total updates:*\n${meeting.updates.size}` },
        { type: 'mrkdwn', text: `*Closed by:*\n${escapeSlackMrkdwn(meeting.closedBy ?? 'unknown')}` },
        {
          type: 'mrkdwn',
          text: `*Closed at:*\n${meeting.closedAt ? formatTimestamp(meeting.closedAt) : 'unknown'}`,
        },
      ],
    },
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: reportUrl ? `*Report:* <${reportUrl}|View meeting report>` : '*Report:* link unavailable',
      },
    },
  ];

  if (meeting.link) {
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: `*Meeting link:* ${escapeSlackMrkdwn(meeting.link)}` },
    });
  }

  blocks.push({
    type: 'context',
    elements: [{ type: 'mrkdwn', text: 'Meeting data has been saved and locked.' }],
  });

  return {
    response_type: 'ephemeral',
    text: `Meeting ${meeting.id} closed`,
    blocks,
  };
}

export function buildOpenMeetingsResponse(meetings: MeetingSummary[]): CommandResponse {
  if (meetings.length === 0) {
    return { response_type: 'ephemeral', text: 'There are no open meetings.' };
  }

  const lines = meetings.map((meeting) => {
    const title = meeting.title ? ` ${escapeSlackMrkdwn(meeting.title)}` : '';
    const count = meeting.updateCount === 1 ? '1 update' : `${meeting.updateCount} updates`;
    return `• \`${meeting.id}\`${title} (by ${escapeSlackMrkdwn(meeting.createdBy)}, ${count})`;
  });

  return {
    response_type: 'ephemeral',
    text: `${meetings.length} open meeting${meetings.length === 1 ? '' : 's'}`,
    blocks: [
      {
        type: 'section',
        text: { type: 'mrkdwn', text: `*Open meetings*\n${lines.join('\n')}` },
      },
    ],
  };
}

/**
 * Standup Bolt App
 *
 * Slack Bolt application handling:
 * - the slash command (new / update / close / list / help)
 * - submissions of the "Create Meeting" and "Meeting Update" modals
 *
 * Uses ExpressReceiver so the Slack endpoints mount on our Express server.
 */

// @slack/bolt is CommonJS; the default import is its module.exports
import bolt from '@slack/bolt';
import type { App as BoltApp, ViewSubmitAction } from '@slack/bolt';
import type { Router } from 'express';
import { createLogger } from '../logger.js';
import type { SlackConfig } from '../config.js';
import {
  StandupCommandHandler,
  type SubmissionOutcome,
} from './commands.js';
import { CREATE_MEETING_CALLBACK_ID, SUBMIT_UPDATE_CALLBACK_ID } from './modals.js';
import type { PrivateNotice, SlackBlock } from './types.js';

const { App, ExpressReceiver, LogLevel } = bolt;

const logger = createLogger('slack-bolt');

export interface StandupBolt {
  app: BoltApp;
  router: Router;
}

/**
 * Create the Bolt app and register the standup handlers
 */
export function createStandupBolt(config: SlackConfig, handler: StandupCommandHandler): StandupBolt {
  const logLevel = process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.DEBUG;

  const receiver = new ExpressReceiver({
    signingSecret: config.signingSecret,
    endpoints: '/events',
    logLevel,
  });

  const app = new App({
    token: config.botToken,
    receiver,
    logLevel,
  });

  app.command(config.command, async ({ command, ack, respond, client }) => {
    await ack();

    const outcome = await handler.handleCommand({
      text: command.text,
      userId: command.user_id,
      userName: command.user_name,
      channelId: command.channel_id,
      triggerId: command.trigger_id,
    });

    try {
      if (outcome.type === 'open_modal') {
        await client.views.open({ trigger_id: command.trigger_id, view: outcome.view });
      } else {
        await respond(outcome.response);
      }
    } catch (error) {
      logger.error({ err: error, userId: command.user_id }, 'Failed to deliver command response');
    }
  });

  app.view<ViewSubmitAction>(CREATE_MEETING_CALLBACK_ID, async ({ ack, body, view, client }) => {
    const outcome = await handler.handleCreateSubmission({
      userId: body.user.id,
      userName: body.user.name,
      values: view.state.values,
      privateMetadata: view.private_metadata,
    });
    await finishSubmission(outcome, ack, client);
  });

  app.view<ViewSubmitAction>(SUBMIT_UPDATE_CALLBACK_ID, async ({ ack, body, view, client }) => {
    const outcome = await handler.handleUpdateSubmission({
      userId: body.user.id,
      userName: body.user.name,
      values: view.state.values,
      privateMetadata: view.private_metadata,
    });
    await finishSubmission(outcome, ack, client);
  });

  app.error(async (error) => {
    logger.error({ err: error }, 'Unhandled Bolt error');
  });

  logger.info({ command: config.command }, 'Standup Bolt app ready');
  return { app, router: receiver.router };
}

type ViewAck = (response?: { response_action: 'errors'; errors: Record<string, string> }) => Promise<void>;

/**
 * The part of the Slack Web API client used for private notices
 */
export interface NoticeClient {
  chat: {
    postEphemeral(args: { channel: string; user: string; text: string; blocks?: SlackBlock[] }): Promise<unknown>;
    postMessage(args: { channel: string; text: string; blocks?: SlackBlock[] }): Promise<unknown>;
  };
}

async function finishSubmission(outcome: SubmissionOutcome, ack: ViewAck, client: NoticeClient): Promise<void> {
  if (outcome.type === 'errors') {
    await ack({ response_action: 'errors', errors: outcome.errors });
    return;
  }

  await ack();
  await deliverPrivately(client, outcome.notice);
}

/**
 * Post an ephemeral message in the originating channel. Falls back to a
 * DM when the bot cannot post there (e.g. not a member of the channel).
 */
export async function deliverPrivately(client: NoticeClient, notice: PrivateNotice): Promise<void> {
  try {
    await client.chat.postEphemeral({
      channel: notice.channelId,
      user: notice.userId,
      text: notice.text,
      blocks: notice.blocks,
    });
    return;
  } catch (error) {
    logger.warn({ err: error, channelId: notice.channelId }, 'Ephemeral delivery failed, sending DM');
  }

  try {
    await client.chat.postMessage({
      channel: notice.userId,
      text: notice.text,
      blocks: notice.blocks,
    });
  } catch (error) {
    logger.error({ err: error, userId: notice.userId }, 'Failed to deliver private notice');
  }
}

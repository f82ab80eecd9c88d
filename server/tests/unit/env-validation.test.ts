import { describe, it, expect } from 'vitest';
import { checkEnvironment } from '../../src/env-validation.js';

describe('checkEnvironment', () => {
  it('reports missing Slack credentials', () => {
    const { missing } = checkEnvironment({});

    expect(missing).toEqual([
      'SLACK_BOT_TOKEN: Slack bot token (xoxb-...) used to open modals and post private replies',
      'SLACK_SIGNING_SECRET: Slack signing secret used to verify incoming requests',
    ]);
  });

  it('applies defaults for unset optional variables', () => {
    const env: NodeJS.ProcessEnv = { SLACK_BOT_TOKEN: 'test-bot-token', SLACK_SIGNING_SECRET: 'test-secret' };

    const { missing } = checkEnvironment(env);

    expect(missing).toEqual([]);
    expect(env.SLACK_COMMAND).toBe('/standup');
    expect(env.PORT).toBe('3000');
    expect(env.MEETINGS_DIR).toBe('json');
    expect(env.AWS_REGION).toBe('us-east-1');
  });

  it('keeps values that are already set', () => {
    const env: NodeJS.ProcessEnv = {
      SLACK_BOT_TOKEN: 'test-bot-token',
      SLACK_SIGNING_SECRET: 'test-secret',
      PORT: '8080',
    };

    checkEnvironment(env);

    expect(env.PORT).toBe('8080');
  });

  it('warns when archival is only partly configured', () => {
    const { warnings } = checkEnvironment({
      SLACK_BOT_TOKEN: 'test-bot-token',
      SLACK_SIGNING_SECRET: 'test-secret',
      AWS_S3_BUCKET: 'standup-archive',
    });

    expect(warnings).toContain(
      'Archival is partially configured (AWS_S3_BUCKET); reports will not be archived'
    );
  });

  it('does not warn about archival when it is fully configured', () => {
    const { warnings } = checkEnvironment({
      SLACK_BOT_TOKEN: 'test-bot-token',
      SLACK_SIGNING_SECRET: 'test-secret',
      AWS_S3_BUCKET: 'standup-archive',
      AWS_ACCESS_KEY_ID: 'test-access-key',
      AWS_SECRET_ACCESS_KEY: 'test-secret',
    });

    expect(warnings.some((warning) => warning.startsWith('Archival is partially configured'))).toBe(false);
    expect(warnings).toEqual(['DATABASE_URL: PostgreSQL connection string; enables the database meeting store']);
  });
});

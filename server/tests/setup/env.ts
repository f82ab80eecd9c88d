// Test environment setup for vitest
// Keeps the logger quiet and supplies placeholder Slack credentials

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

process.env.SLACK_BOT_TOKEN = 'test-bot-token';
process.env.SLACK_SIGNING_SECRET = 'test-secret';

/**
 * Environment variable validation
 *
 * Validates all required environment variables on startup
 * and provides helpful error messages if any are missing.
 */

import { createLogger } from './logger.js';

const logger = createLogger('env-validation');

interface EnvVariable {
  name: string;
  description: string;
  defaultValue?: string;
}

interface EnvConfig {
  required: EnvVariable[];
  optional: EnvVariable[];
}

export const envConfig: EnvConfig = {
  required: [
    {
      name: 'SLACK_BOT_TOKEN',
      description: 'Slack bot token (xoxb-...) used to open modals and post private replies',
    },
    {
      name: 'SLACK_SIGNING_SECRET',
      description: 'Slack signing secret used to verify incoming requests',
    },
  ],
  optional: [
    {
      name: 'SLACK_COMMAND',
      description: 'Slash command the bot answers to',
      defaultValue: '/standup',
    },
    {
      name: 'PORT',
      description: 'HTTP server port',
      defaultValue: '3000',
    },
    {
      name: 'MEETINGS_DIR',
      description: 'Directory for the local meeting store (ignored when DATABASE_URL is set)',
      defaultValue: 'json',
    },
    {
      name: 'DATABASE_URL',
      description: 'PostgreSQL connection string; enables the database meeting store',
    },
    {
      name: 'AWS_S3_BUCKET',
      description: 'S3 bucket for archived meeting snapshots and reports',
    },
    {
      name: 'AWS_ACCESS_KEY_ID',
      description: 'AWS access key for report archival',
    },
    {
      name: 'AWS_SECRET_ACCESS_KEY',
      description: 'AWS secret key for report archival',
    },
    {
      name: 'AWS_REGION',
      description: 'AWS region of the archive bucket',
      defaultValue: 'us-east-1',
    },
    {
      name: 'NODE_ENV',
      description: 'Environment (development|production)',
      defaultValue: 'development',
    },
  ],
};

export interface EnvValidationResult {
  missing: string[];
  warnings: string[];
}

/**
 * Check the environment, applying defaults for unset optional variables
 */
export function checkEnvironment(env: NodeJS.ProcessEnv = process.env): EnvValidationResult {
  const missing: string[] = [];
  const warnings: string[] = [];

  for (const { name, description } of envConfig.required) {
    if (!env[name]) {
      missing.push(`${name}: ${description}`);
    }
  }

  for (const { name, description, defaultValue } of envConfig.optional) {
    if (!env[name]) {
      if (defaultValue) {
        env[name] = defaultValue;
      } else {
        warnings.push(`${name}: ${description}`);
      }
    }
  }

  const archivalVars = ['AWS_S3_BUCKET', 'AWS_ACCESS_KEY_ID', 'AWS_SECRET_ACCESS_KEY'];
  const setArchivalVars = archivalVars.filter((name) => env[name]);
  if (setArchivalVars.length > 0 && setArchivalVars.length < archivalVars.length) {
    warnings.push(`Archival is partially configured (${setArchivalVars.join(', ')}); reports will not be archived`);
  }

  return { missing, warnings };
}

/**
 * Validate that all required environment variables are set
 * Exits the process if any required variables are missing
 */
export function validateEnvironment(): void {
  const { missing, warnings } = checkEnvironment();

  if (missing.length > 0) {
    logger.fatal({ missing }, 'Missing required environment variables. Set them in your .env file or environment.');
    process.exit(1);
  }

  if (warnings.length > 0) {
    logger.warn({ unset: warnings }, 'Optional environment variables not set');
  } else {
    logger.info('Environment variables validated successfully');
  }
}

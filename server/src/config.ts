import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Repository root for a module directory. Sources live in <root>/server/src;
 * the compiled copy lives in <root>/dist/server/src.
 */
export function resolveProjectRoot(moduleDir: string): string {
  const compiled = path.basename(path.resolve(moduleDir, "../..")) === "dist";
  return compiled ? path.resolve(moduleDir, "../../..") : path.resolve(moduleDir, "../..");
}

/**
 * Get the repository root from where this module actually sits, so a
 * compiled build finds templates and migrations whatever NODE_ENV says
 */
export function getProjectRoot(): string {
  return resolveProjectRoot(__dirname);
}

/**
 * Directory holding the report page templates
 */
export function getTemplatesPath(): string {
  return (
    process.env.REPORT_TEMPLATES_DIR ||
    path.join(getProjectRoot(), "server/templates")
  );
}

/**
 * Directory holding the SQL migrations
 */
export function getMigrationsPath(): string {
  return path.join(getProjectRoot(), "server/src/db/migrations");
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Database configuration from environment
 */
export interface DatabaseConfig {
  connectionString: string;
  ssl: boolean | { rejectUnauthorized: boolean };
  maxPoolSize: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * Get database configuration from environment variables.
 * Returns null when no database is configured (the file store is used instead).
 */
export function getDatabaseConfig(): DatabaseConfig | null {
  const connectionString =
    process.env.DATABASE_URL || process.env.DATABASE_PRIVATE_URL;

  if (!connectionString) {
    return null;
  }

  let ssl: boolean | { rejectUnauthorized: boolean } = false;
  if (process.env.DATABASE_SSL === "true") {
    const rejectUnauthorized =
      process.env.DATABASE_SSL_REJECT_UNAUTHORIZED !== "false";
    ssl = { rejectUnauthorized };
  }

  return {
    connectionString,
    ssl,
    maxPoolSize: parseIntEnv(process.env.DATABASE_MAX_POOL_SIZE, 10),
    idleTimeoutMillis: parseIntEnv(process.env.DATABASE_IDLE_TIMEOUT_MS, 30000),
    connectionTimeoutMillis: parseIntEnv(process.env.DATABASE_CONNECTION_TIMEOUT_MS, 5000),
  };
}

/**
 * Local file store configuration
 */
export interface FileStoreConfig {
  directory: string;
}

export function getFileStoreConfig(): FileStoreConfig {
  return {
    directory: process.env.MEETINGS_DIR || "json",
  };
}

/**
 * Remote archival configuration (S3)
 */
export interface ArchivalConfig {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  prefix: string;
  timeoutMs: number;
  reportUrlExpirySeconds: number;
}

/**
 * Get archival configuration from environment variables.
 * Returns null unless bucket and credentials are all present.
 */
export function getArchivalConfig(): ArchivalConfig | null {
  const bucket = process.env.AWS_S3_BUCKET;
  const accessKeyId = process.env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = process.env.AWS_SECRET_ACCESS_KEY;

  if (!bucket || !accessKeyId || !secretAccessKey) {
    return null;
  }

  return {
    bucket,
    region: process.env.AWS_REGION || "us-east-1",
    accessKeyId,
    secretAccessKey,
    prefix: (process.env.ARCHIVE_PREFIX || "meetings").replace(/^\/+|\/+$/g, ""),
    timeoutMs: parseIntEnv(process.env.ARCHIVE_TIMEOUT_MS, 10000),
    reportUrlExpirySeconds: parseIntEnv(process.env.REPORT_URL_EXPIRY_SECONDS, 7 * 24 * 60 * 60),
  };
}

/**
 * Slack app configuration
 */
export interface SlackConfig {
  botToken: string;
  signingSecret: string;
  command: string;
}

export function getSlackConfig(): SlackConfig | null {
  const botToken = process.env.SLACK_BOT_TOKEN;
  const signingSecret = process.env.SLACK_SIGNING_SECRET;

  if (!botToken || !signingSecret) {
    return null;
  }

  const command = process.env.SLACK_COMMAND || "/standup";
  return {
    botToken,
    signingSecret,
    command: command.startsWith("/") ? command : `/${command}`,
  };
}

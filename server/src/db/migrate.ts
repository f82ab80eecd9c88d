/**
 * Versioned schema changes for the Postgres meeting store.
 *
 * Files named NNN_description.sql are applied in version order. Each file
 * commits together with its schema_migrations row.
 */

import fs from "fs/promises";
import path from "path";
import { query, withTransaction } from "./client.js";
import { getMigrationsPath } from "../config.js";
import { createLogger } from "../logger.js";

const logger = createLogger("migrate");

export interface Migration {
  version: number;
  filename: string;
  sql: string;
}

const MIGRATION_FILE = /^(\d+)_(.+)\.sql$/;

export function parseMigrationFilename(filename: string): { version: number; description: string } | null {
  const match = MIGRATION_FILE.exec(filename);
  return match ? { version: Number(match[1]), description: match[2] } : null;
}

export async function loadMigrations(dir: string = getMigrationsPath()): Promise<Migration[]> {
  const sqlFiles = (await fs.readdir(dir)).filter((file) => file.endsWith(".sql"));

  const misnamed = sqlFiles.filter((file) => parseMigrationFilename(file) === null);
  if (misnamed.length > 0) {
    throw new Error(
      `Migration filename validation failed: ${misnamed.join(", ")} (expected NNN_description.sql)`
    );
  }

  const migrations: Migration[] = [];
  for (const filename of sqlFiles) {
    const parsed = parseMigrationFilename(filename);
    if (parsed) {
      const sql = await fs.readFile(path.join(dir, filename), "utf-8");
      migrations.push({ version: parsed.version, filename, sql });
    }
  }
  return migrations.sort((a, b) => a.version - b.version);
}

/**
 * Apply every migration not yet recorded; resolves to how many ran
 */
export async function runMigrations(): Promise<number> {
  await query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version INTEGER PRIMARY KEY,
       filename TEXT NOT NULL,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const { rows } = await query<{ version: number }>("SELECT version FROM schema_migrations");
  const applied = new Set(rows.map((row) => row.version));
  const pending = (await loadMigrations()).filter((migration) => !applied.has(migration.version));

  for (const migration of pending) {
    await withTransaction(async (client) => {
      await client.query(migration.sql);
      await client.query("INSERT INTO schema_migrations (version, filename) VALUES ($1, $2)", [
        migration.version,
        migration.filename,
      ]);
    });
    logger.info({ migration: migration.filename }, "Applied migration");
  }

  return pending.length;
}

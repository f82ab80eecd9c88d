import 'dotenv/config';
import path from "path";
import { HTTPServer } from "./http.js";
import { validateEnvironment } from "./env-validation.js";
import { runMigrations } from "./db/migrate.js";
import { initializeDatabase } from "./db/client.js";
import { PostgresMeetingStore } from "./db/meetings-db.js";
import {
  getArchivalConfig,
  getDatabaseConfig,
  getFileStoreConfig,
  getProjectRoot,
  getSlackConfig,
  getTemplatesPath,
} from "./config.js";
import { createLogger } from "./logger.js";
import { FileMeetingStore } from "./storage/file-meeting-store.js";
import type { MeetingStore } from "./storage/meeting-store.js";
import { ReportRenderer } from "./services/report-renderer.js";
import { createArchivalPublisher } from "./services/archival-publisher.js";
import { MeetingLifecycle } from "./services/meeting-lifecycle.js";
import { StandupCommandHandler } from "./slack/commands.js";
import { createStandupBolt } from "./slack/bolt-app.js";

const logger = createLogger('main');

// Validate environment variables before starting server
validateEnvironment();

async function createMeetingStore(): Promise<MeetingStore> {
  const dbConfig = getDatabaseConfig();

  if (!dbConfig) {
    const { directory } = getFileStoreConfig();
    const root = path.resolve(getProjectRoot(), directory);
    logger.info({ root }, 'Using file meeting store');
    return new FileMeetingStore(root);
  }

  initializeDatabase(dbConfig);

  // Run migrations on startup if RUN_MIGRATIONS is set
  if (process.env.RUN_MIGRATIONS === 'true') {
    const applied = await runMigrations();
    logger.info({ applied }, 'Database migrations complete');
  }

  logger.info('Using Postgres meeting store');
  return new PostgresMeetingStore();
}

async function main() {
  const store = await createMeetingStore();
  const renderer = new ReportRenderer({ templatesDir: getTemplatesPath() });
  const publisher = createArchivalPublisher(getArchivalConfig());

  if (publisher.isAvailable()) {
    const reachable = await publisher.checkConnection();
    if (!reachable) {
      logger.warn('Archival store unreachable at startup; closes will still succeed locally');
    }
  } else {
    logger.warn('Archival not configured - meeting snapshots and reports stay local');
  }

  const lifecycle = new MeetingLifecycle({ store, renderer, publisher });

  const slackConfig = getSlackConfig();
  const bolt = slackConfig
    ? createStandupBolt(slackConfig, new StandupCommandHandler(lifecycle, publisher, slackConfig.command))
    : null;

  const httpServer = new HTTPServer({
    lifecycle,
    storeKind: store.kind,
    archival: publisher,
    slackRouter: bolt?.router ?? null,
  });
  const port = parseInt(process.env.PORT || "3000", 10);
  await httpServer.start(port);
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});

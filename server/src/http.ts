import express from "express";
import type { Router } from "express";
import type { Server } from "http";
import { createLogger } from "./logger.js";
import { closeDatabase } from "./db/client.js";
import type { MeetingLifecycle } from "./services/meeting-lifecycle.js";
import type { MeetingStoreKind } from "./storage/meeting-store.js";

const logger = createLogger('http-server');

export interface ArchivalStatusProvider {
  isAvailable(): boolean;
}

export interface HTTPServerDeps {
  lifecycle: MeetingLifecycle;
  storeKind: MeetingStoreKind;
  archival: ArchivalStatusProvider;
  /** Slack receiver router, mounted at /api/slack when configured */
  slackRouter?: Router | null;
}

export interface HealthResponse {
  status: 'ok';
  store: MeetingStoreKind;
  archival: { available: boolean };
}

export class HTTPServer {
  private app: express.Application;
  private server: Server | null = null;
  private shutdownHandlersInstalled = false;

  constructor(private readonly deps: HTTPServerDeps) {
    this.app = express();
    this.setupRoutes();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req, res) => {
      const body: HealthResponse = {
        status: 'ok',
        store: this.deps.storeKind,
        archival: { available: this.deps.archival.isAvailable() },
      };
      res.json(body);
    });

    // Bolt's receiver parses and verifies the raw body itself, so no JSON
    // parser sits in front of it
    if (this.deps.slackRouter) {
      this.app.use('/api/slack', this.deps.slackRouter);
      logger.info('Slack endpoints mounted at /api/slack');
    } else {
      logger.warn('Slack not configured - slash command endpoints disabled');
    }
  }

  async start(port: number = 3000): Promise<void> {
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(port, () => {
        logger.info({
          port,
          health: `http://localhost:${port}/health`,
          slack: `http://localhost:${port}/api/slack/events`,
        }, 'Standup HTTP server running');
        resolve();
      });
    });

    this.setupShutdownHandlers();
  }

  /**
   * Setup graceful shutdown handlers for SIGTERM and SIGINT
   */
  private setupShutdownHandlers(): void {
    if (this.shutdownHandlersInstalled) {
      return;
    }
    this.shutdownHandlersInstalled = true;

    const gracefulShutdown = async (signal: string) => {
      logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown');
      try {
        await this.stop();
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Graceful shutdown failed');
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  }

  /**
   * Stop accepting requests, let post-close archival finish, then close
   * the database pool
   */
  async stop(): Promise<void> {
    logger.info('Stopping HTTP server');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            logger.error({ err }, "Error closing HTTP server");
            reject(err);
          } else {
            logger.info("HTTP server closed");
            resolve();
          }
        });
      });
      this.server = null;
    }

    logger.info('Waiting for pending archival work');
    await this.deps.lifecycle.drain();

    logger.info('Closing database connection');
    await closeDatabase();

    logger.info('Graceful shutdown complete');
  }
}

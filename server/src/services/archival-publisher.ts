/**
 * Archival Publisher
 *
 * Pushes a closed meeting's JSON snapshot and rendered report to remote
 * storage under `<prefix>/<meeting-id>/`. Best effort: every failure is
 * logged and swallowed, and the two uploads are independent.
 */

import { createLogger } from '../logger.js';
import { ArchivalError, type ArchivalOperation } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import { S3BlobStore, type BlobStore } from '../integrations/s3.js';
import type { ArchivalConfig } from '../config.js';

const logger = createLogger('archival-publisher');

export const SNAPSHOT_ARTIFACT = 'meeting.json';
export const REPORT_ARTIFACT = 'index.html';
export const SNAPSHOT_CONTENT_TYPE = 'application/json';
export const REPORT_CONTENT_TYPE = 'text/html; charset=utf-8';

const DEFAULT_PREFIX = 'meetings';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_REPORT_URL_EXPIRY_SECONDS = 7 * 24 * 60 * 60;

export type ArtifactStatus = 'uploaded' | 'failed' | 'skipped';

export interface ArchivalOutcome {
  snapshot: ArtifactStatus;
  report: ArtifactStatus;
}

export interface ArchivalPublisherOptions {
  /** null when archival is not configured */
  store: BlobStore | null;
  prefix?: string;
  timeoutMs?: number;
  reportUrlExpirySeconds?: number;
}

export class ArchivalPublisher {
  private readonly store: BlobStore | null;
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly reportUrlExpirySeconds: number;
  private warnedUnavailable = false;

  constructor(options: ArchivalPublisherOptions) {
    this.store = options.store;
    this.prefix = options.prefix ?? DEFAULT_PREFIX;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.reportUrlExpirySeconds = options.reportUrlExpirySeconds ?? DEFAULT_REPORT_URL_EXPIRY_SECONDS;
  }

  isAvailable(): boolean {
    return this.store !== null;
  }

  artifactKey(meetingId: string, artifact: string): string {
    return this.prefix ? `${this.prefix}/${meetingId}/${artifact}` : `${meetingId}/${artifact}`;
  }

  /**
   * Upload the snapshot and the report. Never throws.
   * A null document (rendering failed) skips the report upload only.
   */
  async publish(meetingId: string, snapshotJson: string, document: string | null): Promise<ArchivalOutcome> {
    const store = this.store;
    if (!store) {
      this.warnUnavailable(meetingId);
      return { snapshot: 'skipped', report: 'skipped' };
    }

    const [snapshot, report] = await Promise.all([
      this.upload(store, 'upload_snapshot', meetingId, SNAPSHOT_ARTIFACT, snapshotJson, SNAPSHOT_CONTENT_TYPE),
      document === null
        ? Promise.resolve<ArtifactStatus>('skipped')
        : this.upload(store, 'upload_report', meetingId, REPORT_ARTIFACT, document, REPORT_CONTENT_TYPE),
    ]);

    logger.info({ meetingId, snapshot, report, location: store.location }, 'Meeting archival finished');
    return { snapshot, report };
  }

  /**
   * Presigned URL for the archived report, or null when unavailable
   */
  async getReportUrl(meetingId: string): Promise<string | null> {
    const store = this.store;
    if (!store) {
      return null;
    }

    try {
      return await withTimeout(
        store.getReadUrl(this.artifactKey(meetingId, REPORT_ARTIFACT), this.reportUrlExpirySeconds),
        this.timeoutMs,
        'presign_report_url'
      );
    } catch (error) {
      this.logFailure('presign_report_url', meetingId, error);
      return null;
    }
  }

  /**
   * Probe the remote store once, typically at startup
   */
  async checkConnection(): Promise<boolean> {
    const store = this.store;
    if (!store) {
      return false;
    }

    const controller = new AbortController();
    try {
      await withTimeout(store.check(controller.signal), this.timeoutMs, 'check_connection', () =>
        controller.abort()
      );
      logger.info({ location: store.location }, 'Archive store reachable');
      return true;
    } catch (error) {
      this.logFailure('check_connection', null, error);
      return false;
    }
  }

  private async upload(
    store: BlobStore,
    operation: ArchivalOperation,
    meetingId: string,
    artifact: string,
    body: string,
    contentType: string
  ): Promise<ArtifactStatus> {
    const key = this.artifactKey(meetingId, artifact);
    const controller = new AbortController();
    try {
      await withTimeout(store.put(key, body, contentType, controller.signal), this.timeoutMs, operation, () =>
        controller.abort()
      );
      logger.debug({ meetingId, key }, 'Uploaded archive artifact');
      return 'uploaded';
    } catch (error) {
      this.logFailure(operation, meetingId, error);
      return 'failed';
    }
  }

  private logFailure(operation: ArchivalOperation, meetingId: string | null, cause: unknown): void {
    const err = new ArchivalError(operation, meetingId, cause);
    logger.error({ err, meetingId, operation }, 'Archival operation failed');
  }

  private warnUnavailable(meetingId: string): void {
    if (this.warnedUnavailable) {
      logger.debug({ meetingId }, 'Archival unavailable, skipping upload');
      return;
    }
    this.warnedUnavailable = true;
    logger.warn(
      { meetingId },
      'Archival store not configured (AWS_S3_BUCKET, AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY); closed meetings will not be archived'
    );
  }
}

/**
 * Build the publisher from configuration. Availability is decided here, once.
 */
export function createArchivalPublisher(config: ArchivalConfig | null): ArchivalPublisher {
  if (!config) {
    return new ArchivalPublisher({ store: null });
  }

  return new ArchivalPublisher({
    store: new S3BlobStore(config),
    prefix: config.prefix,
    timeoutMs: config.timeoutMs,
    reportUrlExpirySeconds: config.reportUrlExpirySeconds,
  });
}

import type { Connection, ConnectionFactory } from '../../database/connection.js';
import { withConnection } from '../../database/connection.js';
import { buildDeleteExpiredSql } from '../../database/schema.js';
import { selfLog } from '../../diagnostics/self-log.js';
import { ConfigurationError } from '../../config.js';
import { formatLongDate } from '../writer/log-event.mapper.js';
import type { CleanupResult, RetentionCleanerConfig } from './cleanup.types.js';

/**
 * Periodic purge of expired log records
 *
 * Each pass deletes rows older than `now - expirationMs` in chunks of at
 * most `deleteLimit` rows, one statement per connection, so a large backlog
 * never holds the table lock for one long statement. Passes never overlap:
 * a tick that finds the previous pass still running is skipped.
 */
export class RetentionCleaner {
  private readonly connect: ConnectionFactory;
  private readonly config: RetentionCleanerConfig;
  private readonly now: () => Date;
  private readonly deleteSql: string;

  private startTimer: NodeJS.Timeout | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private isRunning = false;

  constructor(connect: ConnectionFactory, config: RetentionCleanerConfig, now: () => Date = () => new Date()) {
    if (config.timeColumn.trim() === '') {
      throw new ConfigurationError('timeColumn must be a non-empty string');
    }
    if (!Number.isInteger(config.deleteLimit) || config.deleteLimit < 0) {
      throw new ConfigurationError(`deleteLimit must be an integer >= 0, got ${config.deleteLimit}`);
    }
    if (!(config.expirationMs > 0) || !(config.frequencyMs > 0)) {
      throw new ConfigurationError('expirationMs and frequencyMs must be > 0');
    }

    this.connect = connect;
    this.config = config;
    this.now = now;
    this.deleteSql = buildDeleteExpiredSql(config.tableName, config.timeColumn, config.deleteLimit);
  }

  /**
   * Schedule the first pass after the initial delay, then one every
   * `frequencyMs` until stop().
   */
  start(): void {
    if (this.startTimer || this.cleanupTimer) {
      return;
    }

    selfLog(
      'Cleanup',
      `Starting: table=${this.config.tableName} column=${this.config.timeColumn} expiration_ms=${this.config.expirationMs} every_ms=${this.config.frequencyMs} limit=${this.config.deleteLimit}`,
    );

    this.startTimer = setTimeout(() => {
      this.startTimer = null;
      void this.runCleanup();
      this.cleanupTimer = setInterval(() => {
        void this.runCleanup();
      }, this.config.frequencyMs);
      this.cleanupTimer.unref();
    }, this.config.initialDelayMs);
    this.startTimer.unref();
  }

  /**
   * Cancel future passes. A pass already running finishes on its own.
   */
  stop(): void {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  isScheduled(): boolean {
    return this.startTimer !== null || this.cleanupTimer !== null;
  }

  computeCutoff(): string {
    const expiresBefore = new Date(this.now().getTime() - this.config.expirationMs);
    return formatLongDate(expiresBefore, this.config.timeInUtc);
  }

  /**
   * Run one cleanup pass. Resolves to null when a pass is already in flight.
   * Never rejects.
   */
  async runCleanup(): Promise<CleanupResult | null> {
    if (this.isRunning) {
      selfLog('Cleanup', 'Previous cleanup still running, skipping');
      return null;
    }

    this.isRunning = true;
    const startTime = Date.now();
    const result: CleanupResult = {
      cutoff: this.computeCutoff(),
      deleted: 0,
      statements: 0,
      durationMs: 0,
      failed: false,
    };

    try {
      const limit = this.config.deleteLimit;
      let affected: number;
      do {
        affected = withConnection(this.connect, (conn) => this.deleteChunk(conn, result.cutoff));
        result.statements += 1;
        result.deleted += affected;
        if (limit > 0 && affected >= limit) {
          // Let queued batch writes in between chunks
          await new Promise((resolve) => setImmediate(resolve));
        }
      } while (limit > 0 && affected >= limit);

      if (result.deleted > 0) {
        selfLog('Cleanup', `Deleted ${result.deleted} records older than ${result.cutoff} in ${result.statements} statements`);
      }
    } catch (err) {
      result.failed = true;
      selfLog('Cleanup', 'Periodic database cleanup failed', err);
    } finally {
      result.durationMs = Date.now() - startTime;
      this.isRunning = false;
    }

    return result;
  }

  private deleteChunk(conn: Connection, cutoff: string): number {
    const info = conn.prepare(this.deleteSql).run({ expiration: cutoff });
    return info.changes;
  }
}

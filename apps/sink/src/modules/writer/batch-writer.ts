import type { LogEvent } from '../../shared/log-event.js';
import type { ConnectionFactory, Connection } from '../../database/connection.js';
import { buildInsertSql } from '../../database/schema.js';
import { selfLog } from '../../diagnostics/self-log.js';
import type { BatchDelivery } from '../queue/queue.types.js';
import { hasValidTimestamp, toLogRow } from './log-event.mapper.js';

export interface BatchWriterConfig {
  tableName: string;
  storeTimestampInUtc: boolean;
}

/**
 * Persists whole batches of log events.
 *
 * A batch is written inside one transaction on a connection owned by the
 * call: either every row commits or none does. Failures are reported on the
 * side channel and surface only as a false return; retrying is the caller's
 * decision.
 */
export class BatchWriter implements BatchDelivery {
  private readonly connect: ConnectionFactory;
  private readonly config: BatchWriterConfig;
  private readonly insertSql: string;

  private totalBatches = 0;
  private totalRows = 0;
  private totalFailures = 0;

  constructor(connect: ConnectionFactory, config: BatchWriterConfig) {
    this.connect = connect;
    this.config = config;
    this.insertSql = buildInsertSql(config.tableName);
  }

  onBatchReady(batch: readonly LogEvent[]): boolean {
    return this.persist(batch);
  }

  persist(batch: readonly LogEvent[]): boolean {
    if (batch.length === 0) {
      return true;
    }
    const invalid = batch.findIndex((event) => !hasValidTimestamp(event));
    if (invalid !== -1) {
      this.totalFailures += 1;
      selfLog('BatchWriter', `Rejected batch of ${batch.length} events: event ${invalid} has an invalid timestamp`);
      return false;
    }

    let conn: Connection | null = null;
    try {
      conn = this.connect();
      const insert = conn.prepare(this.insertSql);
      const utc = this.config.storeTimestampInUtc;
      const writeBatch = conn.transaction((events: readonly LogEvent[]) => {
        for (const event of events) {
          insert.run(toLogRow(event, utc));
        }
      });
      writeBatch(batch);

      this.totalBatches += 1;
      this.totalRows += batch.length;
      return true;
    } catch (err) {
      this.totalFailures += 1;
      selfLog('BatchWriter', `Failed to persist batch of ${batch.length} events into ${this.config.tableName}`, err);
      return false;
    } finally {
      if (conn) {
        closeQuietly(conn);
      }
    }
  }

  getStats(): { batches: number; rows: number; failures: number } {
    return {
      batches: this.totalBatches,
      rows: this.totalRows,
      failures: this.totalFailures,
    };
  }
}

function closeQuietly(conn: Connection): void {
  try {
    conn.close();
  } catch (err) {
    selfLog('BatchWriter', 'Failed to close connection', err);
  }
}

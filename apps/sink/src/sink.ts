import type { LogEvent } from './shared/log-event.js';
import { createConnectionFactory, type ConnectionFactory } from './database/connection.js';
import { bootstrapLogTable, type BootstrapResult } from './database/schema.js';
import { selfLog } from './diagnostics/self-log.js';
import { isRetentionEnabled, validateSinkConfig, type SinkConfig } from './config.js';
import { BatchWriter } from './modules/writer/batch-writer.js';
import { hasValidTimestamp } from './modules/writer/log-event.mapper.js';
import { BatchQueue } from './modules/queue/batch-queue.js';
import type { BatchDelivery, BatchQueueStats } from './modules/queue/queue.types.js';
import { RetentionCleaner } from './modules/cleanup/cleanup.service.js';

export interface SinkDependencies {
  connect?: ConnectionFactory;
  // Replaces the batch writer as the queue's delivery target
  delivery?: BatchDelivery;
  now?: () => Date;
}

/**
 * Log sink backed by a SQLite table.
 *
 * emit() buffers; the queue hands full or timed batches to the BatchWriter.
 * When retention is configured a RetentionCleaner purges old rows on its own
 * timer against the same table.
 */
export class DatabaseLogSink {
  readonly config: SinkConfig;
  readonly bootstrap: BootstrapResult;
  readonly writer: BatchWriter;
  readonly cleaner: RetentionCleaner | null;

  private readonly queue: BatchQueue;
  private closed = false;
  private closing: Promise<void> | null = null;

  constructor(config: SinkConfig, deps: SinkDependencies = {}) {
    validateSinkConfig(config);
    this.config = config;

    const connect = deps.connect ?? createConnectionFactory({
      databasePath: config.databasePath,
      busyTimeoutMs: config.busyTimeoutMs,
    });

    this.bootstrap = bootstrapLogTable(connect, config.tableName, config.timeColumn);

    this.writer = new BatchWriter(connect, {
      tableName: config.tableName,
      storeTimestampInUtc: config.storeTimestampInUtc,
    });

    this.queue = new BatchQueue(deps.delivery ?? this.writer, {
      batchSize: config.batchSize,
      flushIntervalMs: config.flushIntervalMs,
      maxBufferSize: config.maxBufferSize,
      retryBaseDelayMs: config.retryBaseDelayMs,
      retryMaxDelayMs: config.retryMaxDelayMs,
    });
    this.queue.start();

    if (isRetentionEnabled(config)) {
      this.cleaner = new RetentionCleaner(
        connect,
        {
          tableName: config.tableName,
          timeColumn: config.timeColumn,
          expirationMs: config.retentionMs,
          frequencyMs: config.cleanupFrequencyMs,
          deleteLimit: config.deleteLimit,
          timeInUtc: config.storeTimestampInUtc,
          initialDelayMs: config.cleanupInitialDelayMs,
        },
        deps.now,
      );
      this.cleaner.start();
    } else {
      this.cleaner = null;
    }
  }

  emit(event: LogEvent): void {
    if (this.closed) {
      selfLog('Sink', 'Event emitted after close, ignored');
      return;
    }
    if (!hasValidTimestamp(event)) {
      selfLog('Sink', 'Event with an invalid timestamp ignored');
      return;
    }
    this.queue.submit(event);
  }

  flush(): Promise<void> {
    return this.queue.flush();
  }

  getStats(): BatchQueueStats {
    return this.queue.getStats();
  }

  /**
   * Stop retention, deliver what is buffered. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      this.cleaner?.stop();
      this.closing = this.queue.stop();
    }
    return this.closing;
  }
}

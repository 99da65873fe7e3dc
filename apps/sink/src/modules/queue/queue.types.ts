import type { LogEvent } from '../../shared/log-event.js';

/**
 * Receiver of ready batches. Returns false (or rejects) when the batch was
 * not persisted; the queue keeps it and retries later.
 */
export interface BatchDelivery {
  onBatchReady(batch: readonly LogEvent[]): boolean | Promise<boolean>;
}

export interface BatchQueueConfig {
  // Events per delivered batch; reaching it triggers a flush
  batchSize: number;

  // Periodic flush interval in milliseconds
  flushIntervalMs: number;

  // Oldest events are dropped past this many buffered events
  maxBufferSize: number;

  // Redelivery backoff after a failed batch
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export const DEFAULT_QUEUE_CONFIG: BatchQueueConfig = {
  batchSize: 100,
  flushIntervalMs: 2000,
  maxBufferSize: 10000,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 60000,
};

export interface BatchQueueStats {
  buffered: number;
  delivered: number;
  failedBatches: number;
  dropped: number;
}

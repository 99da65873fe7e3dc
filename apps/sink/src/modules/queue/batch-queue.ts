import type { LogEvent } from '../../shared/log-event.js';
import { calculateBackoffDelay } from '../../shared/utils/backoff.js';
import { selfLog } from '../../diagnostics/self-log.js';
import {
  DEFAULT_QUEUE_CONFIG,
  type BatchDelivery,
  type BatchQueueConfig,
  type BatchQueueStats,
} from './queue.types.js';

/**
 * In-memory event buffer that hands fixed-size batches to a BatchDelivery.
 *
 * Batches go out in arrival order, one at a time. A batch the delivery
 * rejects stays at the head of the buffer and is retried after an
 * exponential backoff; nothing behind it is delivered first.
 */
export class BatchQueue {
  private readonly delivery: BatchDelivery;
  private readonly config: BatchQueueConfig;

  private buffer: LogEvent[] = [];

  // Flush management
  private flushTimer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private consecutiveFailures = 0;
  private retryNotBefore = 0;

  // Metrics
  private totalDelivered = 0;
  private totalFailedBatches = 0;
  private totalDropped = 0;

  constructor(delivery: BatchDelivery, config: Partial<BatchQueueConfig> = {}) {
    this.delivery = delivery;
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...config };
  }

  /**
   * Add an event. Returns immediately; a full batch triggers a flush.
   */
  submit(event: LogEvent): void {
    this.buffer.push(event);

    const overflow = this.buffer.length - this.config.maxBufferSize;
    if (overflow > 0) {
      this.buffer.splice(0, overflow);
      this.totalDropped += overflow;
      selfLog('BatchQueue', `Buffer full (${this.config.maxBufferSize}), dropped ${overflow} oldest events`);
    }

    if (this.buffer.length >= this.config.batchSize) {
      void this.flush();
    }
  }

  /**
   * Deliver buffered events until the buffer is empty or a batch fails.
   * Concurrent callers share the flush already in progress.
   */
  flush(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.drain().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  start(): void {
    if (this.flushTimer) {
      return;
    }
    this.flushTimer = setInterval(() => {
      void this.flush();
    }, this.config.flushIntervalMs);
    this.flushTimer.unref();
  }

  /**
   * Stop the flush timer and make a final delivery attempt, ignoring any
   * pending backoff.
   */
  async stop(): Promise<void> {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    this.retryNotBefore = 0;
    await this.flush();
  }

  size(): number {
    return this.buffer.length;
  }

  getStats(): BatchQueueStats {
    return {
      buffered: this.buffer.length,
      delivered: this.totalDelivered,
      failedBatches: this.totalFailedBatches,
      dropped: this.totalDropped,
    };
  }

  private async drain(): Promise<void> {
    while (this.buffer.length > 0) {
      if (Date.now() < this.retryNotBefore) {
        return;
      }

      const batch = this.buffer.slice(0, this.config.batchSize);
      const droppedBefore = this.totalDropped;
      const ok = await this.deliver(batch);
      if (!ok) {
        this.totalFailedBatches += 1;
        this.consecutiveFailures += 1;
        const delay = calculateBackoffDelay(
          this.consecutiveFailures,
          this.config.retryBaseDelayMs,
          this.config.retryMaxDelayMs,
        );
        this.retryNotBefore = Date.now() + delay;
        selfLog('BatchQueue', `Batch of ${batch.length} events not delivered, retry in ${delay}ms`);
        return;
      }

      // Overflow drops during delivery already removed part of the batch
      const droppedMeanwhile = this.totalDropped - droppedBefore;
      this.buffer.splice(0, Math.max(0, batch.length - droppedMeanwhile));
      this.totalDelivered += batch.length;
      this.consecutiveFailures = 0;
      this.retryNotBefore = 0;
    }
  }

  private async deliver(batch: readonly LogEvent[]): Promise<boolean> {
    try {
      return await this.delivery.onBatchReady(batch);
    } catch (err) {
      selfLog('BatchQueue', 'Batch delivery threw', err);
      return false;
    }
  }
}

import path from 'path';
import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  DEFAULT_SINK_CONFIG,
  formatSinkConfigForLog,
  isRetentionEnabled,
  loadSinkConfig,
} from './config.js';

describe('config', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadSinkConfig({});
    expect(config).toEqual(DEFAULT_SINK_CONFIG);
    expect(config.databasePath).toBe(path.join(process.cwd(), 'logs.db'));
    expect(isRetentionEnabled(config)).toBe(false);
  });

  it('should read every variable', () => {
    const config = loadSinkConfig({
      TABLELOG_DB_PATH: '/var/lib/app/logs.db',
      TABLELOG_TABLE: 'AppLogs',
      TABLELOG_TIME_COLUMN: '_ts',
      TABLELOG_STORE_UTC: '0',
      TABLELOG_BATCH_SIZE: '50',
      TABLELOG_FLUSH_INTERVAL_MS: '500',
      TABLELOG_MAX_BUFFER_SIZE: '2000',
      TABLELOG_RETRY_BASE_DELAY_MS: '250',
      TABLELOG_RETRY_MAX_DELAY_MS: '8000',
      TABLELOG_RETENTION_MINUTES: '60',
      TABLELOG_CLEANUP_INTERVAL_MINUTES: '0.5',
      TABLELOG_DELETE_LIMIT: '0',
      TABLELOG_CLEANUP_INITIAL_DELAY_MS: '0',
      TABLELOG_BUSY_TIMEOUT_MS: '100',
    });

    expect(config).toEqual({
      databasePath: '/var/lib/app/logs.db',
      tableName: 'AppLogs',
      timeColumn: '_ts',
      storeTimestampInUtc: false,
      batchSize: 50,
      flushIntervalMs: 500,
      maxBufferSize: 2000,
      retryBaseDelayMs: 250,
      retryMaxDelayMs: 8000,
      retentionMs: 3600000,
      cleanupFrequencyMs: 30000,
      deleteLimit: 0,
      cleanupInitialDelayMs: 0,
      busyTimeoutMs: 100,
    });
    expect(isRetentionEnabled(config)).toBe(true);
  });

  it('should fall back on malformed positive integers', () => {
    const config = loadSinkConfig({ TABLELOG_BATCH_SIZE: 'lots', TABLELOG_FLUSH_INTERVAL_MS: '-3' });
    expect(config.batchSize).toBe(100);
    expect(config.flushIntervalMs).toBe(2000);
  });

  it('should disable retention for non-positive windows', () => {
    const config = loadSinkConfig({ TABLELOG_RETENTION_MINUTES: '-1', TABLELOG_CLEANUP_INTERVAL_MINUTES: '10' });
    expect(config.retentionMs).toBeNull();
    expect(isRetentionEnabled(config)).toBe(false);
  });

  it('should reject a negative or malformed delete limit', () => {
    expect(() => loadSinkConfig({ TABLELOG_DELETE_LIMIT: '-5' })).toThrow(
      new ConfigurationError('TABLELOG_DELETE_LIMIT must be >= 0, got -5'),
    );
    expect(() => loadSinkConfig({ TABLELOG_DELETE_LIMIT: '10k' })).toThrow(ConfigurationError);
  });

  it('should reject a blank time column', () => {
    expect(() => loadSinkConfig({ TABLELOG_TIME_COLUMN: '' })).toThrow('timeColumn must be a non-empty string');
  });

  it('should format a one-line summary', () => {
    const config = loadSinkConfig({
      TABLELOG_DB_PATH: '/tmp/x.db',
      TABLELOG_RETENTION_MINUTES: '1',
      TABLELOG_CLEANUP_INTERVAL_MINUTES: '1',
    });
    expect(formatSinkConfigForLog(config)).toBe(
      'db=/tmp/x.db table=Logs time_column=LongDate utc=1 batch_size=100 flush_ms=2000 retention_ms=60000 cleanup_every_ms=60000 delete_limit=10000',
    );
    expect(formatSinkConfigForLog(loadSinkConfig({ TABLELOG_DB_PATH: '/tmp/x.db' }))).toBe(
      'db=/tmp/x.db table=Logs time_column=LongDate utc=1 batch_size=100 flush_ms=2000 retention=off',
    );
  });
});

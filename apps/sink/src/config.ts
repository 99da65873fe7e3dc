import path from 'path';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface SinkConfig {
  databasePath: string;
  tableName: string;
  // Column compared against the cutoff when purging
  timeColumn: string;
  storeTimestampInUtc: boolean;
  batchSize: number;
  flushIntervalMs: number;
  maxBufferSize: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  // null disables retention
  retentionMs: number | null;
  cleanupFrequencyMs: number | null;
  // 0 runs one empty delete per pass
  deleteLimit: number;
  cleanupInitialDelayMs: number;
  busyTimeoutMs: number;
}

export const DEFAULT_SINK_CONFIG: SinkConfig = {
  databasePath: path.join(process.cwd(), 'logs.db'),
  tableName: 'Logs',
  timeColumn: 'LongDate',
  storeTimestampInUtc: true,
  batchSize: 100,
  flushIntervalMs: 2000,
  maxBufferSize: 10000,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 60000,
  retentionMs: null,
  cleanupFrequencyMs: null,
  deleteLimit: 10000,
  cleanupInitialDelayMs: 2000,
  busyTimeoutMs: 5000,
};

const MINUTE_MS = 60 * 1000;

export function loadSinkConfig(env: NodeJS.ProcessEnv = process.env): SinkConfig {
  const config: SinkConfig = {
    databasePath: env.TABLELOG_DB_PATH || DEFAULT_SINK_CONFIG.databasePath,
    tableName: env.TABLELOG_TABLE ?? DEFAULT_SINK_CONFIG.tableName,
    timeColumn: env.TABLELOG_TIME_COLUMN ?? DEFAULT_SINK_CONFIG.timeColumn,
    storeTimestampInUtc: env.TABLELOG_STORE_UTC === undefined
      ? DEFAULT_SINK_CONFIG.storeTimestampInUtc
      : env.TABLELOG_STORE_UTC === '1',
    batchSize: parsePositiveInt(env.TABLELOG_BATCH_SIZE, DEFAULT_SINK_CONFIG.batchSize),
    flushIntervalMs: parsePositiveInt(env.TABLELOG_FLUSH_INTERVAL_MS, DEFAULT_SINK_CONFIG.flushIntervalMs),
    maxBufferSize: parsePositiveInt(env.TABLELOG_MAX_BUFFER_SIZE, DEFAULT_SINK_CONFIG.maxBufferSize),
    retryBaseDelayMs: parsePositiveInt(env.TABLELOG_RETRY_BASE_DELAY_MS, DEFAULT_SINK_CONFIG.retryBaseDelayMs),
    retryMaxDelayMs: parsePositiveInt(env.TABLELOG_RETRY_MAX_DELAY_MS, DEFAULT_SINK_CONFIG.retryMaxDelayMs),
    retentionMs: parseOptionalMinutes(env.TABLELOG_RETENTION_MINUTES),
    cleanupFrequencyMs: parseOptionalMinutes(env.TABLELOG_CLEANUP_INTERVAL_MINUTES),
    deleteLimit: parseNonNegativeInt(env.TABLELOG_DELETE_LIMIT, DEFAULT_SINK_CONFIG.deleteLimit, 'TABLELOG_DELETE_LIMIT'),
    cleanupInitialDelayMs: parseNonNegativeInt(
      env.TABLELOG_CLEANUP_INITIAL_DELAY_MS,
      DEFAULT_SINK_CONFIG.cleanupInitialDelayMs,
      'TABLELOG_CLEANUP_INITIAL_DELAY_MS',
    ),
    busyTimeoutMs: parsePositiveInt(env.TABLELOG_BUSY_TIMEOUT_MS, DEFAULT_SINK_CONFIG.busyTimeoutMs),
  };
  validateSinkConfig(config);
  return config;
}

/**
 * Reject settings the sink cannot start with. Called by loadSinkConfig and
 * again by the sink for configs built in code.
 */
export function validateSinkConfig(config: SinkConfig): void {
  if (config.tableName.trim() === '') {
    throw new ConfigurationError('tableName must be a non-empty string');
  }
  if (config.timeColumn.trim() === '') {
    throw new ConfigurationError('timeColumn must be a non-empty string');
  }
  if (!Number.isInteger(config.deleteLimit) || config.deleteLimit < 0) {
    throw new ConfigurationError(`deleteLimit must be an integer >= 0, got ${config.deleteLimit}`);
  }
  if (!Number.isInteger(config.batchSize) || config.batchSize <= 0) {
    throw new ConfigurationError(`batchSize must be an integer > 0, got ${config.batchSize}`);
  }
}

export type RetentionSinkConfig = SinkConfig & { retentionMs: number; cleanupFrequencyMs: number };

export function isRetentionEnabled(config: SinkConfig): config is RetentionSinkConfig {
  return (
    config.retentionMs !== null &&
    config.retentionMs > 0 &&
    config.cleanupFrequencyMs !== null &&
    config.cleanupFrequencyMs > 0
  );
}

export function formatSinkConfigForLog(config: SinkConfig): string {
  const retention = isRetentionEnabled(config)
    ? `retention_ms=${config.retentionMs} cleanup_every_ms=${config.cleanupFrequencyMs} delete_limit=${config.deleteLimit}`
    : 'retention=off';
  return `db=${config.databasePath} table=${config.tableName} time_column=${config.timeColumn} utc=${config.storeTimestampInUtc ? '1' : '0'} batch_size=${config.batchSize} flush_ms=${config.flushIntervalMs} ${retention}`;
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(value || '', 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

function parseOptionalMinutes(value: string | undefined): number | null {
  const parsed = Number.parseFloat(value || '');
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.round(parsed * MINUTE_MS);
}

function parseNonNegativeInt(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigurationError(`${name} must be an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < 0) {
    throw new ConfigurationError(`${name} must be >= 0, got ${parsed}`);
  }
  return parsed;
}

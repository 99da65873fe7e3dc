export {
  LOG_EVENT_LEVELS,
  isLogEventLevel,
  isPropertyMap,
  isPropertyValue,
  isScalarValue,
  parseLogEvent,
} from './shared/log-event.js';
export type {
  LogEvent,
  LogEventLevel,
  LogEventProperties,
  LogEventPropertyValue,
  ParseResult,
  ScalarValue,
} from './shared/log-event.js';

export {
  ConfigurationError,
  DEFAULT_SINK_CONFIG,
  formatSinkConfigForLog,
  isRetentionEnabled,
  loadSinkConfig,
  validateSinkConfig,
} from './config.js';
export type { RetentionSinkConfig, SinkConfig } from './config.js';

export { disableSelfLog, enableSelfLog, selfLog } from './diagnostics/self-log.js';
export type { SelfLogOutput } from './diagnostics/self-log.js';

export { createConnectionFactory, withConnection } from './database/connection.js';
export type { Connection, ConnectionFactory, ConnectionOptions } from './database/connection.js';
export { bootstrapLogTable, ensureLogTable } from './database/schema.js';
export type { BootstrapResult } from './database/schema.js';

export { BatchWriter } from './modules/writer/batch-writer.js';
export type { BatchWriterConfig } from './modules/writer/batch-writer.js';
export {
  formatLongDate,
  formatTimestamp,
  hasValidTimestamp,
  resolveLoggerName,
  toLevelCode,
  toLogRow,
} from './modules/writer/log-event.mapper.js';
export type { LevelCode, LogRow } from './modules/writer/log-event.mapper.js';

export { RetentionCleaner } from './modules/cleanup/cleanup.service.js';
export type { CleanupResult, RetentionCleanerConfig } from './modules/cleanup/cleanup.types.js';

export { BatchQueue } from './modules/queue/batch-queue.js';
export type { BatchDelivery, BatchQueueConfig, BatchQueueStats } from './modules/queue/queue.types.js';

export { DatabaseLogSink } from './sink.js';
export type { SinkDependencies } from './sink.js';

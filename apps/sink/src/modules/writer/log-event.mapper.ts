/**
 * LogEvent -> table row mapping
 *
 * Pure functions only; the batch writer binds their output to the prepared
 * insert statement.
 */
import {
  isScalarValue,
  type LogEvent,
  type LogEventProperties,
  type ScalarValue,
} from '../../shared/log-event.js';

export type LevelCode = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

const LEVEL_CODES: Record<string, LevelCode> = {
  Verbose: 'TRACE',
  Debug: 'DEBUG',
  Information: 'INFO',
  Warning: 'WARN',
  Error: 'ERROR',
  Fatal: 'FATAL',
};

// Upstream tagging emits the marker under a quoted key
export const LOG_TAG_PROPERTY = '"Message"';
export const LOG_TAG_MARKER = 'logTag';
export const SOURCE_CONTEXT_PROPERTY = 'SourceContext';
export const REQUEST_ID_PROPERTY = 'RequestId';

export interface LogRow {
  ts: string;
  level: LevelCode;
  msg: string;
  longDate: string;
  logger: string;
  traceIdentifier: string;
  ex: string;
  prop: string;
}

export function toLevelCode(level: string): LevelCode {
  return Object.hasOwn(LEVEL_CODES, level) ? LEVEL_CODES[level] : 'INFO';
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

interface DateParts {
  year: number;
  month: number;
  day: number;
  hours: number;
  minutes: number;
  seconds: number;
  millis: number;
  offsetMinutes: number;
}

function dateParts(date: Date, utc: boolean): DateParts {
  if (utc) {
    return {
      year: date.getUTCFullYear(),
      month: date.getUTCMonth() + 1,
      day: date.getUTCDate(),
      hours: date.getUTCHours(),
      minutes: date.getUTCMinutes(),
      seconds: date.getUTCSeconds(),
      millis: date.getUTCMilliseconds(),
      offsetMinutes: 0,
    };
  }
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hours: date.getHours(),
    minutes: date.getMinutes(),
    seconds: date.getSeconds(),
    millis: date.getMilliseconds(),
    offsetMinutes: -date.getTimezoneOffset(),
  };
}

function formatSeconds(parts: DateParts): string {
  return `${parts.year}-${pad(parts.month)}-${pad(parts.day)} ${pad(parts.hours)}:${pad(parts.minutes)}:${pad(parts.seconds)}`;
}

export function hasValidTimestamp(event: LogEvent): boolean {
  return event.timestamp instanceof Date && !Number.isNaN(event.timestamp.getTime());
}

/**
 * `YYYY-MM-DD HH:mm:ss.SSS+HH:MM` in UTC or local time.
 */
export function formatTimestamp(date: Date, utc: boolean): string {
  const parts = dateParts(date, utc);
  const sign = parts.offsetMinutes < 0 ? '-' : '+';
  const offset = Math.abs(parts.offsetMinutes);
  return `${formatSeconds(parts)}.${pad(parts.millis, 3)}${sign}${pad(Math.floor(offset / 60))}:${pad(offset % 60)}`;
}

/**
 * `YYYY-MM-DD HH:mm:ss`, the sortable form used by the LongDate column and
 * by retention cutoffs.
 */
export function formatLongDate(date: Date, utc: boolean): string {
  return formatSeconds(dateParts(date, utc));
}

export function scalarToString(value: ScalarValue): string {
  return value === null ? '' : String(value);
}

function scalarProperty(properties: LogEventProperties, name: string): string | undefined {
  const value = properties[name];
  return isScalarValue(value) ? scalarToString(value) : undefined;
}

/**
 * Strip the tag syntax from a marker value: `{logTag=Billing}` -> `Billing`.
 */
export function extractLogTag(value: string): string {
  return value
    .replaceAll('=', '')
    .replaceAll('{', '')
    .replaceAll('}', '')
    .replaceAll(LOG_TAG_MARKER, '')
    .trim();
}

/**
 * Logger name: a logTag marker wins over SourceContext.
 */
export function resolveLoggerName(properties: LogEventProperties): string {
  const tagged = scalarProperty(properties, LOG_TAG_PROPERTY);
  if (tagged !== undefined && tagged.includes(LOG_TAG_MARKER)) {
    return extractLogTag(tagged);
  }
  return scalarProperty(properties, SOURCE_CONTEXT_PROPERTY) ?? '';
}

export function resolveTraceIdentifier(properties: LogEventProperties): string {
  return scalarProperty(properties, REQUEST_ID_PROPERTY) ?? '';
}

function renderError(error: Error): string {
  return error.stack ?? `${error.name}: ${error.message}`;
}

/**
 * Full text of an exception: its stack, then one `Caused by:` block per
 * entry of the `cause` chain.
 */
export function renderException(exception: LogEvent['exception']): string {
  if (exception === undefined) return '';
  if (typeof exception === 'string') return exception;

  const blocks = [renderError(exception)];
  const seen = new Set<unknown>([exception]);
  let cause = exception.cause;
  while (cause !== undefined && !seen.has(cause)) {
    seen.add(cause);
    if (cause instanceof Error) {
      blocks.push(`Caused by: ${renderError(cause)}`);
      cause = cause.cause;
    } else {
      blocks.push(`Caused by: ${String(cause)}`);
      break;
    }
  }
  return blocks.join('\n');
}

export function renderProperties(properties: LogEventProperties): string {
  return Object.keys(properties).length > 0 ? JSON.stringify(properties) : '';
}

export function toLogRow(event: LogEvent, utc: boolean): LogRow {
  return {
    ts: formatTimestamp(event.timestamp, utc),
    level: toLevelCode(event.level),
    msg: event.message,
    longDate: formatLongDate(event.timestamp, utc),
    logger: resolveLoggerName(event.properties),
    traceIdentifier: resolveTraceIdentifier(event.properties),
    ex: renderException(event.exception),
    prop: renderProperties(event.properties),
  };
}

// Log event model shared by producers and the sink

export const LOG_EVENT_LEVELS = [
  'Verbose',
  'Debug',
  'Information',
  'Warning',
  'Error',
  'Fatal',
] as const;

export type LogEventLevel = (typeof LOG_EVENT_LEVELS)[number];

export type ScalarValue = string | number | boolean | null;

export type LogEventPropertyValue =
  | ScalarValue
  | LogEventPropertyValue[]
  | { [key: string]: LogEventPropertyValue };

export type LogEventProperties = Record<string, LogEventPropertyValue>;

export interface LogEvent {
  timestamp: Date;
  level: LogEventLevel;
  // Already rendered; template expansion happens upstream
  message: string;
  properties: LogEventProperties;
  exception?: Error | string;
}

export function isLogEventLevel(value: unknown): value is LogEventLevel {
  return typeof value === 'string' && (LOG_EVENT_LEVELS as readonly string[]).includes(value);
}

export function isScalarValue(value: LogEventPropertyValue | undefined): value is ScalarValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

export function isPropertyValue(value: unknown): value is LogEventPropertyValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isPropertyValue);
      }
      return Object.values(value).every(isPropertyValue);
    default:
      return false;
  }
}

export type ParseResult =
  | { ok: true; event: LogEvent }
  | { ok: false; error: string };

/**
 * Parse one NDJSON line into a LogEvent.
 *
 * Unknown levels fall back to Information so a producer on a newer level
 * set never loses records; a missing or invalid timestamp is rejected.
 */
export function parseLogEvent(line: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err) {
    return { ok: false, error: `invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  if (!isRecord(raw)) {
    return { ok: false, error: 'event must be a JSON object' };
  }

  const timestamp = parseTimestamp(raw.timestamp);
  if (!timestamp) {
    return { ok: false, error: 'timestamp must be an ISO date string or epoch milliseconds' };
  }

  const { level, message = '', exception, properties = {} } = raw;
  if (typeof message !== 'string') {
    return { ok: false, error: 'message must be a string' };
  }
  if (!isPropertyMap(properties)) {
    return { ok: false, error: 'properties must be an object of JSON values' };
  }
  if (exception !== undefined && typeof exception !== 'string') {
    return { ok: false, error: 'exception must be a string' };
  }

  const event: LogEvent = {
    timestamp,
    level: isLogEventLevel(level) ? level : 'Information',
    message,
    properties,
  };
  if (exception !== undefined) {
    event.exception = exception;
  }
  return { ok: true, event };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isPropertyMap(value: unknown): value is LogEventProperties {
  return isRecord(value) && Object.values(value).every(isPropertyValue);
}

function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

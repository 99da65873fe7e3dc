/**
 * Log table schema
 *
 * Column names and types are part of the storage contract: readers of the
 * table (dashboards, ad-hoc queries) depend on them, so they are fixed and
 * only the table name and the retention time column are configurable.
 */
import { withConnection, type Connection, type ConnectionFactory } from './connection.js';
import { quoteIdentifier } from './identifiers.js';
import { selfLog } from '../diagnostics/self-log.js';

export const LOG_COLUMNS = [
  'Timestamp',
  'Level',
  'Message',
  'LongDate',
  'Logger',
  'TraceIdentifier',
  'Exception',
  'Properties',
] as const;

export type LogColumn = (typeof LOG_COLUMNS)[number];

export function buildCreateTableSql(tableName: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${quoteIdentifier(tableName)} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      Timestamp VARCHAR(100),
      Level VARCHAR(15),
      Message TEXT,
      LongDate DATETIME DEFAULT NULL,
      Logger VARCHAR(1024) DEFAULT NULL,
      TraceIdentifier VARCHAR(128) DEFAULT NULL,
      Exception TEXT,
      Properties TEXT,
      _ts TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    );
  `;
}

/**
 * Index statements for the log table. LongDate is always indexed; the
 * retention column gets its own index when it is a different column.
 */
export function buildIndexStatements(tableName: string, timeColumn: string): string[] {
  const table = quoteIdentifier(tableName);
  const statements = [
    `CREATE UNIQUE INDEX IF NOT EXISTS ${quoteIdentifier(`${tableName}_id`)} ON ${table} (id)`,
  ];
  const timeColumns = new Set(['LongDate', timeColumn]);
  for (const column of timeColumns) {
    statements.push(
      `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`${tableName}_${column}`)} ON ${table} (${quoteIdentifier(column)})`,
    );
  }
  return statements;
}

export function buildInsertSql(tableName: string): string {
  return `
    INSERT INTO ${quoteIdentifier(tableName)} (${LOG_COLUMNS.join(', ')})
    VALUES (@ts, @level, @msg, @longDate, @logger, @traceIdentifier, @ex, @prop)
  `;
}

/**
 * Bounded delete of expired rows. SQLite builds without
 * SQLITE_ENABLE_UPDATE_DELETE_LIMIT reject `DELETE ... LIMIT`, so the cap
 * is applied through a rowid subquery. `LIMIT 0` matches nothing.
 */
export function buildDeleteExpiredSql(tableName: string, timeColumn: string, limit: number): string {
  const table = quoteIdentifier(tableName);
  const column = quoteIdentifier(timeColumn);
  return `DELETE FROM ${table} WHERE rowid IN (SELECT rowid FROM ${table} WHERE ${column} < @expiration LIMIT ${limit})`;
}

export interface BootstrapResult {
  tableReady: boolean;
  failedIndexes: string[];
}

/**
 * Create the log table if it does not exist, then its indexes.
 * Index failures are reported and skipped; the table is usable without them,
 * only slower to purge.
 */
export function ensureLogTable(conn: Connection, tableName: string, timeColumn: string): string[] {
  conn.pragma('journal_mode = WAL');
  conn.exec(buildCreateTableSql(tableName));

  const failedIndexes: string[] = [];
  for (const statement of buildIndexStatements(tableName, timeColumn)) {
    try {
      conn.exec(statement);
    } catch (err) {
      failedIndexes.push(statement);
      selfLog('Schema', `Index creation failed for ${tableName}`, err);
    }
  }

  return failedIndexes;
}

/**
 * Startup bootstrap on its own connection. Never throws: a store that is
 * unreachable at startup is reported, and batches fail until it comes back.
 */
export function bootstrapLogTable(connect: ConnectionFactory, tableName: string, timeColumn: string): BootstrapResult {
  try {
    const failedIndexes = withConnection(connect, (conn) => ensureLogTable(conn, tableName, timeColumn));
    return { tableReady: true, failedIndexes };
  } catch (err) {
    selfLog('Schema', `Table bootstrap failed for ${tableName}`, err);
    return { tableReady: false, failedIndexes: [] };
  }
}

import Database from 'better-sqlite3';
import path from 'path';

export type Connection = Database.Database;

/**
 * Opens a fresh connection. Every store operation owns the connection it
 * gets from here and closes it before returning.
 */
export type ConnectionFactory = () => Connection;

export interface ConnectionOptions {
  databasePath: string;
  busyTimeoutMs: number;
}

export function createConnectionFactory(options: ConnectionOptions): ConnectionFactory {
  const filename = path.resolve(options.databasePath);
  return () => new Database(filename, { timeout: options.busyTimeoutMs });
}

/**
 * Run `work` on a new connection and close it on every exit path.
 */
export function withConnection<T>(connect: ConnectionFactory, work: (conn: Connection) => T): T {
  const conn = connect();
  try {
    return work(conn);
  } finally {
    conn.close();
  }
}

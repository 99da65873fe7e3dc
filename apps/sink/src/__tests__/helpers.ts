import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import os from 'os';
import { createConnectionFactory, type Connection, type ConnectionFactory } from '../database/connection.js';
import { ensureLogTable } from '../database/schema.js';
import type { LogEvent } from '../shared/log-event.js';

export const TEST_TABLE = 'Logs';

export interface TestDatabase {
  dbPath: string;
  connect: ConnectionFactory;
  // Long-lived connection for assertions
  db: Connection;
  cleanup: () => void;
}

/**
 * Create a throw-away SQLite file with the log table in place.
 * Each operation under test opens its own connection to the same file.
 */
export function createTestDatabase(tableName = TEST_TABLE): TestDatabase {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'tablelog-test-'));
  const dbPath = path.join(tmpDir, 'test.db');
  const connect = createConnectionFactory({ databasePath: dbPath, busyTimeoutMs: 1000 });
  const db = new Database(dbPath);
  ensureLogTable(db, tableName, 'LongDate');
  return {
    dbPath,
    connect,
    db,
    cleanup: () => {
      db.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    },
  };
}

export function makeEvent(overrides: Partial<LogEvent> = {}): LogEvent {
  return {
    timestamp: new Date('2024-03-05T06:07:08.009Z'),
    level: 'Information',
    message: 'hello',
    properties: {},
    ...overrides,
  };
}

export interface StoredRow {
  id: number;
  Timestamp: string;
  Level: string;
  Message: string;
  LongDate: string;
  Logger: string;
  TraceIdentifier: string;
  Exception: string;
  Properties: string;
}

export function readRows(db: Connection, tableName = TEST_TABLE): StoredRow[] {
  return db.prepare<[], StoredRow>(`SELECT * FROM "${tableName}" ORDER BY id`).all();
}

export function countRows(db: Connection, tableName = TEST_TABLE): number {
  const row = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM "${tableName}"`).get();
  return row?.count ?? 0;
}

/**
 * Insert a bare row with only LongDate set, for retention tests.
 */
export function insertRowAt(db: Connection, longDate: string, tableName = TEST_TABLE): void {
  db.prepare(`INSERT INTO "${tableName}" (Level, Message, LongDate) VALUES ('INFO', 'seed', ?)`).run(longDate);
}

import Database from 'better-sqlite3';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDatabase, TEST_TABLE, type TestDatabase } from '../__tests__/helpers.js';
import { enableSelfLog } from '../diagnostics/self-log.js';
import { quoteIdentifier } from './identifiers.js';
import {
  bootstrapLogTable,
  buildDeleteExpiredSql,
  ensureLogTable,
} from './schema.js';

function objectNames(db: Database.Database, type: 'table' | 'index'): string[] {
  return db
    .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type = ? ORDER BY name`)
    .all(type)
    .map((row) => row.name);
}

describe('schema', () => {
  let testDb: TestDatabase;
  let diagnostics: string[];

  beforeEach(() => {
    testDb = createTestDatabase();
    diagnostics = [];
    enableSelfLog((line) => diagnostics.push(line));
  });

  afterEach(() => {
    enableSelfLog();
    testDb.cleanup();
  });

  it('should be idempotent', () => {
    expect(ensureLogTable(testDb.db, TEST_TABLE, 'LongDate')).toEqual([]);
    expect(ensureLogTable(testDb.db, TEST_TABLE, 'LongDate')).toEqual([]);

    expect(objectNames(testDb.db, 'table').filter((name) => name === TEST_TABLE)).toHaveLength(1);
    expect(objectNames(testDb.db, 'index')).toEqual(['Logs_LongDate', 'Logs_id']);
  });

  it('should create the log columns', () => {
    const columns = testDb.db
      .prepare<[], { name: string }>(`SELECT name FROM pragma_table_info('${TEST_TABLE}')`)
      .all()
      .map((row) => row.name);

    expect(columns).toEqual([
      'id',
      'Timestamp',
      'Level',
      'Message',
      'LongDate',
      'Logger',
      'TraceIdentifier',
      'Exception',
      'Properties',
      '_ts',
    ]);
  });

  it('should index a separate retention column', () => {
    ensureLogTable(testDb.db, TEST_TABLE, '_ts');
    expect(objectNames(testDb.db, 'index')).toEqual(['Logs_LongDate', 'Logs__ts', 'Logs_id']);
  });

  it('should report index failures without failing the bootstrap', () => {
    const result = bootstrapLogTable(testDb.connect, TEST_TABLE, 'NoSuchColumn');

    expect(result.tableReady).toBe(true);
    expect(result.failedIndexes).toHaveLength(1);
    expect(result.failedIndexes[0]).toContain('"NoSuchColumn"');
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toContain('[Schema] Index creation failed for Logs');
  });

  it('should report an unreachable store without throwing', () => {
    const result = bootstrapLogTable(
      () => {
        throw new Error('disk I/O error');
      },
      TEST_TABLE,
      'LongDate',
    );

    expect(result).toEqual({ tableReady: false, failedIndexes: [] });
    expect(diagnostics[0]).toContain('[Schema] Table bootstrap failed for Logs: disk I/O error');
  });

  it('should quote identifiers', () => {
    expect(quoteIdentifier('Logs')).toBe('"Logs"');
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });

  it('should build a capped delete statement', () => {
    expect(buildDeleteExpiredSql('Logs', 'LongDate', 500)).toBe(
      'DELETE FROM "Logs" WHERE rowid IN (SELECT rowid FROM "Logs" WHERE "LongDate" < @expiration LIMIT 500)',
    );
    expect(buildDeleteExpiredSql('Logs', 'LongDate', 0)).toBe(
      'DELETE FROM "Logs" WHERE rowid IN (SELECT rowid FROM "Logs" WHERE "LongDate" < @expiration LIMIT 0)',
    );
  });
});

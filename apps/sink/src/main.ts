#!/usr/bin/env node
import { config } from 'dotenv';
import path from 'path';
import fs from 'fs';
import readline from 'readline';

// Load .env.local if it exists (takes precedence over .env, but not shell)
const envLocalPath = path.join(process.cwd(), '.env.local');
if (fs.existsSync(envLocalPath)) {
  config({ path: envLocalPath });
}

// Load .env (defaults)
config();

import { formatSinkConfigForLog, loadSinkConfig } from './config.js';
import { parseLogEvent } from './shared/log-event.js';
import { DatabaseLogSink } from './sink.js';

let sink: DatabaseLogSink | null = null;
let shuttingDown = false;

async function main() {
  const sinkConfig = loadSinkConfig();
  console.info(`[Main] Sink config: ${formatSinkConfigForLog(sinkConfig)}`);

  sink = new DatabaseLogSink(sinkConfig);
  if (!sink.bootstrap.tableReady) {
    console.warn(`[Main] Table ${sinkConfig.tableName} not ready, batches will fail until the database is reachable`);
  }

  const input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
  let lineNumber = 0;
  let rejected = 0;

  for await (const line of input) {
    lineNumber += 1;
    if (line.trim() === '') continue;

    const parsed = parseLogEvent(line);
    if (!parsed.ok) {
      rejected += 1;
      console.warn(`[Main] Skipping line ${lineNumber}: ${parsed.error}`);
      continue;
    }
    sink.emit(parsed.event);
  }

  console.info(`[Main] Input closed after ${lineNumber} lines (${rejected} rejected)`);
  await shutdown(0);
}

// Graceful shutdown
async function shutdown(code: number) {
  if (shuttingDown) return;
  shuttingDown = true;
  console.info('[Main] Shutting down...');

  if (sink) {
    await sink.close();
    const stats = sink.getStats();
    console.info(
      `[Main] Delivered ${stats.delivered} events, ${stats.buffered} undelivered, ${stats.dropped} dropped, ${stats.failedBatches} failed batches`,
    );
  }

  console.info('[Main] Shutdown complete');
  process.exit(code);
}

process.on('SIGINT', () => {
  void shutdown(0);
});
process.on('SIGTERM', () => {
  void shutdown(0);
});

void main().catch(async (err) => {
  console.error('[Main] Fatal:', err);
  await shutdown(1);
});

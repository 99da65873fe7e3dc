/**
 * Retention cleanup settings. Built once when the sink starts and not
 * changed afterwards.
 */
export interface RetentionCleanerConfig {
  tableName: string;

  // Column compared against the cutoff; must use the same time base as the writer
  timeColumn: string;

  // Records older than this are purged
  expirationMs: number;

  // Time between cleanup passes
  frequencyMs: number;

  // Max rows per DELETE statement; 0 deletes nothing
  deleteLimit: number;

  timeInUtc: boolean;

  // Delay before the first pass so startup work is not competing with it
  initialDelayMs: number;
}

export const DEFAULT_INITIAL_DELAY_MS = 2000;

export interface CleanupResult {
  cutoff: string;
  deleted: number;
  statements: number;
  durationMs: number;
  failed: boolean;
}

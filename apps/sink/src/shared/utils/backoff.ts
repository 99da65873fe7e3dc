/**
 * Exponential retry delay for redelivering a failed batch.
 * `attempt` counts consecutive failures starting at 1.
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelay: number,
  maxDelay: number
): number {
  if (attempt <= 0 || baseDelay <= 0) {
    return 0;
  }
  const delay = baseDelay * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelay);
}

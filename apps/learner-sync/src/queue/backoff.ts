/**
 * Exponential retry delay: base, 2×base, 4×base, ... capped at `maxMs`.
 * `attempt` counts failures so far (1 for the first retry).
 */
export function computeBackoff(attempt: number, baseMs: number, maxMs: number): number {
  if (attempt <= 0) return 0;
  const delay = baseMs * 2 ** (attempt - 1);
  return Math.min(delay, maxMs);
}

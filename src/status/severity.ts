/**
 * Status levels in ascending severity. Classification, the per-model merge and
 * the dashboard all compare through this list.
 */
export const STATUS_LEVELS = ['OK', 'SLOW', 'DEGRADED', 'FAILED', 'UNAVAILABLE'] as const;

export type StatusLevel = typeof STATUS_LEVELS[number];

export const FAILURE_LEVELS: ReadonlySet<StatusLevel> = new Set<StatusLevel>(['DEGRADED', 'FAILED', 'UNAVAILABLE']);

export function isStatusLevel(value: unknown): value is StatusLevel {
  return typeof value === 'string' && (STATUS_LEVELS as readonly string[]).includes(value);
}

export function severityRank(status: StatusLevel): number {
  return STATUS_LEVELS.indexOf(status);
}

export function compareSeverity(a: StatusLevel, b: StatusLevel): number {
  return severityRank(a) - severityRank(b);
}

export function worseOf(a: StatusLevel, b: StatusLevel): StatusLevel {
  return compareSeverity(b, a) > 0 ? b : a;
}

/**
 * Worst status in the list, or `fallback` when the list is empty.
 */
export function worstStatus<F>(statuses: Iterable<StatusLevel>, fallback: F): StatusLevel | F {
  let worst: StatusLevel | undefined;
  for (const status of statuses) {
    worst = worst === undefined ? status : worseOf(worst, status);
  }
  return worst === undefined ? fallback : worst;
}

export function isFailureLevel(status: StatusLevel): boolean {
  return FAILURE_LEVELS.has(status);
}

export function emptyStatusCounts(): Record<StatusLevel, number> {
  return { OK: 0, SLOW: 0, DEGRADED: 0, FAILED: 0, UNAVAILABLE: 0 };
}

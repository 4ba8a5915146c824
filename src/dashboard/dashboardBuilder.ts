import { DateTime } from 'luxon';
import { HistoryEntry } from '../history/historyLog';
import { ModelStatus } from '../status/modelStatus';
import { emptyStatusCounts, isFailureLevel, StatusLevel, worseOf } from '../status/severity';
import { dayKey, dayRange, toMillis, toUtcISO } from '../time/timeUtils';
import { ErrorCategory } from '../utils/errorCategorizer';

export const NO_DATA = 'NO_DATA';

export type CellStatus = StatusLevel | typeof NO_DATA;

export interface HeatmapCell {
  date: string;
  status: CellStatus;
  entries: number;
  /** Worst status per scenario on that day. */
  scenarios: Record<string, StatusLevel>;
}

export interface HeatmapRow {
  model: string;
  cells: HeatmapCell[];
}

export interface CurrentScenarioRow {
  name: string;
  status: StatusLevel;
  durationMs: number;
  lastChecked: string;
  lastSuccess: string | null;
  errorCategory: ErrorCategory | null;
  errorDetail: string | null;
}

export interface CurrentStatusRow {
  model: string;
  overallStatus: StatusLevel;
  lastUpdated: string;
  lastAllOk: string | null;
  scenarios: CurrentScenarioRow[];
}

export interface FailureItem {
  timestamp: string;
  runId: string;
  model: string;
  scenario: string;
  status: StatusLevel;
  durationMs: number;
  errorCategory: ErrorCategory | null;
  errorDetail: string | null;
}

export interface DashboardData {
  generatedAt: string;
  timezone: string;
  days: number;
  dates: string[];
  models: string[];
  heatmap: HeatmapRow[];
  current: CurrentStatusRow[];
  failures: FailureItem[];
  summary: Record<StatusLevel, number>;
}

export interface BuildOptions {
  now: DateTime;
  days: number;
  timezone: string;
  failureLimit: number;
  failureWindowDays: number;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function sortedRecord<V>(record: Map<string, V>): Record<string, V> {
  const result: Record<string, V> = {};
  for (const key of [...record.keys()].sort(compareText)) {
    const value = record.get(key);
    if (value !== undefined) result[key] = value;
  }
  return result;
}

interface DayBucket {
  status: StatusLevel;
  entries: number;
  scenarios: Map<string, StatusLevel>;
}

/**
 * Groups history by (model, day) and reduces each group to its worst status.
 * Entries outside `dates` are ignored.
 */
export function bucketHistory(
  history: readonly HistoryEntry[],
  dates: readonly string[],
  timezone: string
): Map<string, Map<string, DayBucket>> {
  const inRange = new Set(dates);
  const buckets = new Map<string, Map<string, DayBucket>>();

  for (const entry of history) {
    const day = dayKey(entry.timestamp, timezone);
    if (!day || !inRange.has(day)) continue;

    let byDay = buckets.get(entry.model);
    if (!byDay) {
      byDay = new Map();
      buckets.set(entry.model, byDay);
    }

    const bucket = byDay.get(day);
    if (!bucket) {
      byDay.set(day, {
        status: entry.status,
        entries: 1,
        scenarios: new Map([[entry.scenario, entry.status]]),
      });
      continue;
    }

    bucket.status = worseOf(bucket.status, entry.status);
    bucket.entries += 1;
    const previous = bucket.scenarios.get(entry.scenario);
    bucket.scenarios.set(entry.scenario, previous ? worseOf(previous, entry.status) : entry.status);
  }

  return buckets;
}

function currentRow(status: ModelStatus): CurrentStatusRow {
  return {
    model: status.model,
    // Taken as stored; never re-derived from history
    overallStatus: status.overallStatus,
    lastUpdated: status.lastUpdated,
    lastAllOk: status.lastAllOk,
    scenarios: Object.keys(status.scenarios).sort(compareText).map(name => {
      const scenario = status.scenarios[name];
      return {
        name,
        status: scenario.status,
        durationMs: scenario.durationMs,
        lastChecked: scenario.lastChecked,
        lastSuccess: scenario.lastSuccess,
        errorCategory: scenario.errorCategory,
        errorDetail: scenario.errorDetail,
      };
    }),
  };
}

export function recentFailures(
  history: readonly HistoryEntry[],
  now: DateTime,
  windowDays: number,
  limit: number
): FailureItem[] {
  const cutoff = now.minus({ days: windowDays }).toMillis();

  return history
    .filter(entry => isFailureLevel(entry.status) && toMillis(entry.timestamp) >= cutoff)
    .map(entry => ({ entry, millis: toMillis(entry.timestamp) }))
    .sort((a, b) =>
      b.millis - a.millis
      || compareText(a.entry.model, b.entry.model)
      || compareText(a.entry.scenario, b.entry.scenario)
      || compareText(a.entry.runId, b.entry.runId))
    .slice(0, Math.max(0, limit))
    .map(({ entry }) => ({
      timestamp: entry.timestamp,
      runId: entry.runId,
      model: entry.model,
      scenario: entry.scenario,
      status: entry.status,
      durationMs: entry.durationMs,
      errorCategory: entry.errorCategory ?? null,
      errorDetail: entry.errorDetail ?? null,
    }));
}

/**
 * Aggregates status snapshots and history into dashboard data. Performs no
 * I/O and reads no clock; identical inputs give identical output.
 */
export function buildDashboardData(
  statuses: readonly ModelStatus[],
  history: readonly HistoryEntry[],
  options: BuildOptions
): DashboardData {
  const dates = dayRange(options.now, options.days, options.timezone);
  const buckets = bucketHistory(history, dates, options.timezone);

  const modelSet = new Set<string>(buckets.keys());
  for (const status of statuses) {
    modelSet.add(status.model);
  }
  const models = [...modelSet].sort(compareText);

  const heatmap: HeatmapRow[] = models.map(model => {
    const byDay = buckets.get(model);
    return {
      model,
      cells: dates.map((date): HeatmapCell => {
        const bucket = byDay?.get(date);
        if (!bucket) {
          return { date, status: NO_DATA, entries: 0, scenarios: {} };
        }
        return {
          date,
          status: bucket.status,
          entries: bucket.entries,
          scenarios: sortedRecord(bucket.scenarios),
        };
      }),
    };
  });

  const current = [...statuses]
    .sort((a, b) => compareText(a.model, b.model))
    .map(currentRow);

  const summary = emptyStatusCounts();
  for (const row of current) {
    summary[row.overallStatus] += 1;
  }

  return {
    generatedAt: toUtcISO(options.now),
    timezone: options.timezone,
    days: options.days,
    dates,
    models,
    heatmap,
    current,
    failures: recentFailures(history, options.now, options.failureWindowDays, options.failureLimit),
    summary,
  };
}

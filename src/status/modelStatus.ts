import { DateTime } from 'luxon';
import { ErrorCategory, isErrorCategory } from '../utils/errorCategorizer';
import { isRecord, isTimestamp } from '../utils/guards';
import { isStatusLevel, StatusLevel, worstStatus } from './severity';

const STATUS_DETAIL_LIMIT = 500;

/**
 * Which scenario statuses count as "all OK" when advancing `lastAllOk`.
 * - strict: every scenario is exactly OK
 * - passing: every scenario is OK or SLOW
 */
export type AllOkPolicy = 'strict' | 'passing';

export interface MergeOptions {
  allOkPolicy: AllOkPolicy;
  /** Scenarios that must all have an entry before `lastAllOk` may advance. */
  requiredScenarios?: readonly string[];
}

export interface ScenarioResult {
  scenario: string;
  status: StatusLevel;
  durationMs: number;
  checkedAt: string;
  errorCategory?: ErrorCategory;
  errorDetail?: string;
}

export interface ScenarioState {
  status: StatusLevel;
  durationMs: number;
  lastChecked: string;
  lastSuccess: string | null;
  errorCategory: ErrorCategory | null;
  errorDetail: string | null;
}

export interface ModelStatus {
  model: string;
  lastUpdated: string;
  overallStatus: StatusLevel;
  lastAllOk: string | null;
  scenarios: Record<string, ScenarioState>;
}

// On-disk shape of a per-model status file
export interface ScenarioStateRecord {
  status: StatusLevel;
  duration_ms: number;
  last_checked: string;
  last_success: string | null;
  error_category?: ErrorCategory | null;
  details?: string | null;
}

export interface ModelStatusRecord {
  model: string;
  last_updated: string;
  overall_status: StatusLevel;
  last_all_ok: string | null;
  scenarios: Record<string, ScenarioStateRecord>;
}

function isOptionalTimestamp(value: unknown): boolean {
  return value === null || value === undefined || isTimestamp(value);
}

function isScenarioStateRecord(value: unknown): value is ScenarioStateRecord {
  if (!isRecord(value)) return false;
  return isStatusLevel(value.status)
    && typeof value.duration_ms === 'number'
    && isTimestamp(value.last_checked)
    && isOptionalTimestamp(value.last_success)
    && (value.error_category === undefined || value.error_category === null || isErrorCategory(value.error_category))
    && (value.details === undefined || value.details === null || typeof value.details === 'string');
}

export function isModelStatusRecord(value: unknown): value is ModelStatusRecord {
  if (!isRecord(value)) return false;
  if (typeof value.model !== 'string' || !value.model) return false;
  if (!isTimestamp(value.last_updated) || !isStatusLevel(value.overall_status)) return false;
  if (!isOptionalTimestamp(value.last_all_ok)) return false;
  const scenarios = value.scenarios;
  if (!isRecord(scenarios)) return false;
  return Object.values(scenarios).every(isScenarioStateRecord);
}

export function fromRecord(record: ModelStatusRecord): ModelStatus {
  const scenarios: Record<string, ScenarioState> = {};
  for (const [name, entry] of Object.entries(record.scenarios)) {
    scenarios[name] = {
      status: entry.status,
      durationMs: entry.duration_ms,
      lastChecked: entry.last_checked,
      lastSuccess: entry.last_success ?? null,
      errorCategory: entry.error_category ?? null,
      errorDetail: entry.details ?? null,
    };
  }
  return {
    model: record.model,
    lastUpdated: record.last_updated,
    overallStatus: record.overall_status,
    lastAllOk: record.last_all_ok ?? null,
    scenarios,
  };
}

export function toRecord(status: ModelStatus): ModelStatusRecord {
  const scenarios: Record<string, ScenarioStateRecord> = {};
  for (const name of Object.keys(status.scenarios).sort()) {
    const entry = status.scenarios[name];
    scenarios[name] = {
      status: entry.status,
      duration_ms: entry.durationMs,
      last_checked: entry.lastChecked,
      last_success: entry.lastSuccess,
      error_category: entry.errorCategory,
      details: entry.errorDetail,
    };
  }
  return {
    model: status.model,
    last_updated: status.lastUpdated,
    overall_status: status.overallStatus,
    last_all_ok: status.lastAllOk,
    scenarios,
  };
}

/** Later of two ISO timestamps. */
export function laterTimestamp(current: string | null | undefined, candidate: string): string {
  if (!current) return candidate;
  const currentMs = DateTime.fromISO(current).toMillis();
  const candidateMs = DateTime.fromISO(candidate).toMillis();
  return candidateMs > currentMs ? candidate : current;
}

export function truncateDetail(detail: string | undefined, limit: number): string | null {
  if (!detail) return null;
  if (detail.length <= limit) return detail;
  return `${detail.slice(0, limit)}... [truncated]`;
}

/**
 * Worst status across scenarios. A model without any scenario entry has never
 * answered, so it reads as UNAVAILABLE.
 */
export function computeOverallStatus(scenarios: Record<string, ScenarioState>): StatusLevel {
  return worstStatus(Object.values(scenarios).map(s => s.status), 'UNAVAILABLE');
}

export function meetsAllOkPolicy(
  scenarios: Record<string, ScenarioState>,
  options: MergeOptions
): boolean {
  const names = Object.keys(scenarios);
  if (names.length === 0) return false;
  for (const required of options.requiredScenarios || []) {
    if (!scenarios[required]) return false;
  }
  const accepted: ReadonlySet<StatusLevel> = options.allOkPolicy === 'passing'
    ? new Set<StatusLevel>(['OK', 'SLOW'])
    : new Set<StatusLevel>(['OK']);
  return names.every(name => accepted.has(scenarios[name].status));
}

export function emptyModelStatus(model: string, now: string): ModelStatus {
  return {
    model,
    lastUpdated: now,
    overallStatus: 'UNAVAILABLE',
    lastAllOk: null,
    scenarios: {},
  };
}

/**
 * Folds one scenario result into a model's status. The previous entry for the
 * scenario is replaced; timestamps never move backwards.
 */
export function applyScenarioResult(
  previous: ModelStatus | undefined,
  model: string,
  result: ScenarioResult,
  options: MergeOptions
): ModelStatus {
  const base = previous || emptyModelStatus(model, result.checkedAt);
  const prior = base.scenarios[result.scenario];
  const passed = result.status === 'OK' || result.status === 'SLOW';

  const entry: ScenarioState = {
    status: result.status,
    durationMs: result.durationMs,
    lastChecked: laterTimestamp(prior?.lastChecked, result.checkedAt),
    lastSuccess: passed
      ? laterTimestamp(prior?.lastSuccess, result.checkedAt)
      : prior?.lastSuccess ?? null,
    errorCategory: result.errorCategory ?? null,
    errorDetail: truncateDetail(result.errorDetail, STATUS_DETAIL_LIMIT),
  };

  const scenarios = { ...base.scenarios, [result.scenario]: entry };

  return {
    model,
    lastUpdated: laterTimestamp(previous?.lastUpdated, result.checkedAt),
    overallStatus: computeOverallStatus(scenarios),
    lastAllOk: meetsAllOkPolicy(scenarios, options)
      ? laterTimestamp(base.lastAllOk, result.checkedAt)
      : base.lastAllOk,
    scenarios,
  };
}

import * as fs from 'fs-extra';
import { DateTime } from 'luxon';
import { appendLines } from '../storage/jsonStore';
import { ErrorCategory, isErrorCategory } from '../utils/errorCategorizer';
import { isRecord, isTimestamp } from '../utils/guards';
import { logger } from '../utils/logger';
import { isStatusLevel, StatusLevel } from '../status/severity';

const HISTORY_DETAIL_LIMIT = 200;

export interface HistoryEntry {
  timestamp: string;
  runId: string;
  model: string;
  scenario: string;
  status: StatusLevel;
  durationMs: number;
  errorCategory?: ErrorCategory;
  errorDetail?: string;
  host?: string;
}

export interface HistoryQuery {
  /** Only entries from the last N days before `now`. */
  days?: number;
  model?: string;
  scenario?: string;
  now?: DateTime;
}

// Compact keys keep a year of half-hourly runs small
interface HistoryLine {
  ts: string;
  r: string;
  m: string;
  s: string;
  st: StatusLevel;
  d: number;
  ec?: ErrorCategory;
  det?: string;
  h?: string;
}

function isHistoryLine(line: unknown): line is HistoryLine {
  if (!isRecord(line)) return false;
  return isTimestamp(line.ts)
    && typeof line.r === 'string'
    && typeof line.m === 'string'
    && typeof line.s === 'string'
    && isStatusLevel(line.st)
    && typeof line.d === 'number'
    && (line.ec === undefined || isErrorCategory(line.ec))
    && (line.det === undefined || typeof line.det === 'string')
    && (line.h === undefined || typeof line.h === 'string');
}

export function serializeEntry(entry: HistoryEntry): string {
  const line: HistoryLine = {
    ts: entry.timestamp,
    r: entry.runId,
    m: entry.model,
    s: entry.scenario,
    st: entry.status,
    d: entry.durationMs,
  };
  if (entry.errorCategory) {
    line.ec = entry.errorCategory;
  }
  if (entry.errorDetail) {
    line.det = entry.errorDetail.slice(0, HISTORY_DETAIL_LIMIT);
  }
  if (entry.host) {
    line.h = entry.host;
  }
  return JSON.stringify(line);
}

/**
 * Parses one history line; `undefined` for blank or malformed input.
 */
export function parseEntry(text: string): HistoryEntry | undefined {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  let data: unknown;
  try {
    data = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  if (!isHistoryLine(data)) return undefined;

  const entry: HistoryEntry = {
    timestamp: data.ts,
    runId: data.r,
    model: data.m,
    scenario: data.s,
    status: data.st,
    durationMs: data.d,
  };
  if (data.ec) entry.errorCategory = data.ec;
  if (data.det) entry.errorDetail = data.det;
  if (data.h) entry.host = data.h;
  return entry;
}

/**
 * Append-only JSONL log with one line per (run, model, scenario). Nothing here
 * rewrites or removes an existing line.
 */
export class HistoryLog {
  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(entry: HistoryEntry): Promise<void> {
    await appendLines(this.filePath, [serializeEntry(entry)]);
  }

  async load(query: HistoryQuery = {}): Promise<HistoryEntry[]> {
    if (!(await fs.pathExists(this.filePath))) {
      return [];
    }

    const content = await fs.readFile(this.filePath, 'utf-8');
    const cutoff = query.days !== undefined
      ? (query.now || DateTime.utc()).minus({ days: query.days }).toMillis()
      : undefined;

    const entries: HistoryEntry[] = [];
    let skipped = 0;

    for (const text of content.split('\n')) {
      if (!text.trim()) continue;
      const entry = parseEntry(text);
      if (!entry) {
        skipped++;
        continue;
      }
      if (cutoff !== undefined && DateTime.fromISO(entry.timestamp).toMillis() < cutoff) continue;
      if (query.model && entry.model !== query.model) continue;
      if (query.scenario && entry.scenario !== query.scenario) continue;
      entries.push(entry);
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed line(s) in ${this.filePath}`);
    }

    return entries;
  }
}

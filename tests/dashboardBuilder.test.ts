import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { buildDashboardData, BuildOptions, NO_DATA } from '../src/dashboard/dashboardBuilder';
import { HistoryEntry } from '../src/history/historyLog';
import { ModelStatus } from '../src/status/modelStatus';

const GPT2 = 'openai-community/gpt2';
const LLAMA = 'meta-llama/Llama-3.1-8B';
const GPTJ = 'EleutherAI/gpt-j-6b';

const options: BuildOptions = {
  now: DateTime.fromISO('2026-03-10T12:00:00.000Z', { zone: 'utc' }),
  days: 3,
  timezone: 'UTC',
  failureLimit: 2,
  failureWindowDays: 7,
};

function entry(timestamp: string, model: string, scenario: string, status: HistoryEntry['status']): HistoryEntry {
  return { timestamp, runId: `run-${timestamp}`, model, scenario, status, durationMs: 1000 };
}

const history: HistoryEntry[] = [
  entry('2026-03-09T08:00:00.000Z', GPT2, 'basic_trace', 'OK'),
  { ...entry('2026-03-09T09:00:00.000Z', GPT2, 'generation', 'FAILED'), errorCategory: 'TIMEOUT', errorDetail: 'Timed out after 90s' },
  entry('2026-03-10T08:00:00.000Z', GPT2, 'basic_trace', 'SLOW'),
  { ...entry('2026-03-10T09:00:00.000Z', LLAMA, 'basic_trace', 'UNAVAILABLE'), errorCategory: 'MODEL_NOT_LOADED' },
  entry('2026-03-01T09:00:00.000Z', GPT2, 'basic_trace', 'FAILED'),
  entry('2026-03-10T09:00:00.000Z', GPT2, 'generation', 'DEGRADED'),
];

const statuses: ModelStatus[] = [
  {
    model: GPT2,
    lastUpdated: '2026-03-10T09:00:00.000Z',
    overallStatus: 'DEGRADED',
    lastAllOk: '2026-03-08T09:00:00.000Z',
    scenarios: {
      generation: {
        status: 'DEGRADED',
        durationMs: 1000,
        lastChecked: '2026-03-10T09:00:00.000Z',
        lastSuccess: '2026-03-08T09:00:00.000Z',
        errorCategory: null,
        errorDetail: 'Partial result',
      },
      basic_trace: {
        status: 'SLOW',
        durationMs: 40000,
        lastChecked: '2026-03-10T08:00:00.000Z',
        lastSuccess: '2026-03-10T08:00:00.000Z',
        errorCategory: null,
        errorDetail: null,
      },
    },
  },
  {
    model: GPTJ,
    lastUpdated: '2026-03-10T07:00:00.000Z',
    overallStatus: 'OK',
    lastAllOk: '2026-03-10T07:00:00.000Z',
    scenarios: {},
  },
];

describe('buildDashboardData', () => {
  const data = buildDashboardData(statuses, history, options);

  it('should cover the last N days, oldest first', () => {
    expect(data.dates).toEqual(['2026-03-08', '2026-03-09', '2026-03-10']);
    expect(data.generatedAt).toBe('2026-03-10T12:00:00.000Z');
  });

  it('should list the union of tracked and historical models, sorted', () => {
    expect(data.models).toEqual([GPTJ, LLAMA, GPT2]);
    expect(data.heatmap.map(row => row.model)).toEqual([GPTJ, LLAMA, GPT2]);
  });

  it('should take the worst status of the day for each cell', () => {
    const gpt2 = data.heatmap[2];
    expect(gpt2.cells).toEqual([
      { date: '2026-03-08', status: NO_DATA, entries: 0, scenarios: {} },
      { date: '2026-03-09', status: 'FAILED', entries: 2, scenarios: { basic_trace: 'OK', generation: 'FAILED' } },
      { date: '2026-03-10', status: 'DEGRADED', entries: 2, scenarios: { basic_trace: 'SLOW', generation: 'DEGRADED' } },
    ]);
  });

  it('should fill models without history with NO_DATA', () => {
    expect(data.heatmap[0].cells.map(cell => cell.status)).toEqual([NO_DATA, NO_DATA, NO_DATA]);
    expect(data.heatmap[1].cells.map(cell => cell.status)).toEqual([NO_DATA, NO_DATA, 'UNAVAILABLE']);
  });

  it('should copy the stored overall status into the current table', () => {
    expect(data.current.map(row => [row.model, row.overallStatus])).toEqual([
      [GPTJ, 'OK'],
      [GPT2, 'DEGRADED'],
    ]);
    expect(data.current[1].scenarios.map(s => s.name)).toEqual(['basic_trace', 'generation']);
  });

  it('should list recent failures newest first, ties by model, up to the limit', () => {
    expect(data.failures).toEqual([
      {
        timestamp: '2026-03-10T09:00:00.000Z',
        runId: 'run-2026-03-10T09:00:00.000Z',
        model: LLAMA,
        scenario: 'basic_trace',
        status: 'UNAVAILABLE',
        durationMs: 1000,
        errorCategory: 'MODEL_NOT_LOADED',
        errorDetail: null,
      },
      {
        timestamp: '2026-03-10T09:00:00.000Z',
        runId: 'run-2026-03-10T09:00:00.000Z',
        model: GPT2,
        scenario: 'generation',
        status: 'DEGRADED',
        durationMs: 1000,
        errorCategory: null,
        errorDetail: null,
      },
    ]);
  });

  it('should leave failures outside the window out', () => {
    const wide = buildDashboardData(statuses, history, { ...options, failureLimit: 10 });
    expect(wide.failures.map(f => f.timestamp)).toEqual([
      '2026-03-10T09:00:00.000Z',
      '2026-03-10T09:00:00.000Z',
      '2026-03-09T09:00:00.000Z',
    ]);
  });

  it('should count models by current overall status', () => {
    expect(data.summary).toEqual({ OK: 1, SLOW: 0, DEGRADED: 1, FAILED: 0, UNAVAILABLE: 0 });
  });

  it('should produce identical output for identical input', () => {
    const again = buildDashboardData(statuses, history, options);
    const reordered = buildDashboardData([...statuses].reverse(), [...history].reverse(), options);

    expect(JSON.stringify(again)).toBe(JSON.stringify(data));
    expect(JSON.stringify(reordered)).toBe(JSON.stringify(data));
  });

  it('should bucket days in the configured timezone', () => {
    const late = [entry('2026-03-10T02:00:00.000Z', GPT2, 'basic_trace', 'FAILED')];
    const zoned = buildDashboardData([], late, { ...options, timezone: 'America/New_York' });

    expect(zoned.dates).toEqual(['2026-03-08', '2026-03-09', '2026-03-10']);
    expect(zoned.heatmap[0].cells.map(cell => cell.status)).toEqual([NO_DATA, 'FAILED', NO_DATA]);
  });

  it('should handle empty input', () => {
    const empty = buildDashboardData([], [], options);
    expect(empty.models).toEqual([]);
    expect(empty.heatmap).toEqual([]);
    expect(empty.failures).toEqual([]);
  });
});

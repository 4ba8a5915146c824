import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import { DateTime } from 'luxon';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn()
  }
}));

import { buildArtifactSet, renderIndex, reproductionFor, writeArtifactSet } from '../src/dashboard/artifacts';
import { buildDashboardData } from '../src/dashboard/dashboardBuilder';
import { DashboardPublisher } from '../src/deployment/dashboardPublisher';
import { HistoryEntry } from '../src/history/historyLog';
import { ModelStatus } from '../src/status/modelStatus';
import { MonitorError } from '../src/utils/errorHandler';

const GPT2 = 'openai-community/gpt2';
const TEMPLATE = '<p>Generated {{generatedAt}} for {{modelCount}} models</p>';

const statuses: ModelStatus[] = [
  {
    model: GPT2,
    lastUpdated: '2026-03-10T09:00:00.000Z',
    overallStatus: 'FAILED',
    lastAllOk: null,
    scenarios: {
      generation: {
        status: 'FAILED',
        durationMs: 90000,
        lastChecked: '2026-03-10T09:00:00.000Z',
        lastSuccess: null,
        errorCategory: 'TIMEOUT',
        errorDetail: 'Timed out after 90s',
      },
    },
  },
  {
    model: 'EleutherAI/gpt-j-6b',
    lastUpdated: '2026-03-10T08:00:00.000Z',
    overallStatus: 'OK',
    lastAllOk: '2026-03-10T08:00:00.000Z',
    scenarios: {},
  },
];

const history: HistoryEntry[] = [
  {
    timestamp: '2026-03-10T09:00:00.000Z',
    runId: '20260310_090000',
    model: GPT2,
    scenario: 'generation',
    status: 'FAILED',
    durationMs: 90000,
    errorCategory: 'TIMEOUT',
    errorDetail: 'Timed out after 90s',
  },
];

const data = buildDashboardData(statuses, history, {
  now: DateTime.fromISO('2026-03-10T12:00:00.000Z', { zone: 'utc' }),
  days: 7,
  timezone: 'UTC',
  failureLimit: 10,
  failureWindowDays: 7,
});

describe('dashboard artifacts', () => {
  it('should build reproduction links from the repository settings', () => {
    expect(reproductionFor(GPT2, 'generation', { repoUrl: 'https://git.example.com/acme/probes/', branch: 'main' })).toEqual({
      command: 'python scenarios/generation.py --model openai-community/gpt2',
      url: 'https://git.example.com/acme/probes/blob/main/scenarios/generation.py',
    });
    expect(reproductionFor(GPT2, 'generation', { repoUrl: '', branch: 'main' }).url).toBeNull();
  });

  it('should fill the page placeholders', () => {
    expect(renderIndex(TEMPLATE, data)).toBe('<p>Generated 2026-03-10T12:00:00.000Z for 2 models</p>');
  });

  it('should produce the page, the status data and one file per model', () => {
    const files = buildArtifactSet(data, statuses, TEMPLATE, { repoUrl: '', branch: 'main' });

    expect(files.map(file => file.path)).toEqual([
      'index.html',
      'data/status.json',
      'data/models/EleutherAI--gpt-j-6b.json',
      'data/models/openai-community--gpt2.json',
    ]);

    const status = JSON.parse(files[1].content);
    expect(status.failures[0].reproduce).toEqual({
      command: 'python scenarios/generation.py --model openai-community/gpt2',
      url: null,
    });
    expect(JSON.parse(files[3].content).overall_status).toBe('FAILED');
  });
});

describe('writing and publishing', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = path.join(process.cwd(), 'tests', 'tmp', `artifacts-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.ensureDir(tempDir);
  });

  afterEach(async () => {
    if (await fs.pathExists(tempDir)) {
      await fs.remove(tempDir);
    }
    vi.clearAllMocks();
  });

  it('should write every artifact under the output directory', async () => {
    const outDir = path.join(tempDir, 'dashboard');
    const files = buildArtifactSet(data, statuses, TEMPLATE, { repoUrl: '', branch: 'main' });

    const written = await writeArtifactSet(outDir, files);

    expect(written).toHaveLength(4);
    expect(await fs.readFile(path.join(outDir, 'index.html'), 'utf-8')).toBe(files[0].content);
    expect(await fs.pathExists(path.join(outDir, 'data', 'models', 'openai-community--gpt2.json'))).toBe(true);
  });

  it('should copy the dashboard and make it world-readable', async () => {
    const outDir = path.join(tempDir, 'dashboard');
    await writeArtifactSet(outDir, buildArtifactSet(data, statuses, TEMPLATE, { repoUrl: '', branch: 'main' }));
    const destination = path.join(tempDir, 'public');

    const result = await new DashboardPublisher().publish(outDir, destination);

    expect(result).toEqual({ destination, files: 4 });
    const stat = await fs.stat(path.join(destination, 'data', 'status.json'));
    expect(stat.mode & 0o777).toBe(0o644);
  });

  it('should refuse to publish without a generated page', async () => {
    await expect(new DashboardPublisher().publish(path.join(tempDir, 'empty'), path.join(tempDir, 'public')))
      .rejects.toBeInstanceOf(MonitorError);
  });
});

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

import { CycleScheduler, wrapIndex } from '../src/scheduler/cycleScheduler';
import { CycleBusyError } from '../src/utils/errorHandler';

const clock = () => DateTime.fromISO('2026-03-01T10:00:00.000Z', { zone: 'utc' });

describe('CycleScheduler', () => {
  let tempDir: string;
  let statePath: string;
  let scheduler: CycleScheduler;

  beforeEach(async () => {
    tempDir = path.join(process.cwd(), 'tests', 'tmp', `cycle-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.ensureDir(tempDir);
    statePath = path.join(tempDir, '.cycle_state.json');
    scheduler = new CycleScheduler(statePath, { retryIntervalMs: 1, maxRetries: 3 }, clock);
  });

  afterEach(async () => {
    if (await fs.pathExists(tempDir)) {
      await fs.remove(tempDir);
    }
    vi.clearAllMocks();
  });

  describe('wrapIndex', () => {
    it('should clamp pointers into the catalog', () => {
      expect(wrapIndex(0, 3)).toBe(0);
      expect(wrapIndex(5, 3)).toBe(2);
      expect(wrapIndex(7, 2)).toBe(1);
      expect(wrapIndex(4, 0)).toBe(0);
    });
  });

  it('should start at the first model without a state file', async () => {
    expect(await scheduler.readState()).toEqual({ pointer: 0, lastRunAt: null });
    expect(await scheduler.selectNext(['A', 'B', 'C'], 'cycle')).toEqual(['A']);
  });

  it('should return the whole catalog in full mode', async () => {
    await scheduler.writeState({ pointer: 1, lastRunAt: null });
    expect(await scheduler.selectNext(['A', 'B', 'C'], 'full')).toEqual(['A', 'B', 'C']);
  });

  it('should not move the pointer when selecting', async () => {
    await scheduler.writeState({ pointer: 1, lastRunAt: null });
    await scheduler.selectNext(['A', 'B', 'C'], 'cycle');
    expect((await scheduler.readState()).pointer).toBe(1);
  });

  it('should test the model under the pointer and wrap to the start', async () => {
    await scheduler.writeState({ pointer: 2, lastRunAt: null });
    const tested: string[] = [];

    const run = await scheduler.runCycle(['A', 'B', 'C'], async model => {
      tested.push(model);
      return 'done';
    });

    expect(tested).toEqual(['C']);
    expect(run).toEqual({ model: 'C', index: 2, nextPointer: 0, result: 'done' });
    expect(await fs.readJson(statePath)).toEqual({ pointer: 0, last_run_at: '2026-03-01T10:00:00.000Z' });
  });

  it('should cover every model once in catalog-size runs', async () => {
    const catalog = ['A', 'B', 'C', 'D'];
    const tested: string[] = [];

    for (let i = 0; i < catalog.length; i++) {
      await scheduler.runCycle(catalog, async model => {
        tested.push(model);
      });
    }

    expect(tested).toEqual(catalog);
    expect((await scheduler.readState()).pointer).toBe(0);
  });

  it('should clamp a pointer left over from a larger catalog', async () => {
    await scheduler.writeState({ pointer: 7, lastRunAt: null });

    const run = await scheduler.runCycle(['A', 'B', 'C'], async () => undefined);

    expect(run?.model).toBe('B');
    expect((await scheduler.readState()).pointer).toBe(2);
  });

  it('should advance the pointer even when the run throws', async () => {
    await expect(scheduler.runCycle(['A', 'B'], async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect((await scheduler.readState()).pointer).toBe(1);
  });

  it('should do nothing for an empty catalog', async () => {
    const fn = vi.fn();
    expect(await scheduler.runCycle([], fn)).toBeUndefined();
    expect(fn).not.toHaveBeenCalled();
    expect(await fs.pathExists(statePath)).toBe(false);
  });

  it('should report a busy cycle when another run holds the lock', async () => {
    await fs.writeFile(scheduler.lockPath, '{}');

    await expect(scheduler.runCycle(['A'], async () => undefined)).rejects.toBeInstanceOf(CycleBusyError);
    expect(await fs.pathExists(statePath)).toBe(false);
  });

  it('should fall back to the start for an invalid state file', async () => {
    await fs.writeJson(statePath, { pointer: -3 });
    expect((await scheduler.readState()).pointer).toBe(0);
  });
});

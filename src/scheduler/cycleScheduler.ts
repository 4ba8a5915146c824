import { readJsonSafe, writeJsonAtomic } from '../storage/jsonStore';
import { LockOptions, LockTimeoutError, withFileLock } from '../storage/locks';
import { Clock, nowISO, systemClock } from '../time/timeUtils';
import { CycleBusyError } from '../utils/errorHandler';
import { isRecord } from '../utils/guards';
import { logger } from '../utils/logger';

export type SelectionMode = 'full' | 'cycle';

export interface CycleState {
  /** Index of the next model to test, taken modulo the catalog size. */
  pointer: number;
  lastRunAt: string | null;
}

interface CycleStateRecord {
  pointer: number;
  last_run_at: string | null;
}

function isCycleStateRecord(value: unknown): value is CycleStateRecord {
  if (!isRecord(value)) return false;
  return typeof value.pointer === 'number'
    && Number.isInteger(value.pointer)
    && value.pointer >= 0
    && (value.last_run_at === null || value.last_run_at === undefined || typeof value.last_run_at === 'string');
}

export function wrapIndex(pointer: number, size: number): number {
  if (size <= 0) return 0;
  return ((pointer % size) + size) % size;
}

export interface CycleRun<T> {
  model: string;
  index: number;
  nextPointer: number;
  result: T;
}

/**
 * Persisted round-robin pointer over the catalog. The pointer is written only
 * after the selected model's run has finished, so an interrupted run repeats
 * the same model next time instead of skipping it.
 */
export class CycleScheduler {
  constructor(
    private statePath: string,
    private lockOptions: LockOptions = {},
    private clock: Clock = systemClock
  ) {}

  get lockPath(): string {
    return `${this.statePath}.lock`;
  }

  async readState(): Promise<CycleState> {
    const record = await readJsonSafe(this.statePath, undefined, isCycleStateRecord);
    if (!record) {
      return { pointer: 0, lastRunAt: null };
    }
    return { pointer: record.pointer, lastRunAt: record.last_run_at ?? null };
  }

  async writeState(state: CycleState): Promise<void> {
    const record: CycleStateRecord = { pointer: state.pointer, last_run_at: state.lastRunAt };
    await writeJsonAtomic(this.statePath, record);
  }

  /**
   * Models to test on this invocation. Full mode returns the whole catalog;
   * cycle mode returns the single model under the pointer. Never moves the
   * pointer.
   */
  async selectNext(catalog: readonly string[], mode: SelectionMode): Promise<string[]> {
    if (mode === 'full') {
      return [...catalog];
    }
    if (catalog.length === 0) {
      return [];
    }
    const state = await this.readState();
    return [catalog[wrapIndex(state.pointer, catalog.length)]];
  }

  /**
   * Runs `fn` for the model under the pointer while holding the cycle lock, then
   * advances the pointer whether `fn` resolved or threw.
   */
  async runCycle<T>(
    catalog: readonly string[],
    fn: (model: string, index: number) => Promise<T>
  ): Promise<CycleRun<T> | undefined> {
    if (catalog.length === 0) {
      logger.warn('Cycle mode with an empty catalog; nothing to test');
      return undefined;
    }

    try {
      return await withFileLock(this.lockPath, async () => {
        const state = await this.readState();
        const index = wrapIndex(state.pointer, catalog.length);
        const model = catalog[index];
        const nextPointer = (index + 1) % catalog.length;

        logger.info(`Cycle mode: testing ${model} (${index + 1}/${catalog.length})`);

        try {
          const result = await fn(model, index);
          return { model, index, nextPointer, result };
        } finally {
          await this.writeState({ pointer: nextPointer, lastRunAt: nowISO(this.clock) });
        }
      }, this.lockOptions);
    } catch (error) {
      if (error instanceof LockTimeoutError && error.lockPath === this.lockPath) {
        throw new CycleBusyError(error.lockPath);
      }
      throw error;
    }
  }
}

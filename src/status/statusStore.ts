import * as fs from 'fs-extra';
import * as path from 'path';
import { cleanupOrphanedTempFiles, readJsonSafe, writeJsonAtomic } from '../storage/jsonStore';
import { LockOptions, withFileLock } from '../storage/locks';
import { MonitorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import {
  applyScenarioResult,
  fromRecord,
  isModelStatusRecord,
  MergeOptions,
  ModelStatus,
  ScenarioResult,
  toRecord,
} from './modelStatus';

/**
 * File-safe name for a model id: `org/name` becomes `org--name.json`.
 * Not injective (`a:b` and `a_b` share a file); the store detects that on update.
 */
export function modelToFilename(model: string): string {
  const safe = model.replace(/\//g, '--').replace(/:/g, '_');
  return `${safe}.json`;
}

/**
 * One JSON document per model under `directory`. Writes are atomic; updates
 * are read-modify-write under a lock on that model's file only.
 */
export class StatusStore {
  constructor(
    private directory: string,
    private mergeOptions: MergeOptions,
    private lockOptions: LockOptions = {}
  ) {}

  get dir(): string {
    return this.directory;
  }

  pathFor(model: string): string {
    return path.join(this.directory, modelToFilename(model));
  }

  async load(model: string): Promise<ModelStatus | undefined> {
    const filePath = this.pathFor(model);
    const record = await readJsonSafe(filePath, undefined, isModelStatusRecord);
    if (!record) return undefined;
    if (record.model !== model) {
      logger.warn(`Status file ${filePath} belongs to ${record.model}, not ${model}; treating as absent`);
      return undefined;
    }
    return fromRecord(record);
  }

  async save(status: ModelStatus): Promise<void> {
    await writeJsonAtomic(this.pathFor(status.model), toRecord(status));
  }

  /**
   * `requiredScenarios` overrides the store-wide list for models that only run
   * some of the scenarios.
   */
  async update(model: string, result: ScenarioResult, requiredScenarios?: readonly string[]): Promise<ModelStatus> {
    const mergeOptions: MergeOptions = requiredScenarios
      ? { ...this.mergeOptions, requiredScenarios }
      : this.mergeOptions;
    const filePath = this.pathFor(model);
    return withFileLock(`${filePath}.lock`, async () => {
      const record = await readJsonSafe(filePath, undefined, isModelStatusRecord);
      if (record && record.model !== model) {
        throw new MonitorError(
          `Status file ${filePath} already holds ${record.model}; refusing to overwrite it with ${model}`,
          'STATUS_FILE_COLLISION'
        );
      }
      const previous = record ? fromRecord(record) : undefined;
      const next = applyScenarioResult(previous, model, result, mergeOptions);
      await this.save(next);
      return next;
    }, this.lockOptions);
  }

  /**
   * Every readable status in the directory, sorted by model id.
   */
  async list(): Promise<ModelStatus[]> {
    if (!(await fs.pathExists(this.directory))) {
      return [];
    }

    const files = await fs.readdir(this.directory);
    const statuses: ModelStatus[] = [];

    for (const file of files) {
      if (!file.endsWith('.json') || file.startsWith('.')) continue;
      const record = await readJsonSafe(path.join(this.directory, file), undefined, isModelStatusRecord);
      if (record) {
        statuses.push(fromRecord(record));
      }
    }

    return statuses.sort((a, b) => a.model.localeCompare(b.model));
  }

  async cleanupTempFiles(maxAgeMs?: number): Promise<number> {
    return cleanupOrphanedTempFiles(this.directory, maxAgeMs);
  }
}

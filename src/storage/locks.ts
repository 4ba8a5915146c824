import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

export interface LockOptions {
  staleMs?: number;
  retryIntervalMs?: number;
  maxRetries?: number;
}

export class LockTimeoutError extends Error {
  constructor(public lockPath: string, retries: number) {
    super(`Failed to acquire lock for ${lockPath} after ${retries} retries`);
    this.name = 'LockTimeoutError';
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * Executes a function within a file-based lock.
 * This prevents multiple processes on the same filesystem from running the same code.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const {
    staleMs = 60000, // 1 minute default
    retryIntervalMs = 1000,
    maxRetries = 30 // Wait up to 30 seconds by default
  } = options;

  await fs.ensureDir(path.dirname(lockPath));

  let retries = 0;
  while (retries < maxRetries) {
    if (await acquireLock(lockPath, staleMs)) {
      try {
        return await fn();
      } finally {
        await releaseLock(lockPath);
      }
    }

    retries++;
    if (retries < maxRetries) {
      await new Promise((resolve) => setTimeout(resolve, retryIntervalMs));
    }
  }

  throw new LockTimeoutError(lockPath, maxRetries);
}

async function acquireLock(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    // 'wx' means: Open for writing. Fails if the path exists.
    await fs.writeFile(lockPath, JSON.stringify({ pid: process.pid, createdAt: Date.now() }), { flag: 'wx' });
    return true;
  } catch (error) {
    if (!hasErrorCode(error, 'EEXIST')) {
      logger.error(`Error during lock operation for ${lockPath}: ${error}`);
      throw error;
    }

    try {
      const stats = await fs.stat(lockPath);
      const age = Date.now() - stats.mtimeMs;

      if (age > staleMs) {
        logger.warn(`Lock file ${lockPath} is stale (age: ${age}ms). Breaking lock.`);
        await fs.remove(lockPath);
        // Retried on the next loop iteration
      }
    } catch (statError) {
      // Deleted between EEXIST and stat; the next attempt will tell
      logger.debug(`Lock ${lockPath} vanished before stat: ${statError}`);
    }
    return false;
  }
}

async function releaseLock(lockPath: string): Promise<void> {
  try {
    if (await fs.pathExists(lockPath)) {
      await fs.remove(lockPath);
    }
  } catch (error) {
    logger.error(`Failed to release lock at ${lockPath}: ${error}`);
  }
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

const TEMP_FILE_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const TEMP_FILE_PATTERN = /\.tmp\.\d+\.\d+\.\d+$/; // Matches .tmp.{pid}.{timestamp}.{seq}

let tempSequence = 0;

export type Validator<T> = (data: unknown) => data is T;

export function tempPathFor(filePath: string): string {
  tempSequence += 1;
  return `${filePath}.tmp.${process.pid}.${Date.now()}.${tempSequence}`;
}

export function isTempFile(fileName: string): boolean {
  return TEMP_FILE_PATTERN.test(fileName);
}

/**
 * Reads a JSON file safely.
 * A missing or empty file yields the default. An unparsable or invalid file is
 * moved aside to `<file>.corrupt.<ts>`, logged, and also yields the default.
 */
export async function readJsonSafe<T, D = T>(
  filePath: string,
  defaultValue: D,
  validateFn: Validator<T>
): Promise<T | D> {
  try {
    if (!(await fs.pathExists(filePath))) {
      return defaultValue;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    if (!content.trim()) {
      return defaultValue;
    }

    const data: unknown = JSON.parse(content);

    if (!validateFn(data)) {
      throw new Error('Schema validation failed');
    }

    return data;
  } catch (error) {
    logger.warn(`Failed to read JSON at ${filePath}: ${error}. Moving it aside and returning default.`);
    await backupCorruptFile(filePath);
    return defaultValue;
  }
}

/**
 * Writes JSON to a file atomically.
 * 1) Write to temp file
 * 2) fsync (best effort)
 * 3) Rename to target
 */
export async function writeJsonAtomic<T>(filePath: string, data: T): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);

  const tempPath = tempPathFor(filePath);

  try {
    await fs.writeFile(tempPath, content, 'utf-8');

    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write atomically to ${filePath}: ${error}`);
    if (await fs.pathExists(tempPath)) {
      await fs.remove(tempPath).catch((removeError: unknown) => {
        logger.warn(`Could not remove temp file ${tempPath}: ${removeError}`);
      });
    }
    throw error;
  }
}

/**
 * Appends complete lines in a single write call. Callers pass records that are
 * already serialized; embedded newlines are rejected.
 */
export async function appendLines(filePath: string, lines: string[]): Promise<void> {
  if (lines.length === 0) return;
  for (const line of lines) {
    if (line.includes('\n')) {
      throw new Error(`Refusing to append a multi-line record to ${filePath}`);
    }
  }
  await fs.ensureDir(path.dirname(filePath));
  await fs.appendFile(filePath, lines.join('\n') + '\n', 'utf-8');
}

async function backupCorruptFile(filePath: string): Promise<void> {
  try {
    if (await fs.pathExists(filePath)) {
      const backupPath = `${filePath}.corrupt.${Date.now()}`;
      // Moved so later reads see no file and do not back it up again
      await fs.move(filePath, backupPath);
      logger.info(`Corrupt file moved to ${backupPath}`);
    }
  } catch (backupError) {
    logger.error(`Failed to backup corrupt file ${filePath}: ${backupError}`);
  }
}

/**
 * Cleans up orphaned temp files left behind by interrupted atomic writes.
 *
 * @param directory - Directory to scan for orphaned temp files
 * @param maxAgeMs - Age after which a temp file is considered orphaned (default: 1 hour)
 * @returns Number of files cleaned up
 */
export async function cleanupOrphanedTempFiles(
  directory: string,
  maxAgeMs: number = TEMP_FILE_MAX_AGE_MS
): Promise<number> {
  let cleanedCount = 0;
  const now = Date.now();

  try {
    if (!(await fs.pathExists(directory))) {
      return 0;
    }

    const entries = await fs.readdir(directory, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        cleanedCount += await cleanupOrphanedTempFiles(fullPath, maxAgeMs);
      } else if (entry.isFile() && isTempFile(entry.name)) {
        try {
          const stat = await fs.stat(fullPath);
          const fileAge = now - stat.mtimeMs;

          if (fileAge > maxAgeMs) {
            await fs.remove(fullPath);
            cleanedCount++;
            logger.debug(`Cleaned up orphaned temp file: ${fullPath} (age: ${Math.round(fileAge / 1000)}s)`);
          }
        } catch (statError) {
          // Another process may have renamed or removed it
          logger.debug(`Could not stat temp file ${fullPath}: ${statError}`);
        }
      }
    }
  } catch (error) {
    logger.warn(`Error during orphaned temp file cleanup in ${directory}: ${error}`);
  }

  return cleanedCount;
}

import * as fs from 'fs-extra';
import * as path from 'path';
import { MonitorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';

const FILE_MODE = 0o644;
const DIR_MODE = 0o755;

export interface PublishResult {
  destination: string;
  files: number;
}

async function listFiles(directory: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
    const fullPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Copies a generated dashboard into a web-served directory.
 */
export class DashboardPublisher {
  async publish(sourceDir: string, destination: string): Promise<PublishResult> {
    if (!(await fs.pathExists(path.join(sourceDir, 'index.html')))) {
      throw new MonitorError(`No dashboard found in ${sourceDir}`, 'DASHBOARD_MISSING');
    }

    const target = path.resolve(destination);
    await fs.ensureDir(target);
    await fs.copy(sourceDir, target, { overwrite: true });

    // Web servers often run as another user
    const copied = await listFiles(target);
    for (const file of copied) {
      await fs.chmod(file, FILE_MODE);
    }
    await fs.chmod(target, DIR_MODE);
    for (const dir of new Set(copied.map(file => path.dirname(file)))) {
      await fs.chmod(dir, DIR_MODE);
    }

    logger.info(`Dashboard deployed to ${target} (${copied.length} file(s))`);
    return { destination: target, files: copied.length };
  }
}

import * as path from 'path';
import { ModelStatus, toRecord } from '../status/modelStatus';
import { modelToFilename } from '../status/statusStore';
import { writeFileAtomic } from '../storage/jsonStore';
import { logger } from '../utils/logger';
import { DashboardData, FailureItem } from './dashboardBuilder';

export interface ArtifactOptions {
  /** Repository hosting the scenario scripts; links are omitted when empty. */
  repoUrl: string;
  branch: string;
}

export interface Reproduction {
  command: string;
  url: string | null;
}

export interface FailureWithReproduction extends FailureItem {
  reproduce: Reproduction;
}

export interface ArtifactFile {
  /** Relative to the output directory, always with forward slashes. */
  path: string;
  content: string;
}

export const INDEX_FILE = 'index.html';
export const STATUS_DATA_FILE = 'data/status.json';
export const MODEL_DATA_DIR = 'data/models';

export function reproductionFor(model: string, scenario: string, options: ArtifactOptions): Reproduction {
  const script = `scenarios/${scenario}.py`;
  const repoUrl = options.repoUrl.replace(/\/+$/, '');
  return {
    command: `python ${script} --model ${model}`,
    url: repoUrl ? `${repoUrl}/blob/${options.branch}/${script}` : null,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Fills the `{{generatedAt}}` and `{{modelCount}}` placeholders. Everything
 * else on the page is rendered client-side from data/status.json.
 */
export function renderIndex(template: string, data: DashboardData): string {
  return template
    .replace(/\{\{generatedAt\}\}/g, escapeHtml(data.generatedAt))
    .replace(/\{\{modelCount\}\}/g, String(data.models.length));
}

export function buildArtifactSet(
  data: DashboardData,
  statuses: readonly ModelStatus[],
  template: string,
  options: ArtifactOptions
): ArtifactFile[] {
  const statusData = {
    ...data,
    failures: data.failures.map<FailureWithReproduction>(failure => ({
      ...failure,
      reproduce: reproductionFor(failure.model, failure.scenario, options),
    })),
  };

  const files: ArtifactFile[] = [
    { path: INDEX_FILE, content: renderIndex(template, data) },
    { path: STATUS_DATA_FILE, content: JSON.stringify(statusData, null, 2) },
  ];

  const sorted = [...statuses].sort((a, b) => (a.model < b.model ? -1 : a.model > b.model ? 1 : 0));
  for (const status of sorted) {
    files.push({
      path: `${MODEL_DATA_DIR}/${modelToFilename(status.model)}`,
      content: JSON.stringify(toRecord(status), null, 2),
    });
  }

  return files;
}

export async function writeArtifactSet(directory: string, files: readonly ArtifactFile[]): Promise<string[]> {
  const written: string[] = [];
  for (const file of files) {
    const target = path.join(directory, ...file.path.split('/'));
    await writeFileAtomic(target, file.content);
    written.push(target);
  }
  logger.info(`Wrote ${written.length} dashboard file(s) to ${directory}`);
  return written;
}

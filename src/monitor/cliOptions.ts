import { MonitorConfig } from '../config/config';
import { MonitorError } from '../utils/errorHandler';
import { MonitorMode, RunOptions } from './monitorRunner';

export interface CliOptions {
  cycle?: boolean;
  maxModels?: string;
  resultsDir?: string;
  statusOnly?: boolean;
  showStatus?: boolean;
  dashboard?: boolean;
  dashboardOnly?: boolean;
  deploy?: string;
  save?: boolean;
  output?: string;
  config?: string;
}

export function resolveMode(options: CliOptions): MonitorMode {
  if (options.statusOnly) return 'status-only';
  if (options.showStatus) return 'show-status';
  if (options.dashboardOnly) return 'dashboard-only';
  if (options.cycle) return 'cycle';
  return 'full';
}

/**
 * Applies command-line overrides on top of the loaded configuration.
 */
export function applyOverrides(config: MonitorConfig, options: CliOptions): MonitorConfig {
  let result = config;

  if (options.resultsDir) {
    result = { ...result, storage: { ...result.storage, resultsDir: options.resultsDir } };
  }

  if (options.maxModels !== undefined) {
    const maxModels = Number(options.maxModels);
    if (!Number.isInteger(maxModels) || maxModels < 0) {
      throw new MonitorError(`--max-models must be a non-negative integer, got "${options.maxModels}"`, 'INVALID_OPTION');
    }
    result = { ...result, discovery: { ...result.discovery, maxExtraPerArchitecture: maxModels } };
  }

  return result;
}

export function toRunOptions(options: CliOptions): RunOptions {
  const runOptions: RunOptions = { mode: resolveMode(options) };
  if (options.dashboard) runOptions.dashboard = true;
  if (options.deploy) runOptions.deployTo = options.deploy;
  // commander sets `save` to true unless --no-save is given; keep the configured default then
  if (options.save === false) runOptions.save = false;
  if (options.output) runOptions.outputFile = options.output;
  return runOptions;
}

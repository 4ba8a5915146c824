import chalk from 'chalk';
import { FabricModel, isAvailable } from '../catalog/fabricStatusClient';
import { ModelStatus } from '../status/modelStatus';
import { STATUS_LEVELS, StatusLevel } from '../status/severity';

export interface ReportOptions {
  color?: boolean;
}

const STATUS_COLORS: Record<StatusLevel, (text: string) => string> = {
  OK: chalk.green,
  SLOW: chalk.yellow,
  DEGRADED: chalk.magenta,
  FAILED: chalk.red,
  UNAVAILABLE: chalk.gray,
};

function paint(status: StatusLevel, text: string, options: ReportOptions): string {
  return options.color === false ? text : STATUS_COLORS[status](text);
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * One line per model, then one indented line per scenario.
 */
export function formatStatusTable(statuses: readonly ModelStatus[], options: ReportOptions = {}): string[] {
  if (statuses.length === 0) {
    return ['No model statuses recorded yet.'];
  }

  const width = Math.max(...statuses.map(status => status.model.length));
  const lines: string[] = [];

  for (const status of statuses) {
    lines.push(`${status.model.padEnd(width)}  ${paint(status.overallStatus, status.overallStatus, options)}  last all OK: ${status.lastAllOk || 'never'}`);
    for (const name of Object.keys(status.scenarios).sort()) {
      const scenario = status.scenarios[name];
      const category = scenario.errorCategory ? ` [${scenario.errorCategory}]` : '';
      lines.push(`  ${name}: ${paint(scenario.status, scenario.status, options)} (${seconds(scenario.durationMs)})${category}`);
    }
  }

  return lines;
}

export function formatHotModels(models: readonly FabricModel[]): string[] {
  if (models.length === 0) {
    return ['No models are currently deployed.'];
  }
  const lines = [`${models.length} deployed model(s):`];
  for (const model of models) {
    const size = model.nParams !== null ? ` ${(model.nParams / 1e9).toFixed(1)}B` : '';
    const state = isAvailable(model) ? '' : ` (${model.applicationState.toLowerCase()})`;
    lines.push(`  ${model.id} [${model.deploymentLevel}] ${model.architecture}${size}${state}`);
  }
  return lines;
}

export function formatSummary(summary: Record<StatusLevel, number>, options: ReportOptions = {}): string {
  return STATUS_LEVELS
    .filter(level => summary[level] > 0)
    .map(level => paint(level, `${level}: ${summary[level]}`, options))
    .join(', ') || 'no results';
}

import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { isModelArchitecture, ModelArchitecture } from '../catalog/architecture';
import { LockOptions } from '../storage/locks';
import { AllOkPolicy } from '../status/modelStatus';
import { isRecord, isStringArray } from '../utils/guards';
import { logger } from '../utils/logger';
import { monitoringDefaults } from './monitoring';

dotenv.config();

export interface ScenarioDefinition {
  name: string;
  description: string;
  timeoutMs: number;
  slowThresholdMs?: number;
  /** Only run on these architecture families; all models when absent. */
  architectures?: ModelArchitecture[];
}

export interface RunnerConfig {
  command: string;
  args: string[];
  env: Record<string, string>;
  partialMarker: string;
  workingDir?: string;
}

export interface DiscoveryConfig {
  statusUrl: string;
  timeoutMs: number;
  maxExtraPerArchitecture: number;
  includeExtraHot: boolean;
}

export interface DashboardConfig {
  days: number;
  timezone: string;
  failureLimit: number;
  failureWindowDays: number;
  repoUrl: string;
  branch: string;
  templatePath: string;
}

export interface StorageConfig {
  resultsDir: string;
  lock: LockOptions;
  cycleLock: LockOptions;
}

export interface MonitorConfig {
  baselineModels: string[];
  scenarios: ScenarioDefinition[];
  runner: RunnerConfig;
  discovery: DiscoveryConfig;
  dashboard: DashboardConfig;
  storage: StorageConfig;
  allOkPolicy: AllOkPolicy;
  saveRunLog: boolean;
}

// Environment variables that may be missing without failing the load
const OPTIONAL_ENV_VARS = new Set([
  'FABRIC_API_KEY',
  'HF_TOKEN',
  'DASHBOARD_REPO_URL',
]);

export function resolveEnvValue(value: string, required: boolean = true): string {
  if (value.startsWith('env:')) {
    const envKey = value.substring(4);
    const envValue = process.env[envKey];

    const isOptional = OPTIONAL_ENV_VARS.has(envKey);

    if (envValue === undefined || envValue === '') {
      if (required && !isOptional) {
        throw new Error(`Environment variable ${envKey} is not set`);
      }
      return '';
    }
    return envValue;
  }
  return value;
}

export function resolveEnvObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item));
  }
  if (isRecord(value)) {
    const resolved: Record<string, unknown> = {};
    for (const key of Object.keys(value)) {
      resolved[key] = resolveEnvObject(value[key]);
    }
    return resolved;
  }
  return value;
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function str(source: Record<string, unknown>, key: string, fallback: string): string {
  const value = source[key];
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function num(source: Record<string, unknown>, key: string, fallback: number): number {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function bool(source: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = source[key];
  return typeof value === 'boolean' ? value : fallback;
}

function lockOptions(source: Record<string, unknown>, fallback: Required<LockOptions>): Required<LockOptions> {
  return {
    staleMs: num(source, 'staleMs', fallback.staleMs),
    retryIntervalMs: num(source, 'retryIntervalMs', fallback.retryIntervalMs),
    maxRetries: num(source, 'maxRetries', fallback.maxRetries),
  };
}

function parseScenarios(value: unknown): ScenarioDefinition[] {
  if (!Array.isArray(value) || value.length === 0) {
    return monitoringDefaults.scenarios.map(s => ({ ...s }));
  }
  const scenarios: ScenarioDefinition[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.name !== 'string' || !item.name) {
      logger.warn(`Ignoring malformed scenario definition: ${JSON.stringify(item)}`);
      continue;
    }
    const scenario: ScenarioDefinition = {
      name: item.name,
      description: str(item, 'description', item.name),
      timeoutMs: num(item, 'timeoutMs', 90 * 1000),
    };
    if (typeof item.slowThresholdMs === 'number') {
      scenario.slowThresholdMs = item.slowThresholdMs;
    }
    if (Array.isArray(item.architectures)) {
      const architectures = item.architectures.filter(isModelArchitecture);
      if (architectures.length !== item.architectures.length) {
        logger.warn(`Scenario ${item.name}: ignoring unknown architectures in ${JSON.stringify(item.architectures)}`);
      }
      scenario.architectures = architectures;
    }
    scenarios.push(scenario);
  }
  return scenarios;
}

function parseEnvMap(value: unknown): Record<string, string> {
  const env: Record<string, string> = {};
  if (!isRecord(value)) return env;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' && entry !== '') {
      env[key] = entry;
    }
  }
  return env;
}

/**
 * Applies defaults to a parsed (and env-resolved) configuration document.
 */
export function buildConfig(raw: unknown): MonitorConfig {
  const source = isRecord(raw) ? raw : {};
  const runner = section(source, 'runner');
  const discovery = section(source, 'discovery');
  const dashboard = section(source, 'dashboard');
  const storage = section(source, 'storage');
  const defaults = monitoringDefaults;

  const runnerConfig: RunnerConfig = {
    command: str(runner, 'command', defaults.runner.command),
    args: isStringArray(runner.args) ? runner.args : [...defaults.runner.args],
    env: parseEnvMap(runner.env),
    partialMarker: str(runner, 'partialMarker', defaults.runner.partialMarker),
  };
  if (typeof runner.workingDir === 'string' && runner.workingDir) {
    runnerConfig.workingDir = runner.workingDir;
  }

  return {
    baselineModels: isStringArray(source.baselineModels) ? source.baselineModels : [...defaults.baselineModels],
    scenarios: parseScenarios(source.scenarios),
    runner: runnerConfig,
    discovery: {
      statusUrl: str(discovery, 'statusUrl', defaults.discovery.statusUrl),
      timeoutMs: num(discovery, 'timeoutMs', defaults.discovery.timeoutMs),
      maxExtraPerArchitecture: num(discovery, 'maxExtraPerArchitecture', defaults.discovery.maxExtraPerArchitecture),
      includeExtraHot: bool(discovery, 'includeExtraHot', defaults.discovery.includeExtraHot),
    },
    dashboard: {
      days: num(dashboard, 'days', defaults.dashboard.days),
      timezone: str(dashboard, 'timezone', defaults.dashboard.timezone),
      failureLimit: num(dashboard, 'failureLimit', defaults.dashboard.failureLimit),
      failureWindowDays: num(dashboard, 'failureWindowDays', defaults.dashboard.failureWindowDays),
      repoUrl: typeof dashboard.repoUrl === 'string' ? dashboard.repoUrl : defaults.dashboard.repoUrl,
      branch: str(dashboard, 'branch', defaults.dashboard.branch),
      templatePath: str(dashboard, 'templatePath', defaults.dashboard.templatePath),
    },
    storage: {
      resultsDir: str(storage, 'resultsDir', defaults.storage.resultsDir),
      lock: lockOptions(section(storage, 'lock'), defaults.storage.lock),
      cycleLock: lockOptions(section(storage, 'cycleLock'), defaults.storage.cycleLock),
    },
    allOkPolicy: source.allOkPolicy === 'passing' ? 'passing' : defaults.allOkPolicy,
    saveRunLog: bool(source, 'saveRunLog', defaults.saveRunLog),
  };
}

/**
 * Loads config/monitor.json (or the example file), resolving `env:NAME` values.
 */
export function loadConfig(configPath?: string): MonitorConfig {
  const candidates = configPath
    ? [path.resolve(configPath)]
    : [
      path.join(process.cwd(), 'config', 'monitor.json'),
      path.join(process.cwd(), 'config', 'monitor.example.json'),
    ];

  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    if (configPath) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    logger.warn('No configuration file found; using built-in defaults.');
    return buildConfig({});
  }
  if (found.endsWith('monitor.example.json')) {
    logger.warn('Using example config file. Please create config/monitor.json for production.');
  }

  const raw: unknown = fs.readJsonSync(found);
  return buildConfig(resolveEnvObject(raw));
}

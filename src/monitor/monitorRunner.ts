import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { detectArchitecture } from '../catalog/architecture';
import { HotModelSource } from '../catalog/fabricStatusClient';
import { loadCatalog } from '../catalog/modelCatalog';
import { MonitorConfig, ScenarioDefinition } from '../config/config';
import { buildArtifactSet, writeArtifactSet } from '../dashboard/artifacts';
import { buildDashboardData } from '../dashboard/dashboardBuilder';
import { DashboardPublisher } from '../deployment/dashboardPublisher';
import { HistoryLog } from '../history/historyLog';
import { ScenarioRunner, ScenarioRunResult } from '../scenarios/contracts';
import { CycleScheduler } from '../scheduler/cycleScheduler';
import { classifyWithCategory, ScenarioThresholds } from '../status/classifier';
import { ScenarioResult } from '../status/modelStatus';
import { emptyStatusCounts, StatusLevel } from '../status/severity';
import { StatusStore } from '../status/statusStore';
import { writeJsonAtomic } from '../storage/jsonStore';
import { Clock, runStamp, systemClock, toUtcISO } from '../time/timeUtils';
import { ErrorCategory } from '../utils/errorCategorizer';
import { CycleBusyError, errorMessage, handleError, MonitorError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { formatHotModels, formatStatusTable, formatSummary } from './statusReport';

export type MonitorMode = 'full' | 'cycle' | 'status-only' | 'dashboard-only' | 'show-status';

export interface ResultsLayout {
  root: string;
  models: string;
  history: string;
  cycleState: string;
  runs: string;
  dashboard: string;
}

export function resultsLayout(resultsDir: string): ResultsLayout {
  const root = path.resolve(resultsDir);
  return {
    root,
    models: path.join(root, 'models'),
    history: path.join(root, 'history.jsonl'),
    cycleState: path.join(root, '.cycle_state.json'),
    runs: path.join(root, 'runs'),
    dashboard: path.join(root, 'dashboard'),
  };
}

export interface TestRecord {
  model: string;
  scenario: string;
  status: StatusLevel;
  durationMs: number;
  errorCategory?: ErrorCategory;
  errorDetail?: string;
}

export interface ModelFailure {
  model: string;
  error: string;
}

export interface MonitorRun {
  runId: string;
  mode: 'full' | 'cycle';
  startedAt: string;
  durationSeconds: number;
  models: string[];
  tests: TestRecord[];
  /** Models whose testing stopped on an unexpected error, such as a failed status write. */
  errors: ModelFailure[];
  summary: Record<StatusLevel, number>;
  discoveryError?: string;
}

export interface RunOptions {
  mode: MonitorMode;
  /** Rebuild the dashboard after a test run. */
  dashboard?: boolean;
  /** Copy the generated dashboard here. */
  deployTo?: string;
  /** Write the run log; defaults to the configured `saveRunLog`. */
  save?: boolean;
  /** Run log file name, resolved against the runs directory. */
  outputFile?: string;
}

export interface MonitorOutcome {
  exitCode: number;
  run?: MonitorRun;
  runLogPath?: string;
  dashboardFiles?: string[];
  /** Set when a cycle run found another invocation holding the pointer. */
  skipped?: boolean;
}

export interface MonitorDependencies {
  config: MonitorConfig;
  runner: ScenarioRunner;
  hotModels: HotModelSource;
  publisher?: DashboardPublisher;
  clock?: Clock;
  host?: string;
  /** Receives user-facing report lines; console by default. */
  print?: (line: string) => void;
}

export function scenarioThresholds(scenarios: readonly ScenarioDefinition[]): ScenarioThresholds {
  const thresholds: Record<string, number> = {};
  for (const scenario of scenarios) {
    if (scenario.slowThresholdMs !== undefined) {
      thresholds[scenario.name] = scenario.slowThresholdMs;
    }
  }
  return thresholds;
}

/**
 * Scenarios that apply to a model; a scenario with `architectures` only runs
 * on those families.
 */
export function scenariosFor(model: string, scenarios: readonly ScenarioDefinition[]): ScenarioDefinition[] {
  const architecture = detectArchitecture(model);
  return scenarios.filter(scenario => !scenario.architectures || scenario.architectures.includes(architecture));
}

export function hasBlockingFailure(tests: readonly TestRecord[]): boolean {
  return tests.some(test => test.status === 'FAILED' || test.status === 'UNAVAILABLE');
}

export class MonitorRunner {
  readonly layout: ResultsLayout;
  readonly statusStore: StatusStore;
  readonly historyLog: HistoryLog;
  readonly scheduler: CycleScheduler;

  private config: MonitorConfig;
  private runner: ScenarioRunner;
  private hotModels: HotModelSource;
  private publisher: DashboardPublisher;
  private clock: Clock;
  private host: string;
  private print: (line: string) => void;
  private thresholds: ScenarioThresholds;

  constructor(deps: MonitorDependencies) {
    this.config = deps.config;
    this.runner = deps.runner;
    this.hotModels = deps.hotModels;
    this.publisher = deps.publisher || new DashboardPublisher();
    this.clock = deps.clock || systemClock;
    this.host = deps.host ?? os.hostname();
    this.print = deps.print || ((line: string) => console.log(line));
    this.thresholds = scenarioThresholds(this.config.scenarios);

    this.layout = resultsLayout(this.config.storage.resultsDir);
    this.statusStore = new StatusStore(
      this.layout.models,
      { allOkPolicy: this.config.allOkPolicy, requiredScenarios: this.config.scenarios.map(s => s.name) },
      this.config.storage.lock
    );
    this.historyLog = new HistoryLog(this.layout.history);
    this.scheduler = new CycleScheduler(this.layout.cycleState, this.config.storage.cycleLock, this.clock);
  }

  async run(options: RunOptions): Promise<MonitorOutcome> {
    switch (options.mode) {
      case 'status-only':
        return this.showHotModels();
      case 'show-status':
        return this.showStatus();
      case 'dashboard-only': {
        const dashboardFiles = await this.generateDashboard(options.deployTo);
        return { exitCode: 0, dashboardFiles };
      }
      case 'full':
      case 'cycle':
        return this.runTests(options.mode, options);
    }
  }

  /**
   * Runs every applicable scenario against one model, persisting each result
   * before the next scenario starts. Records are pushed onto `tests` as they
   * complete so they survive a later exception.
   */
  async testModel(model: string, runId: string, tests: TestRecord[]): Promise<void> {
    const scenarios = scenariosFor(model, this.config.scenarios);
    const requiredScenarios = scenarios.map(s => s.name);
    logger.info(`Testing ${model}`);

    for (const scenario of scenarios) {
      const outcome = await this.runScenario(model, scenario);
      const { status, errorCategory } = classifyWithCategory(
        scenario.name,
        outcome.outcome,
        outcome.durationMs,
        this.thresholds,
        outcome.errorDetail
      );
      const checkedAt = toUtcISO(this.clock());

      const result: ScenarioResult = { scenario: scenario.name, status, durationMs: outcome.durationMs, checkedAt };
      if (errorCategory) result.errorCategory = errorCategory;
      if (outcome.errorDetail) result.errorDetail = outcome.errorDetail;

      await this.statusStore.update(model, result, requiredScenarios);
      await this.historyLog.append({
        timestamp: checkedAt,
        runId,
        model,
        scenario: scenario.name,
        status,
        durationMs: outcome.durationMs,
        errorCategory,
        errorDetail: outcome.errorDetail,
        host: this.host || undefined,
      });

      const record: TestRecord = { model, scenario: scenario.name, status, durationMs: outcome.durationMs };
      if (errorCategory) record.errorCategory = errorCategory;
      if (outcome.errorDetail) record.errorDetail = outcome.errorDetail;
      tests.push(record);

      const log = status === 'OK' || status === 'SLOW' ? logger.info.bind(logger) : logger.warn.bind(logger);
      log(`  ${scenario.name}: ${status} (${(outcome.durationMs / 1000).toFixed(1)}s)${errorCategory ? ` [${errorCategory}]` : ''}`);
    }
  }

  /**
   * A runner that rejects still produces an error result for the scenario.
   */
  private async runScenario(model: string, scenario: ScenarioDefinition): Promise<ScenarioRunResult> {
    const started = this.clock();
    try {
      return await this.runner.run(model, scenario);
    } catch (error) {
      logger.debug(`Scenario runner threw for ${model}:${scenario.name}: ${errorMessage(error)}`);
      return {
        outcome: 'error',
        durationMs: Math.max(0, Math.round(this.clock().diff(started).as('milliseconds'))),
        errorDetail: errorMessage(error),
      };
    }
  }

  private async testModelIsolated(
    model: string,
    runId: string,
    tests: TestRecord[],
    errors: ModelFailure[]
  ): Promise<void> {
    try {
      await this.testModel(model, runId, tests);
    } catch (error) {
      handleError(error, `test ${model}`);
      errors.push({ model, error: errorMessage(error) });
    }
  }

  private async runTests(mode: 'full' | 'cycle', options: RunOptions): Promise<MonitorOutcome> {
    const started = this.clock();
    const runId = runStamp(started);
    const tests: TestRecord[] = [];
    const errors: ModelFailure[] = [];

    await this.statusStore.cleanupTempFiles();

    const catalog = await loadCatalog(this.hotModels, this.config.baselineModels, {
      maxExtraPerArchitecture: this.config.discovery.maxExtraPerArchitecture,
      includeExtraHot: this.config.discovery.includeExtraHot,
    });

    let models: string[];
    if (mode === 'full') {
      models = await this.scheduler.selectNext(catalog.models, 'full');
      logger.info(`Full run ${runId}: ${models.length} model(s)`);
      for (const model of models) {
        await this.testModelIsolated(model, runId, tests, errors);
      }
    } else {
      try {
        const cycle = await this.scheduler.runCycle(catalog.models, model =>
          this.testModelIsolated(model, runId, tests, errors));
        models = cycle ? [cycle.model] : [];
      } catch (error) {
        if (error instanceof CycleBusyError) {
          handleError(error, 'cycle');
          return { exitCode: 0, skipped: true };
        }
        throw error;
      }
    }

    const summary = emptyStatusCounts();
    for (const test of tests) {
      summary[test.status] += 1;
    }

    const run: MonitorRun = {
      runId,
      mode,
      startedAt: toUtcISO(started),
      durationSeconds: Math.round(this.clock().diff(started).as('seconds') * 10) / 10,
      models,
      tests,
      errors,
      summary,
    };
    if (catalog.discoveryError) run.discoveryError = catalog.discoveryError;

    this.print(`Run ${runId}: ${tests.length} test(s) on ${models.length} model(s); ${formatSummary(summary)}`);

    const outcome: MonitorOutcome = {
      exitCode: hasBlockingFailure(tests) || errors.length > 0 ? 1 : 0,
      run,
    };

    if (options.save ?? this.config.saveRunLog) {
      outcome.runLogPath = await this.saveRunLog(run, options.outputFile);
    }

    if (options.dashboard || options.deployTo) {
      outcome.dashboardFiles = await this.generateDashboard(options.deployTo);
    }

    return outcome;
  }

  async saveRunLog(run: MonitorRun, outputFile?: string): Promise<string> {
    const filePath = path.resolve(this.layout.runs, outputFile || `run_${run.runId}.json`);
    await writeJsonAtomic(filePath, run);
    logger.info(`Run log saved to ${filePath}`);
    return filePath;
  }

  /**
   * Rebuilds the dashboard from the stored statuses and history, optionally
   * deploying it.
   */
  async generateDashboard(deployTo?: string): Promise<string[]> {
    const templatePath = path.resolve(this.config.dashboard.templatePath);
    if (!(await fs.pathExists(templatePath))) {
      throw new MonitorError(`Dashboard template not found: ${templatePath}`, 'TEMPLATE_MISSING');
    }

    const template = await fs.readFile(templatePath, 'utf-8');
    const statuses = await this.statusStore.list();
    const history = await this.historyLog.load();
    const { days, timezone, failureLimit, failureWindowDays, repoUrl, branch } = this.config.dashboard;

    const data = buildDashboardData(statuses, history, {
      now: this.clock(),
      days,
      timezone,
      failureLimit,
      failureWindowDays,
    });
    const files = buildArtifactSet(data, statuses, template, { repoUrl, branch });
    const written = await writeArtifactSet(this.layout.dashboard, files);

    if (deployTo) {
      await this.publisher.publish(this.layout.dashboard, deployTo);
    }

    return written;
  }

  private async showHotModels(): Promise<MonitorOutcome> {
    try {
      const models = await this.hotModels.listModels({ hotOnly: true });
      formatHotModels(models).forEach(line => this.print(line));
      return { exitCode: 0 };
    } catch (error) {
      handleError(error, 'status');
      return { exitCode: 1 };
    }
  }

  private async showStatus(): Promise<MonitorOutcome> {
    const statuses = await this.statusStore.list();
    formatStatusTable(statuses).forEach(line => this.print(line));
    return { exitCode: 0 };
  }
}

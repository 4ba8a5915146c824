#!/usr/bin/env node
import { Command } from 'commander';
import { FabricStatusClient } from './catalog/fabricStatusClient';
import { loadConfig } from './config/config';
import { applyOverrides, CliOptions, toRunOptions } from './monitor/cliOptions';
import { MonitorRunner } from './monitor/monitorRunner';
import { CommandScenarioRunner } from './scenarios/commandScenarioRunner';
import { handleError } from './utils/errorHandler';

const program = new Command();

program
  .name('inference-monitor')
  .description('Health monitor for models served by a remote inference fabric')
  .version('1.0.0')
  .option('--cycle', 'test one model per invocation, round-robin over the catalog')
  .option('--max-models <n>', 'extra hot models per architecture beyond the baseline')
  .option('--results-dir <dir>', 'directory for status files, history and dashboard')
  .option('--status-only', 'list models currently deployed on the fabric and exit')
  .option('--show-status', 'print the stored status of every tracked model and exit')
  .option('--dashboard', 'rebuild the dashboard after testing')
  .option('--dashboard-only', 'rebuild the dashboard from stored results without testing')
  .option('--deploy <path>', 'copy the generated dashboard to this directory')
  .option('--no-save', 'do not write a run log')
  .option('--output <file>', 'run log file name, relative to the runs directory')
  .option('--config <path>', 'configuration file (default: config/monitor.json)')
  .action(async (options: CliOptions) => {
    try {
      const config = applyOverrides(loadConfig(options.config), options);
      const monitor = new MonitorRunner({
        config,
        runner: new CommandScenarioRunner(config.runner),
        hotModels: new FabricStatusClient(config.discovery.statusUrl, config.discovery.timeoutMs),
      });
      const outcome = await monitor.run(toRunOptions(options));
      process.exit(outcome.exitCode);
    } catch (error) {
      handleError(error, 'monitor');
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  handleError(error, 'cli');
  process.exit(1);
});

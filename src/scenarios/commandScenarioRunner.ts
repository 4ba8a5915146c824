import { spawn, SpawnOptions } from 'child_process';
import kill from 'tree-kill';
import { RunnerConfig, ScenarioDefinition } from '../config/config';
import { modelToFilename } from '../status/statusStore';
import { logger } from '../utils/logger';
import { ScenarioRunner, ScenarioRunResult } from './contracts';

const OUTPUT_TAIL_CHARS = 2000;

function tail(text: string, limit: number = OUTPUT_TAIL_CHARS): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(trimmed.length - limit) : trimmed;
}

export function substitutePlaceholders(arg: string, model: string, scenario: string): string {
  return arg
    .replace(/\{model\}/g, model)
    .replace(/\{scenario\}/g, scenario)
    .replace(/\{modelFile\}/g, modelToFilename(model).replace(/\.json$/, ''));
}

/**
 * Finds the partial-result marker line in scenario stdout, if any.
 */
export function findPartialMarker(stdout: string, marker: string): string | undefined {
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith(marker)) {
      return trimmed.substring(marker.length).trim() || 'Partial result';
    }
  }
  return undefined;
}

/**
 * Runs each scenario as a child process:
 * exit 0 is success (or partial when stdout carries the marker line),
 * anything else is an error carrying the tail of stderr/stdout.
 */
export class CommandScenarioRunner implements ScenarioRunner {
  constructor(private config: RunnerConfig) {}

  run(model: string, scenario: ScenarioDefinition): Promise<ScenarioRunResult> {
    const args = this.config.args.map(arg => substitutePlaceholders(arg, model, scenario.name));
    const spawnOptions: SpawnOptions = {
      cwd: this.config.workingDir || process.cwd(),
      env: { ...process.env, ...this.config.env, MONITOR_MODEL: model, MONITOR_SCENARIO: scenario.name },
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    };

    logger.debug(`Running ${scenario.name} for ${model}: ${this.config.command} ${args.join(' ')}`);

    const start = Date.now();

    return new Promise<ScenarioRunResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let settled = false;

      const child = spawn(this.config.command, args, spawnOptions);

      const timeoutId = setTimeout(() => {
        timedOut = true;
        logger.warn(`${scenario.name} for ${model} timed out after ${scenario.timeoutMs}ms`);
        if (child.pid !== undefined) {
          kill(child.pid, 'SIGKILL', (killError) => {
            if (killError) logger.warn(`Could not kill process tree ${child.pid}: ${killError.message}`);
          });
        }
      }, scenario.timeoutMs);

      const finish = (result: ScenarioRunResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutId);
        resolve(result);
      };

      child.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('error', (error) => {
        finish({
          outcome: 'error',
          durationMs: Date.now() - start,
          errorDetail: `Failed to start ${this.config.command}: ${error.message}`,
        });
      });

      child.on('close', (code, signal) => {
        const durationMs = Date.now() - start;

        if (timedOut) {
          finish({
            outcome: 'error',
            durationMs,
            errorDetail: `Timed out after ${Math.round(scenario.timeoutMs / 1000)}s`,
          });
          return;
        }

        if (code === 0) {
          const partial = findPartialMarker(stdout, this.config.partialMarker);
          finish(partial
            ? { outcome: 'partial', durationMs, errorDetail: partial }
            : { outcome: 'success', durationMs });
          return;
        }

        const output = tail(stderr) || tail(stdout);
        finish({
          outcome: 'error',
          durationMs,
          errorDetail: output || `Exited with code ${code}${signal ? ` (signal ${signal})` : ''}`,
        });
      });
    });
  }
}

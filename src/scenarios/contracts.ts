import { ScenarioDefinition } from '../config/config';
import { ScenarioOutcome } from '../status/classifier';

export interface ScenarioRunResult {
  outcome: ScenarioOutcome;
  durationMs: number;
  errorDetail?: string;
}

/**
 * Executes one scenario against one model. Scenario failures come back as an
 * `error` outcome. The monitor records a rejected promise as one as well.
 */
export interface ScenarioRunner {
  run(model: string, scenario: ScenarioDefinition): Promise<ScenarioRunResult>;
}

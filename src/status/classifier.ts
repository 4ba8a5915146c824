import { categorizeError, ErrorCategory } from '../utils/errorCategorizer';
import { StatusLevel } from './severity';

export type ScenarioOutcome = 'success' | 'partial' | 'error';

/** Slow-response thresholds in milliseconds, keyed by scenario name. */
export type ScenarioThresholds = Readonly<Record<string, number>>;

export interface Classification {
  status: StatusLevel;
  errorCategory?: ErrorCategory;
}

/**
 * Maps a raw scenario outcome to a status level.
 *
 * A scenario without a configured threshold is never SLOW. A duration equal to
 * the threshold is still OK.
 */
export function classify(
  scenario: string,
  outcome: ScenarioOutcome,
  durationMs: number,
  thresholds: ScenarioThresholds,
  errorDetail?: string
): StatusLevel {
  return classifyWithCategory(scenario, outcome, durationMs, thresholds, errorDetail).status;
}

export function classifyWithCategory(
  scenario: string,
  outcome: ScenarioOutcome,
  durationMs: number,
  thresholds: ScenarioThresholds,
  errorDetail?: string
): Classification {
  switch (outcome) {
    case 'error': {
      const errorCategory = categorizeError(errorDetail || '');
      return {
        status: errorCategory === 'MODEL_NOT_LOADED' ? 'UNAVAILABLE' : 'FAILED',
        errorCategory,
      };
    }
    case 'partial':
      return { status: 'DEGRADED' };
    case 'success': {
      const threshold = Object.prototype.hasOwnProperty.call(thresholds, scenario)
        ? thresholds[scenario]
        : undefined;
      if (threshold !== undefined && durationMs > threshold) {
        return { status: 'SLOW' };
      }
      return { status: 'OK' };
    }
  }
}

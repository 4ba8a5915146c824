import { describe, it, expect } from 'vitest';
import { classify, classifyWithCategory } from '../src/status/classifier';
import {
  compareSeverity,
  isFailureLevel,
  STATUS_LEVELS,
  worseOf,
  worstStatus,
} from '../src/status/severity';
import { categorizeError, isErrorCategory } from '../src/utils/errorCategorizer';

const thresholds = { basic_trace: 30000, generation: 45000 };

describe('classify', () => {
  it('should report OK for a fast success', () => {
    expect(classify('basic_trace', 'success', 21000, thresholds)).toBe('OK');
  });

  it('should report SLOW for a success over the threshold', () => {
    expect(classify('basic_trace', 'success', 40000, thresholds)).toBe('SLOW');
  });

  it('should treat a duration equal to the threshold as OK', () => {
    expect(classify('basic_trace', 'success', 30000, thresholds)).toBe('OK');
  });

  it('should never report SLOW for a scenario without a threshold', () => {
    expect(classify('hidden_states', 'success', 10_000_000, thresholds)).toBe('OK');
  });

  it('should not pick up thresholds from the object prototype', () => {
    expect(classify('toString', 'success', 10_000_000, thresholds)).toBe('OK');
  });

  it('should report DEGRADED for a partial result regardless of duration', () => {
    expect(classify('generation', 'partial', 1000, thresholds)).toBe('DEGRADED');
    expect(classify('generation', 'partial', 100000, thresholds)).toBe('DEGRADED');
  });

  it('should report FAILED for an ordinary error', () => {
    const result = classifyWithCategory('generation', 'error', 5000, thresholds, 'Timed out after 90s');
    expect(result).toEqual({ status: 'FAILED', errorCategory: 'TIMEOUT' });
  });

  it('should report UNAVAILABLE when the model is not loaded', () => {
    const result = classifyWithCategory(
      'basic_trace',
      'error',
      800,
      thresholds,
      'RuntimeError: Model openai-community/gpt2 is not loaded on the fabric'
    );
    expect(result).toEqual({ status: 'UNAVAILABLE', errorCategory: 'MODEL_NOT_LOADED' });
  });

  it('should categorize an error without detail as UNKNOWN', () => {
    expect(classifyWithCategory('basic_trace', 'error', 0, thresholds)).toEqual({
      status: 'FAILED',
      errorCategory: 'UNKNOWN',
    });
  });

  it('should be idempotent', () => {
    const first = classifyWithCategory('generation', 'error', 1234, thresholds, 'Connection refused');
    const second = classifyWithCategory('generation', 'error', 1234, thresholds, 'Connection refused');
    expect(second).toEqual(first);
  });
});

describe('severity', () => {
  it('should rank levels in ascending severity', () => {
    for (let i = 1; i < STATUS_LEVELS.length; i++) {
      expect(compareSeverity(STATUS_LEVELS[i - 1], STATUS_LEVELS[i])).toBeLessThan(0);
    }
  });

  it('should pick the worse of two levels in either order', () => {
    expect(worseOf('OK', 'FAILED')).toBe('FAILED');
    expect(worseOf('FAILED', 'OK')).toBe('FAILED');
    expect(worseOf('SLOW', 'SLOW')).toBe('SLOW');
  });

  it('should never improve when a status is added to a set', () => {
    const statuses = ['SLOW', 'OK', 'DEGRADED'] as const;
    const before = worstStatus(statuses, 'NONE');
    for (const added of STATUS_LEVELS) {
      const after = worstStatus([...statuses, added], 'NONE');
      expect(after).not.toBe('NONE');
      if (before !== 'NONE' && after !== 'NONE') {
        expect(compareSeverity(after, before)).toBeGreaterThanOrEqual(0);
      }
    }
  });

  it('should fall back for an empty list', () => {
    expect(worstStatus([], 'NO_DATA')).toBe('NO_DATA');
  });

  it('should flag degraded and worse as failures', () => {
    expect(STATUS_LEVELS.filter(isFailureLevel)).toEqual(['DEGRADED', 'FAILED', 'UNAVAILABLE']);
  });
});

describe('categorizeError', () => {
  it.each([
    ['Object of type Tensor is not whitelisted for transfer', 'SERIALIZATION_ERROR'],
    ['Timed out after 90s', 'TIMEOUT'],
    ['ConnectionRefusedError: [Errno 111] Connection refused', 'CONNECTION_ERROR'],
    ['HTTP 401 Unauthorized', 'AUTH_ERROR'],
    ['Model meta-llama/Llama-3.1-8B is not deployed', 'MODEL_NOT_LOADED'],
    ['RuntimeError: size mismatch for layer 3', 'SHAPE_MISMATCH'],
    ['ValueError: tensor contains nan', 'VALUE_ERROR'],
    ["ModuleNotFoundError: No module named 'torch'", 'IMPORT_ERROR'],
    ['Segmentation fault', 'UNKNOWN'],
  ])('should map "%s" to %s', (text, category) => {
    expect(categorizeError(text)).toBe(category);
  });

  it('should recognize known category names only', () => {
    expect(isErrorCategory('TIMEOUT')).toBe(true);
    expect(isErrorCategory('timeout')).toBe(false);
    expect(isErrorCategory(42)).toBe(false);
  });
});

import { describe, it, expect } from 'vitest';
import {
  calculateEfficiency,
  calculateOverhead,
  calculateErrorAmplification,
  calculateRedundancy,
  computeAllMetrics,
  formatCoordinationMetrics,
  ERROR_AMPLIFICATION_CAP,
} from '../../../src/metrics/coordination.js';
import { MetricsError } from '../../../src/core/errors.js';

describe('calculateEfficiency', () => {
  it('should normalize progress by baseline tokens', () => {
    expect(calculateEfficiency(0.9, 550, 500)).toBeCloseTo(0.8182, 4);
    expect(calculateEfficiency(1, 100)).toBe(1);
  });

  it('should return 0 when nothing was spent', () => {
    expect(calculateEfficiency(0.5, 0)).toBe(0);
  });

  it('should floor the normalized token count', () => {
    expect(calculateEfficiency(0.5, 0.5, 100)).toBeCloseTo(50, 10);
  });

  it('should reject out-of-range inputs', () => {
    expect(() => calculateEfficiency(1.2, 100)).toThrow(MetricsError);
    expect(() => calculateEfficiency(0.5, -1)).toThrow('tokensUsed must be a non-negative number, got -1');
    expect(() => calculateEfficiency(0.5, 100, 0)).toThrow('baselineTokens must be positive, got 0');
  });
});

describe('calculateOverhead', () => {
  it('should return the coordination share of total tokens', () => {
    expect(calculateOverhead(500, 400, 100)).toBe(0.2);
    expect(calculateOverhead(0, 0, 0)).toBe(0);
  });

  it('should reject negative token counts', () => {
    expect(() => calculateOverhead(100, -5, 10)).toThrow(MetricsError);
  });
});

describe('calculateErrorAmplification', () => {
  it('should divide the multi-agent rate by the single-agent rate', () => {
    expect(calculateErrorAmplification(0.1, 1.72)).toBeCloseTo(17.2, 6);
    expect(calculateErrorAmplification(0.2, 0.1)).toBeCloseTo(0.5, 6);
  });

  it('should cap when the baseline never errs', () => {
    expect(calculateErrorAmplification(0, 0.3)).toBe(ERROR_AMPLIFICATION_CAP);
    expect(calculateErrorAmplification(0, 0.3)).toBe(20);
    expect(calculateErrorAmplification(0, 0)).toBe(1);
  });

  it('should reject negative rates', () => {
    try {
      calculateErrorAmplification(-0.1, 0.2);
      expect.unreachable('expected a MetricsError');
    } catch (err) {
      expect(err).toBeInstanceOf(MetricsError);
      if (err instanceof MetricsError) {
        expect(err.metric).toBe('errorAmplification');
        expect(err.code).toBe('METRICS_ERROR');
      }
    }
  });
});

describe('calculateRedundancy', () => {
  it('should return the share of duplicated actions', () => {
    expect(calculateRedundancy(7, 10)).toBeCloseTo(0.3, 10);
    expect(calculateRedundancy(10, 10)).toBe(0);
    expect(calculateRedundancy(0, 0)).toBe(0);
  });

  it('should reject more unique actions than total', () => {
    expect(() => calculateRedundancy(5, 4)).toThrow('uniqueActions (5) cannot exceed totalActions (4)');
  });
});

describe('computeAllMetrics', () => {
  it('should compute all four scores together', () => {
    const metrics = computeAllMetrics({
      taskProgress: 0.9,
      totalTokens: 500,
      agentTokens: 400,
      coordinationTokens: 100,
      singleAgentErrorRate: 0.1,
      multiAgentErrorRate: 0.2,
      uniqueActions: 8,
      totalActions: 10,
      baselineTokens: 500,
    });

    expect(metrics.efficiency).toBeCloseTo(0.9, 10);
    expect(metrics.overhead).toBe(0.2);
    expect(metrics.errorAmplification).toBeCloseTo(2, 10);
    expect(metrics.redundancy).toBeCloseTo(0.2, 10);
    expect(Object.isFrozen(metrics)).toBe(true);
  });

  it('should render a readable summary', () => {
    const text = formatCoordinationMetrics({
      efficiency: 0.5,
      overhead: 0.25,
      errorAmplification: 2,
      redundancy: 0,
    });

    expect(text).toBe(
      'CoordinationMetrics(\n'
      + '  efficiency=0.500,\n'
      + '  overhead=0.250,\n'
      + '  errorAmplification=2.000,\n'
      + '  redundancy=0.000\n'
      + ')',
    );
  });
});

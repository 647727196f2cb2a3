import { describe, it, expect } from 'vitest';
import { metricsFromResults } from '../../../src/metrics/from-results.js';
import { createTaskResult, type TaskResult } from '../../../src/architectures/types.js';

function result(success: boolean, output: unknown, coordinationTokens = 10): TaskResult {
  return createTaskResult({
    success,
    output,
    tokensUsed: 100,
    error: success ? undefined : 'failed',
    metadata: { coordinationTokens },
  });
}

describe('metricsFromResults', () => {
  it('should derive all scores from a batch of results', () => {
    const metrics = metricsFromResults(
      [result(true, 'a'), result(true, 'a'), result(true, 'b'), result(false, null)],
      { errorRate: 0.1, baselineTokens: 100 },
    );

    expect(metrics.efficiency).toBe(0.1875);
    expect(metrics.overhead).toBe(0.1);
    expect(metrics.errorAmplification).toBeCloseTo(2.5, 10);
    expect(metrics.redundancy).toBe(0.5);
  });

  it('should fall back to coordinationOverhead metadata', () => {
    const results = [
      createTaskResult({ success: true, output: 1, tokensUsed: 50, metadata: { coordinationOverhead: 25 } }),
    ];

    expect(metricsFromResults(results).overhead).toBe(0.5);
  });

  it('should treat structurally equal outputs as one action', () => {
    const metrics = metricsFromResults([result(true, { x: 1 }), result(true, { x: 1 }), result(true, [1])]);

    expect(metrics.redundancy).toBeCloseTo(1 - 2 / 3, 10);
  });

  it('should distinguish a string from the number it spells', () => {
    expect(metricsFromResults([result(true, '1'), result(true, 1)]).redundancy).toBe(0);
  });

  it('should return zeros for an empty batch', () => {
    const metrics = metricsFromResults([]);

    expect(metrics.efficiency).toBe(0);
    expect(metrics.overhead).toBe(0);
    expect(metrics.redundancy).toBe(0);
    expect(metrics.errorAmplification).toBe(0);
  });
});

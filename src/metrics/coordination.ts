/**
 * Coordination Metrics
 *
 * Pure conversions from recorded counters to the four coordination
 * scores. They read snapshots, never live agent state.
 */

import { MetricsError } from '../core/errors.js';

export const DEFAULT_BASELINE_TOKENS = 100;
/** Returned by calculateErrorAmplification when the baseline never errs. */
export const ERROR_AMPLIFICATION_CAP = 20.0;
const MIN_NORMALIZED_TOKENS = 0.01;

export interface CoordinationMetrics {
  readonly efficiency: number;
  readonly overhead: number;
  readonly errorAmplification: number;
  readonly redundancy: number;
}

/**
 * Task progress per unit of computation, normalized to a single-agent
 * baseline. 0 when nothing was spent.
 */
export function calculateEfficiency(
  taskProgress: number,
  tokensUsed: number,
  baselineTokens: number = DEFAULT_BASELINE_TOKENS,
): number {
  assertUnit('efficiency', 'taskProgress', taskProgress);
  assertNonNegative('efficiency', 'tokensUsed', tokensUsed);
  if (!(baselineTokens > 0)) {
    throw new MetricsError(`baselineTokens must be positive, got ${baselineTokens}`, 'efficiency');
  }
  if (tokensUsed === 0) return 0;

  const normalized = tokensUsed / baselineTokens;
  return taskProgress / Math.max(normalized, MIN_NORMALIZED_TOKENS);
}

/**
 * Share of all tokens spent on coordination. The caller keeps
 * agentTokens + coordinationTokens consistent with totalTokens.
 */
export function calculateOverhead(
  totalTokens: number,
  agentTokens: number,
  coordinationTokens: number,
): number {
  assertNonNegative('overhead', 'totalTokens', totalTokens);
  assertNonNegative('overhead', 'agentTokens', agentTokens);
  assertNonNegative('overhead', 'coordinationTokens', coordinationTokens);
  if (totalTokens === 0) return 0;
  return coordinationTokens / totalTokens;
}

/**
 * Multi-agent error rate relative to the single-agent one.
 * A zero baseline yields the cap, or 1.0 when neither side errs.
 */
export function calculateErrorAmplification(
  singleAgentErrorRate: number,
  multiAgentErrorRate: number,
): number {
  assertNonNegative('errorAmplification', 'singleAgentErrorRate', singleAgentErrorRate);
  assertNonNegative('errorAmplification', 'multiAgentErrorRate', multiAgentErrorRate);
  if (singleAgentErrorRate === 0) {
    return multiAgentErrorRate > 0 ? ERROR_AMPLIFICATION_CAP : 1.0;
  }
  return multiAgentErrorRate / singleAgentErrorRate;
}

/** Fraction of actions that duplicated another. */
export function calculateRedundancy(uniqueActions: number, totalActions: number): number {
  assertNonNegative('redundancy', 'uniqueActions', uniqueActions);
  assertNonNegative('redundancy', 'totalActions', totalActions);
  if (uniqueActions > totalActions) {
    throw new MetricsError(
      `uniqueActions (${uniqueActions}) cannot exceed totalActions (${totalActions})`,
      'redundancy',
    );
  }
  if (totalActions === 0) return 0;
  return 1 - uniqueActions / totalActions;
}

export interface MetricInputs {
  taskProgress: number;
  totalTokens: number;
  agentTokens: number;
  coordinationTokens: number;
  singleAgentErrorRate: number;
  multiAgentErrorRate: number;
  uniqueActions: number;
  totalActions: number;
  baselineTokens?: number;
}

export function computeAllMetrics(inputs: MetricInputs): CoordinationMetrics {
  return Object.freeze({
    efficiency: calculateEfficiency(inputs.taskProgress, inputs.totalTokens, inputs.baselineTokens),
    overhead: calculateOverhead(inputs.totalTokens, inputs.agentTokens, inputs.coordinationTokens),
    errorAmplification: calculateErrorAmplification(inputs.singleAgentErrorRate, inputs.multiAgentErrorRate),
    redundancy: calculateRedundancy(inputs.uniqueActions, inputs.totalActions),
  });
}

export function formatCoordinationMetrics(metrics: CoordinationMetrics): string {
  return [
    'CoordinationMetrics(',
    `  efficiency=${metrics.efficiency.toFixed(3)},`,
    `  overhead=${metrics.overhead.toFixed(3)},`,
    `  errorAmplification=${metrics.errorAmplification.toFixed(3)},`,
    `  redundancy=${metrics.redundancy.toFixed(3)}`,
    ')',
  ].join('\n');
}

function assertNonNegative(metric: string, name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new MetricsError(`${name} must be a non-negative number, got ${value}`, metric);
  }
}

function assertUnit(metric: string, name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new MetricsError(`${name} must be within [0, 1], got ${value}`, metric);
  }
}

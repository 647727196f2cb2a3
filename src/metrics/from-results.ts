import type { TaskResult } from '../architectures/types.js';
import { computeAllMetrics, DEFAULT_BASELINE_TOKENS, type CoordinationMetrics } from './coordination.js';

export const DEFAULT_BASELINE_ERROR_RATE = 0.1;

export interface BaselineMetrics {
  /** Single-agent error rate to compare against. */
  errorRate?: number;
  /** Single-agent token usage per task. */
  baselineTokens?: number;
}

/**
 * Derive coordination metrics from a batch of results.
 *
 * Progress is the success ratio, coordination tokens come from each
 * result's `coordinationTokens` metadata, and unique actions are the
 * distinct successful outputs.
 */
export function metricsFromResults(
  results: readonly TaskResult[],
  baseline: BaselineMetrics = {},
): CoordinationMetrics {
  const total = results.length;
  const successful = results.filter(r => r.success);
  const totalTokens = results.reduce((sum, r) => sum + r.tokensUsed, 0);
  const coordinationTokens = results.reduce((sum, r) => sum + coordinationTokensOf(r), 0);

  return computeAllMetrics({
    taskProgress: successful.length / Math.max(total, 1),
    totalTokens,
    agentTokens: Math.max(totalTokens - coordinationTokens, 0),
    coordinationTokens,
    singleAgentErrorRate: baseline.errorRate ?? DEFAULT_BASELINE_ERROR_RATE,
    multiAgentErrorRate: (total - successful.length) / Math.max(total, 1),
    uniqueActions: new Set(successful.map(r => fingerprint(r.output))).size,
    totalActions: total,
    baselineTokens: baseline.baselineTokens ?? DEFAULT_BASELINE_TOKENS,
  });
}

function coordinationTokensOf(result: TaskResult): number {
  const value = result.metadata.coordinationTokens ?? result.metadata.coordinationOverhead;
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

function fingerprint(value: unknown): string {
  if (typeof value === 'string') return `string:${value}`;
  if (value === null || typeof value !== 'object') return `${typeof value}:${String(value)}`;
  try {
    return `json:${JSON.stringify(value)}`;
  } catch {
    // cyclic or bigint-bearing structures
    return `object:${String(value)}`;
  }
}

/**
 * Simulation Runner
 * Executes one task on several architectures and scores each against the
 * single-agent baseline.
 *
 * The single agent always runs (it supplies the baseline error rate and
 * token usage), whether or not it is among the reported architectures.
 * The baseline token figure is the single agent's total over all trials,
 * so the single agent's own efficiency equals its success rate.
 */

import { createArchitecture, type ArchitectureOptions } from '../architectures/factory.js';
import {
  ARCHITECTURE_NAMES,
  type AgentMetrics,
  type ArchitectureName,
  type Task,
  type TaskContext,
  type TaskResult,
} from '../architectures/types.js';
import { DEFAULT_BASELINE_TOKENS, type CoordinationMetrics } from '../metrics/coordination.js';
import { metricsFromResults, type BaselineMetrics } from '../metrics/from-results.js';
import { ConfigError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export interface SimulationConfig extends ArchitectureOptions {
  /** Executions per architecture. */
  trials?: number;
  architectures?: readonly ArchitectureName[];
}

export interface ArchitectureRun {
  architecture: ArchitectureName;
  results: TaskResult[];
  metrics: CoordinationMetrics;
  snapshot: AgentMetrics;
  successRate: number;
  meanTokens: number;
}

export interface SimulationReport {
  trials: number;
  baseline: Required<BaselineMetrics>;
  runs: ArchitectureRun[];
  /** Highest efficiency; earlier in the run list wins ties. */
  mostEfficient: ArchitectureName | undefined;
}

export class SimulationRunner {
  private readonly trials: number;
  private readonly architectures: readonly ArchitectureName[];
  private readonly options: ArchitectureOptions;

  constructor(config: SimulationConfig = {}) {
    const { trials = 1, architectures = ARCHITECTURE_NAMES, ...options } = config;
    if (!Number.isInteger(trials) || trials < 1) {
      throw new ConfigError(`trials must be an integer >= 1, got ${trials}`);
    }
    this.trials = trials;
    this.architectures = architectures;
    this.options = options;
  }

  async run(task: Task, context: TaskContext = {}): Promise<SimulationReport> {
    const single = await this.runArchitecture('single', task, context);
    const singleTokens = single.meanTokens * single.results.length;
    const baseline: Required<BaselineMetrics> = {
      errorRate: 1 - single.successRate,
      baselineTokens: singleTokens > 0 ? singleTokens : DEFAULT_BASELINE_TOKENS,
    };

    const runs: ArchitectureRun[] = [];
    for (const name of this.architectures) {
      const run = name === 'single' ? single : await this.runArchitecture(name, task, context);
      runs.push({ ...run, metrics: metricsFromResults(run.results, baseline) });
    }

    const mostEfficient = runs.reduce<ArchitectureRun | undefined>(
      (best, run) => (!best || run.metrics.efficiency > best.metrics.efficiency ? run : best),
      undefined,
    )?.architecture;

    getLogger().info({ trials: this.trials, architectures: runs.length, mostEfficient }, 'Simulation complete');

    return { trials: this.trials, baseline, runs, mostEfficient };
  }

  private async runArchitecture(
    name: ArchitectureName,
    task: Task,
    context: TaskContext,
  ): Promise<Omit<ArchitectureRun, 'metrics'>> {
    const architecture = createArchitecture(name, this.options);
    const results: TaskResult[] = [];

    for (let trial = 0; trial < this.trials; trial++) {
      results.push(await architecture.executeTask(task, { ...context, trial }));
    }

    const successes = results.filter(r => r.success).length;
    return {
      architecture: name,
      results,
      snapshot: architecture.getMetrics(),
      successRate: successes / results.length,
      meanTokens: results.reduce((sum, r) => sum + r.tokensUsed, 0) / results.length,
    };
  }
}

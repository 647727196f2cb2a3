/**
 * Architecture Selector
 *
 * Scores the five architectures for a task/agent pair and recommends the
 * best one. Scores are relative and may be negative.
 *
 * Per architecture: a base score, multi-agent penalties (capability
 * saturation above the accuracy threshold, sequential work, tool-heavy
 * work on a tight budget, a very small budget), architecture affinities
 * (centralized for parallel work, decentralized for dynamic work, hybrid
 * for complex balanced work, single for simple sequential work), then a
 * model-capability multiplier.
 */

import type { ArchitectureName } from '../architectures/types.js';
import { parseWithSchema } from '../core/validation.js';
import {
  AgentCapabilitiesSchema,
  SelectorCoefficientsSchema,
  TaskCharacteristicsSchema,
  type AgentCapabilities,
  type FiredRule,
  type ScoreMap,
  type SelectionExplanation,
  type SelectorCoefficients,
  type SelectorCoefficientsInput,
  type TaskCharacteristics,
} from './types.js';

/** Tie-break order: earlier wins when scores are equal. */
export const SELECTION_PRIORITY: readonly ArchitectureName[] = [
  'single',
  'centralized',
  'decentralized',
  'hybrid',
  'independent',
];

export class ArchitectureSelector {
  readonly coefficients: SelectorCoefficients;

  constructor(overrides: SelectorCoefficientsInput = {}) {
    this.coefficients = parseWithSchema(SelectorCoefficientsSchema, overrides, 'selector coefficients');
  }

  selectArchitecture(task: TaskCharacteristics, capabilities: AgentCapabilities): ArchitectureName {
    return this.pickBest(this.predictAllScores(task, capabilities));
  }

  predictAllScores(task: TaskCharacteristics, capabilities: AgentCapabilities): ScoreMap {
    const t = parseWithSchema(TaskCharacteristicsSchema, task, 'task characteristics');
    const c = parseWithSchema(AgentCapabilitiesSchema, capabilities, 'agent capabilities');

    return {
      single: this.score('single', t, c),
      independent: this.score('independent', t, c),
      centralized: this.score('centralized', t, c),
      decentralized: this.score('decentralized', t, c),
      hybrid: this.score('hybrid', t, c),
    };
  }

  explainSelection(task: TaskCharacteristics, capabilities: AgentCapabilities): SelectionExplanation {
    const scores = this.predictAllScores(task, capabilities);
    const firedRules = this.firedRules(task, capabilities);

    return {
      selectedArchitecture: this.pickBest(scores),
      scores,
      firedRules,
      reasoning: firedRules.map(rule => rule.reasoning),
      taskCharacteristics: { ...task },
      agentCapabilities: { ...capabilities },
    };
  }

  private pickBest(scores: ScoreMap): ArchitectureName {
    let best = SELECTION_PRIORITY[0];
    for (const name of SELECTION_PRIORITY) {
      if (scores[name] > scores[best]) best = name;
    }
    return best;
  }

  private score(name: ArchitectureName, task: TaskCharacteristics, caps: AgentCapabilities): number {
    const k = this.coefficients;
    const a = k.affinity;
    let score = k.baseScores[name];

    if (name !== 'single') {
      if (caps.baselineAccuracy > k.saturationThreshold) {
        score += k.saturationBeta * (caps.baselineAccuracy - k.saturationThreshold);
      }
      if (task.sequential > k.sequentialThreshold) {
        score += k.sequentialPenalty;
      }
      if (task.toolIntensive > k.toolIntensiveThreshold && caps.tokenBudget < k.toolBudgetThreshold) {
        score += k.toolBudgetPenalty;
      }
      if (caps.tokenBudget < k.lowBudgetThreshold) {
        score += k.lowBudgetPenalty;
      }
    }

    switch (name) {
      case 'single':
        score += a.singleSequential * task.sequential;
        if (task.complexity < a.simpleTaskComplexity) score += a.singleSimpleTask;
        break;
      case 'independent':
        score += a.independentParallel * task.parallelizable;
        score += a.independentErrorAmplification * (1 - caps.baselineAccuracy);
        break;
      case 'centralized':
        score += a.centralizedParallel * task.parallelizable;
        score += a.centralizedToolOverhead * task.toolIntensive;
        score += a.centralizedErrorContainment;
        if (task.parallelizable > k.parallelThreshold) score += k.parallelBonus;
        break;
      case 'decentralized':
        score += a.decentralizedDynamic * task.dynamic;
        score += a.decentralizedCoordinationCost * (1 - task.parallelizable);
        if (task.dynamic > k.dynamicThreshold) score += k.dynamicBonus;
        break;
      case 'hybrid': {
        const balance = 1 - populationStd([task.parallelizable, task.dynamic, task.sequential]);
        score += a.hybridComplexity * task.complexity;
        score += a.hybridBalance * balance;
        break;
      }
    }

    return score * (k.modelCapabilityFloor + k.modelCapabilityScale * caps.modelCapability);
  }

  private firedRules(task: TaskCharacteristics, caps: AgentCapabilities): FiredRule[] {
    const k = this.coefficients;
    const rules: FiredRule[] = [];

    if (caps.baselineAccuracy > k.saturationThreshold) {
      rules.push({
        id: 'capability-saturation',
        reasoning:
          `Single agent baseline accuracy (${percent(caps.baselineAccuracy)}) exceeds the saturation ` +
          `threshold (${percent(k.saturationThreshold)}). Multi-agent coordination may have diminishing returns.`,
      });
    }
    if (task.parallelizable > k.parallelThreshold) {
      rules.push({
        id: 'parallelizable',
        reasoning: `Task is highly parallelizable (${task.parallelizable}). Centralized coordination may provide significant improvement (up to 80.9%).`,
      });
    }
    if (task.dynamic > k.dynamicThreshold) {
      rules.push({
        id: 'dynamic',
        reasoning: `Task requires dynamic adaptation (${task.dynamic}). Decentralized coordination provides robustness (9.2% improvement).`,
      });
    }
    if (task.sequential > k.sequentialThreshold) {
      rules.push({
        id: 'sequential',
        reasoning: `Task requires sequential reasoning (${task.sequential}). Multi-agent architectures may degrade performance by 39-70%.`,
      });
    }
    if (task.toolIntensive > k.toolIntensiveThreshold && caps.tokenBudget < k.toolBudgetThreshold) {
      rules.push({
        id: 'tool-intensive-budget',
        reasoning: `Task is tool-intensive (${task.toolIntensive}) with a limited token budget (${caps.tokenBudget}). Multi-agent overhead may hurt performance.`,
      });
    }
    if (caps.tokenBudget < k.lowBudgetThreshold) {
      rules.push({
        id: 'low-budget',
        reasoning: `Token budget (${caps.tokenBudget}) is below ${k.lowBudgetThreshold}. Coordination overhead consumes a large share of it.`,
      });
    }

    return rules;
  }
}

function populationStd(values: number[]): number {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

import { z } from 'zod';
import type { ArchitectureName } from '../architectures/types.js';

const unit = z.number().min(0).max(1);

export const TaskCharacteristicsSchema = z.object({
  /** How much of the task splits into independent pieces. */
  parallelizable: unit,
  /** How much the task needs adaptation to a changing environment. */
  dynamic: unit,
  /** How much each step depends on the previous one. */
  sequential: unit,
  toolIntensive: unit,
  complexity: unit,
});

export type TaskCharacteristics = Readonly<z.output<typeof TaskCharacteristicsSchema>>;

export const AgentCapabilitiesSchema = z.object({
  /** Single-agent accuracy on the task. */
  baselineAccuracy: unit,
  tokenBudget: z.number().int().positive(),
  /** Relative strength of the underlying model. */
  modelCapability: unit,
});

export type AgentCapabilities = Readonly<z.output<typeof AgentCapabilitiesSchema>>;

export const SelectorCoefficientsSchema = z.object({
  baseScores: z.object({
    single: z.number().default(1.0),
    independent: z.number().default(1.0),
    centralized: z.number().default(1.0),
    decentralized: z.number().default(1.0),
    hybrid: z.number().default(1.0),
  }).default({}),

  saturationThreshold: unit.default(0.45),
  saturationBeta: z.number().default(-0.408),

  sequentialThreshold: unit.default(0.6),
  sequentialPenalty: z.number().default(-0.4),
  toolIntensiveThreshold: unit.default(0.7),
  toolBudgetThreshold: z.number().positive().default(5000),
  toolBudgetPenalty: z.number().default(-0.2),
  lowBudgetThreshold: z.number().positive().default(1000),
  lowBudgetPenalty: z.number().default(-0.2),
  parallelThreshold: unit.default(0.7),
  parallelBonus: z.number().default(0.1),
  dynamicThreshold: unit.default(0.7),
  dynamicBonus: z.number().default(0.1),

  affinity: z.object({
    singleSequential: z.number().default(0.3),
    singleSimpleTask: z.number().default(0.2),
    simpleTaskComplexity: unit.default(0.5),
    independentParallel: z.number().default(0.4),
    independentErrorAmplification: z.number().default(-0.172),
    centralizedParallel: z.number().default(0.809),
    centralizedToolOverhead: z.number().default(-0.2),
    centralizedErrorContainment: z.number().default(-0.044),
    decentralizedDynamic: z.number().default(0.092),
    decentralizedCoordinationCost: z.number().default(-0.15),
    hybridComplexity: z.number().default(0.3),
    hybridBalance: z.number().default(0.15),
  }).default({}),

  modelCapabilityFloor: z.number().default(0.8),
  modelCapabilityScale: z.number().default(0.4),
});

export type SelectorCoefficients = z.output<typeof SelectorCoefficientsSchema>;
export type SelectorCoefficientsInput = z.input<typeof SelectorCoefficientsSchema>;

export type ScoreMap = Record<ArchitectureName, number>;

export type SelectionRuleId =
  | 'capability-saturation'
  | 'parallelizable'
  | 'dynamic'
  | 'sequential'
  | 'tool-intensive-budget'
  | 'low-budget';

export interface FiredRule {
  id: SelectionRuleId;
  reasoning: string;
}

export interface SelectionExplanation {
  selectedArchitecture: ArchitectureName;
  scores: ScoreMap;
  firedRules: FiredRule[];
  reasoning: string[];
  taskCharacteristics: TaskCharacteristics;
  agentCapabilities: AgentCapabilities;
}

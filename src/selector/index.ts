export { ArchitectureSelector, SELECTION_PRIORITY } from './selector.js';
export {
  AgentCapabilitiesSchema,
  SelectorCoefficientsSchema,
  TaskCharacteristicsSchema,
  type AgentCapabilities,
  type FiredRule,
  type ScoreMap,
  type SelectionExplanation,
  type SelectionRuleId,
  type SelectorCoefficients,
  type SelectorCoefficientsInput,
  type TaskCharacteristics,
} from './types.js';

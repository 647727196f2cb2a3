export {
  calculateEfficiency,
  calculateOverhead,
  calculateErrorAmplification,
  calculateRedundancy,
  computeAllMetrics,
  formatCoordinationMetrics,
  DEFAULT_BASELINE_TOKENS,
  ERROR_AMPLIFICATION_CAP,
  type CoordinationMetrics,
  type MetricInputs,
} from './coordination.js';
export { metricsFromResults, DEFAULT_BASELINE_ERROR_RATE, type BaselineMetrics } from './from-results.js';

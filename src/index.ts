/**
 * agent-scaling: multi-agent coordination topologies as a token-accounting
 * simulation, plus the metrics and selector that compare them.
 *
 * @example
 * ```typescript
 * import { CentralizedMultiAgent, ArchitectureSelector } from 'agent-scaling';
 *
 * const system = new CentralizedMultiAgent({ numAgents: 3 });
 * const result = await system.executeTask([ctx => 1, ctx => 2, ctx => 3]);
 *
 * const selector = new ArchitectureSelector();
 * const best = selector.selectArchitecture(
 *   { parallelizable: 0.8, dynamic: 0.2, sequential: 0.1, toolIntensive: 0.5, complexity: 0.6 },
 *   { baselineAccuracy: 0.35, tokenBudget: 5000, modelCapability: 0.8 },
 * );
 * ```
 */

// Core
export { ConfigManager, PROJECT_CONFIG_FILE, type ConfigManagerOptions } from './core/config.js';
export { ScalingConfigSchema, type ScalingConfig, type ScalingConfigInput } from './core/types.js';
export { createLogger, getLogger, setLogger, type LogLevel, type LoggerOptions } from './core/logger.js';
export {
  ScalingError,
  ConfigError,
  MetricsError,
  AgentError,
  describeError,
} from './core/errors.js';

// Architectures
export * from './architectures/index.js';

// Metrics
export * from './metrics/index.js';

// Selector
export * from './selector/index.js';

// Simulation
export * from './simulation/index.js';

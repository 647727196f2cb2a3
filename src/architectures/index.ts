export { Agent, DEFAULT_MAX_MESSAGE_HISTORY, type AgentOptions } from './agent.js';
export { SingleAgent } from './single.js';
export { IndependentMultiAgent, type IndependentOptions, type IndependentMetrics } from './independent.js';
export { CentralizedMultiAgent, type CentralizedOptions, type CentralizedMetrics } from './centralized.js';
export { DecentralizedMultiAgent, type DecentralizedOptions, type DecentralizedMetrics } from './decentralized.js';
export { HybridMultiAgent, type HybridOptions, type HybridMetrics, type TeamMetrics } from './hybrid.js';
export { createArchitecture, type ArchitectureOptions, type ArchitectureMap, type AnyArchitecture } from './factory.js';
export { PeerGroup, type MessageCharging, type PeerGroupOptions, type PeerExecution, type PeerOutcome } from './peer-group.js';
export { TaskGroup, type GroupUnit, type SettledUnit, type TaskGroupOptions, type TaskGroupStats } from './pool.js';
export { MessageBus, type MessageHandler } from './message-bus.js';
export {
  CapabilitiesSchema,
  DEFAULT_CAPABILITIES,
  resolveCapabilities,
  type Capabilities,
  type CapabilityInput,
} from './capabilities.js';
export {
  ARCHITECTURE_NAMES,
  createMessage,
  createTaskResult,
  isArchitectureName,
  isTaskFn,
  isTaskSequence,
  meetsSuccessPolicy,
  type AgentMetrics,
  type ArchitectureName,
  type Message,
  type MessageInit,
  type Metadata,
  type SuccessPolicy,
  type SystemMetrics,
  type Task,
  type TaskContext,
  type TaskFn,
  type TaskResult,
  type TaskResultInit,
  type TaskValue,
} from './types.js';

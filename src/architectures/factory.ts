import type { Agent, AgentOptions } from './agent.js';
import { SingleAgent } from './single.js';
import { IndependentMultiAgent } from './independent.js';
import { CentralizedMultiAgent } from './centralized.js';
import { DecentralizedMultiAgent } from './decentralized.js';
import { HybridMultiAgent } from './hybrid.js';
import { isArchitectureName, type ArchitectureName, type SuccessPolicy } from './types.js';
import { ConfigError } from '../core/errors.js';

export interface ArchitectureOptions extends AgentOptions {
  numAgents?: number;
  teamSize?: number;
  successPolicy?: SuccessPolicy;
  maxConcurrency?: number;
}

export interface ArchitectureMap {
  single: SingleAgent;
  independent: IndependentMultiAgent;
  centralized: CentralizedMultiAgent;
  decentralized: DecentralizedMultiAgent;
  hybrid: HybridMultiAgent;
}

export type AnyArchitecture = ArchitectureMap[ArchitectureName];

/**
 * Build one of the five architectures by name. Options a variant has no
 * use for (e.g. `teamSize` for `centralized`) are ignored.
 */
export function createArchitecture<N extends ArchitectureName>(
  name: N,
  options?: ArchitectureOptions,
): ArchitectureMap[N];
export function createArchitecture(name: string, options?: ArchitectureOptions): Agent;
export function createArchitecture(name: string, options: ArchitectureOptions = {}): Agent {
  if (!isArchitectureName(name)) {
    throw new ConfigError(`Unknown architecture: ${name}`);
  }
  switch (name) {
    case 'single':
      return new SingleAgent(options);
    case 'independent':
      return new IndependentMultiAgent(options);
    case 'centralized':
      return new CentralizedMultiAgent(options);
    case 'decentralized':
      return new DecentralizedMultiAgent(options);
    case 'hybrid':
      return new HybridMultiAgent(options);
  }
}

import { Agent, validateAgentCount, type AgentOptions } from './agent.js';
import { SingleAgent } from './single.js';
import { PeerGroup } from './peer-group.js';
import { createTaskResult, type Message, type SystemMetrics, type Task, type TaskContext, type TaskResult } from './types.js';
import { getLogger } from '../core/logger.js';

export interface DecentralizedOptions extends AgentOptions {
  numAgents?: number;
}

export interface DecentralizedMetrics extends SystemMetrics {
  communicationOverhead: number;
  messagesExchanged: number;
}

/**
 * Decentralized Multi-Agent
 *
 * Peers run `coordinationRounds` rounds, broadcasting successful outputs
 * to each other between rounds. Every delivery costs the sender
 * `communicationTokensPerMessage`. The output is the successful result of
 * the latest round, latest peer. Instances hold per-call inbox state and
 * must not be shared by concurrent callers.
 */
export class DecentralizedMultiAgent extends Agent {
  readonly architecture = 'decentralized' as const;
  readonly numAgents: number;
  readonly agents: readonly SingleAgent[];
  private readonly peers: PeerGroup;

  constructor(options: DecentralizedOptions = {}) {
    super('decentralized_system', options);
    this.numAgents = validateAgentCount('numAgents', options.numAgents ?? 3);
    this.agents = Array.from({ length: this.numAgents }, (_, i) => new SingleAgent({
      agentId: `${this.agentId}_peer_${i}`,
      capabilities: this.capabilities,
      maxMessageHistory: options.maxMessageHistory,
    }));
    this.peers = new PeerGroup(this.agents, {
      rounds: this.capabilities.coordinationRounds,
      tokensPerMessage: this.capabilities.communicationTokensPerMessage,
      charging: 'per-delivery',
      messageType: 'task_result',
      maxMessageHistory: options.maxMessageHistory,
    });
  }

  async executeTask(task: Task, context: TaskContext = {}): Promise<TaskResult> {
    const outcome = await this.peers.run(task, context);
    const tokensUsed = outcome.taskTokens + outcome.communicationTokens;
    const successful = outcome.executions.filter(e => e.result.success).length;
    const rounds = this.capabilities.coordinationRounds;

    if (outcome.consensus) {
      return this.record(createTaskResult({
        success: true,
        output: outcome.consensus.result.output,
        tokensUsed,
        metadata: {
          architecture: this.architecture,
          numAgents: this.numAgents,
          rounds,
          successfulResults: successful,
          failedResults: outcome.executions.length - successful,
          consensusRound: outcome.consensus.round,
          consensusAgent: outcome.consensus.agentId,
          messagesExchanged: outcome.messagesExchanged,
          communicationOverhead: outcome.communicationTokens,
          coordinationTokens: outcome.communicationTokens,
        },
      }));
    }

    getLogger().warn({ agentId: this.agentId, rounds }, 'No peer succeeded');
    return this.record(createTaskResult({
      success: false,
      tokensUsed,
      error: `No agent succeeded across ${rounds} rounds: ${outcome.errors.join('; ')}`,
      metadata: {
        architecture: this.architecture,
        numAgents: this.numAgents,
        rounds,
        successfulResults: 0,
        failedResults: outcome.executions.length,
        messagesExchanged: 0,
        communicationOverhead: 0,
        coordinationTokens: 0,
      },
    }));
  }

  /** Broadcasts seen by the peer bus, oldest first. */
  getMessageLog(): Message[] {
    return this.peers.getMessageHistory();
  }

  getMetrics(): DecentralizedMetrics {
    const agents = this.agents.map(agent => agent.getMetrics());
    return {
      ...super.getMetrics(),
      architecture: this.architecture,
      agents,
      totalAgentTokens: agents.reduce((sum, a) => sum + a.tokensUsed, 0),
      coordinationOverhead: this.peers.communicationTokens,
      communicationOverhead: this.peers.communicationTokens,
      messagesExchanged: this.peers.messagesExchanged,
    };
  }

  resetMetrics(): void {
    super.resetMetrics();
    this.peers.reset();
  }
}

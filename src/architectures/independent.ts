import { Agent, validateAgentCount, type AgentOptions } from './agent.js';
import { SingleAgent } from './single.js';
import { TaskGroup, type SettledUnit, type TaskGroupStats } from './pool.js';
import { createTaskResult, type SystemMetrics, type Task, type TaskContext, type TaskResult } from './types.js';
import { AgentError, describeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export interface IndependentOptions extends AgentOptions {
  numAgents?: number;
  maxConcurrency?: number;
}

export interface IndependentMetrics extends SystemMetrics {
  dispatch: TaskGroupStats;
}

/**
 * Independent Multi-Agent
 *
 * N workers receive identical copies of the task and run concurrently with
 * no channel between them. The first success to complete wins; every
 * worker's tokens are charged, including those of discarded or failed runs.
 * Completion order is only reproducible with `maxConcurrency: 1` or with
 * tasks that settle in submission order.
 */
export class IndependentMultiAgent extends Agent {
  readonly architecture = 'independent' as const;
  readonly numAgents: number;
  readonly agents: readonly SingleAgent[];
  private readonly group: TaskGroup;

  constructor(options: IndependentOptions = {}) {
    super('independent_system', options);
    this.numAgents = validateAgentCount('numAgents', options.numAgents ?? 3);
    this.agents = Array.from({ length: this.numAgents }, (_, i) => new SingleAgent({
      agentId: `${this.agentId}_agent_${i}`,
      capabilities: this.capabilities,
      maxMessageHistory: options.maxMessageHistory,
    }));
    this.group = new TaskGroup({ name: this.agentId, maxConcurrency: options.maxConcurrency });
  }

  async executeTask(task: Task, context: TaskContext = {}): Promise<TaskResult> {
    const settled = await this.group.run(this.agents.map((agent, workerIndex) => ({
      id: agent.agentId,
      run: () => agent.executeTask(task, { ...context, workerIndex }),
    })));

    const results = settled.map(entry => this.unwrap(entry));
    const totalTokens = results.reduce((sum, r) => sum + r.tokensUsed, 0);
    const completionOrder = settled.map(entry => entry.id);
    const firstSuccess = settled.findIndex((_, i) => results[i].success);
    const successful = results.filter(r => r.success).length;

    if (firstSuccess !== -1) {
      return this.record(createTaskResult({
        success: true,
        output: results[firstSuccess].output,
        tokensUsed: totalTokens,
        metadata: {
          architecture: this.architecture,
          numAgents: this.numAgents,
          successfulAgents: successful,
          failedAgents: results.length - successful,
          selectedAgent: settled[firstSuccess].id,
          completionOrder,
          coordinationTokens: 0,
        },
      }));
    }

    const errors = results.map((r, i) => `${settled[i].id}: ${r.error ?? 'unknown error'}`);
    getLogger().warn({ agentId: this.agentId, failures: errors.length }, 'All independent agents failed');
    return this.record(createTaskResult({
      success: false,
      tokensUsed: totalTokens,
      error: `All ${this.numAgents} agents failed: ${errors.join('; ')}`,
      metadata: {
        architecture: this.architecture,
        numAgents: this.numAgents,
        successfulAgents: 0,
        failedAgents: results.length,
        completionOrder,
        coordinationTokens: 0,
      },
    }));
  }

  getMetrics(): IndependentMetrics {
    const agents = this.agents.map(agent => agent.getMetrics());
    return {
      ...super.getMetrics(),
      architecture: this.architecture,
      agents,
      totalAgentTokens: agents.reduce((sum, a) => sum + a.tokensUsed, 0),
      coordinationOverhead: 0,
      dispatch: this.group.getStats(),
    };
  }

  resetMetrics(): void {
    super.resetMetrics();
    for (const agent of this.agents) agent.resetMetrics();
    this.group.resetStats();
  }

  private unwrap(entry: SettledUnit<TaskResult>): TaskResult {
    if (entry.status === 'fulfilled') return entry.value;
    const error = new AgentError(`Worker rejected: ${describeError(entry.error)}`, entry.id, entry.error);
    return createTaskResult({ success: false, error: error.message, metadata: { agentId: error.agentId } });
  }
}

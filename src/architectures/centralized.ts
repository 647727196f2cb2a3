import { Agent, validateAgentCount, type AgentOptions } from './agent.js';
import { SingleAgent } from './single.js';
import {
  createTaskResult,
  isTaskSequence,
  meetsSuccessPolicy,
  type SuccessPolicy,
  type SystemMetrics,
  type Task,
  type TaskContext,
  type TaskResult,
} from './types.js';
import { getLogger } from '../core/logger.js';

export interface CentralizedOptions extends AgentOptions {
  numAgents?: number;
  successPolicy?: SuccessPolicy;
}

export interface CentralizedMetrics extends SystemMetrics {
  dispatchCount: number;
}

interface Assignment {
  subtaskIndex: number;
  worker: SingleAgent;
  task: Task;
}

/**
 * Centralized Multi-Agent
 *
 * A coordinator partitions sequences round-robin over its workers
 * (sub-task i goes to worker i % numAgents), runs them one at a time, and
 * charges `coordinationTokensPerTask` per dispatch. Scalar tasks go to
 * worker 0. Later sub-tasks see the outputs of earlier ones through
 * `globalState`. The dispatch counter and global state live on the
 * instance; one caller at a time.
 */
export class CentralizedMultiAgent extends Agent {
  readonly architecture = 'centralized' as const;
  readonly numAgents: number;
  readonly successPolicy: SuccessPolicy;
  readonly agents: readonly SingleAgent[];
  private globalState: Record<string, unknown> = {};
  private dispatchCount = 0;
  private coordinationOverhead = 0;

  constructor(options: CentralizedOptions = {}) {
    super('centralized_system', options);
    this.numAgents = validateAgentCount('numAgents', options.numAgents ?? 3);
    this.successPolicy = options.successPolicy ?? 'any';
    this.agents = Array.from({ length: this.numAgents }, (_, i) => new SingleAgent({
      agentId: `${this.agentId}_worker_${i}`,
      capabilities: this.capabilities,
      maxMessageHistory: options.maxMessageHistory,
    }));
  }

  async executeTask(task: Task, context: TaskContext = {}): Promise<TaskResult> {
    this.globalState = {};

    if (isTaskSequence(task) && task.length === 0) {
      return this.record(createTaskResult({
        success: false,
        error: 'Task sequence is empty',
        metadata: { architecture: this.architecture, numAgents: this.numAgents, coordinationTokens: 0 },
      }));
    }

    const assignments = this.decompose(task);
    const results: TaskResult[] = [];
    let coordinationTokens = 0;

    for (const { subtaskIndex, worker, task: subtask } of assignments) {
      const result = await worker.executeTask(subtask, {
        ...context,
        subtaskIndex,
        globalState: { ...this.globalState },
      });
      results.push(result);
      if (result.success) {
        this.globalState[`subtask_${subtaskIndex}`] = result.output;
      }
      coordinationTokens += this.capabilities.coordinationTokensPerTask;
      this.dispatchCount++;
    }

    this.coordinationOverhead += coordinationTokens;
    return this.record(this.aggregate(task, results, coordinationTokens));
  }

  getGlobalState(): Readonly<Record<string, unknown>> {
    return { ...this.globalState };
  }

  getMetrics(): CentralizedMetrics {
    const agents = this.agents.map(agent => agent.getMetrics());
    return {
      ...super.getMetrics(),
      architecture: this.architecture,
      agents,
      totalAgentTokens: agents.reduce((sum, a) => sum + a.tokensUsed, 0),
      coordinationOverhead: this.coordinationOverhead,
      dispatchCount: this.dispatchCount,
    };
  }

  resetMetrics(): void {
    super.resetMetrics();
    for (const agent of this.agents) agent.resetMetrics();
    this.globalState = {};
    this.dispatchCount = 0;
    this.coordinationOverhead = 0;
  }

  private decompose(task: Task): Assignment[] {
    if (!isTaskSequence(task)) {
      return [{ subtaskIndex: 0, worker: this.agents[0], task }];
    }
    return task.map((subtask, subtaskIndex) => ({
      subtaskIndex,
      worker: this.agents[subtaskIndex % this.numAgents],
      task: subtask,
    }));
  }

  private aggregate(task: Task, results: TaskResult[], coordinationTokens: number): TaskResult {
    const workerTokens = results.reduce((sum, r) => sum + r.tokensUsed, 0);
    const successful = results.filter(r => r.success);
    const failedIndices = results.flatMap((r, i) => (r.success ? [] : [i]));
    const metadata = {
      architecture: this.architecture,
      numAgents: this.numAgents,
      successPolicy: this.successPolicy,
      successfulSubtasks: successful.length,
      failedSubtasks: failedIndices.length,
      failedIndices,
      coordinationOverhead: coordinationTokens,
      coordinationTokens,
    };

    getLogger().debug(
      { agentId: this.agentId, subtasks: results.length, succeeded: successful.length },
      'Centralized aggregation',
    );

    if (meetsSuccessPolicy(this.successPolicy, successful.length, results.length)) {
      return createTaskResult({
        success: true,
        output: isTaskSequence(task) ? successful.map(r => r.output) : successful[0].output,
        tokensUsed: workerTokens + coordinationTokens,
        metadata,
      });
    }

    const errors = failedIndices.map(i => `subtask ${i}: ${results[i].error ?? 'unknown error'}`);
    getLogger().warn({ agentId: this.agentId, policy: this.successPolicy, errors }, 'Centralized success policy not met');
    return createTaskResult({
      success: false,
      tokensUsed: workerTokens + coordinationTokens,
      error: `Success policy '${this.successPolicy}' not met: ${successful.length}/${results.length} sub-tasks succeeded (${errors.join('; ')})`,
      metadata,
    });
  }
}

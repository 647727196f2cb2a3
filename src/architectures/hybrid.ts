import { Agent, validateAgentCount, type AgentOptions } from './agent.js';
import { SingleAgent } from './single.js';
import { PeerGroup, type PeerOutcome } from './peer-group.js';
import { TaskGroup, type SettledUnit, type TaskGroupStats } from './pool.js';
import {
  createTaskResult,
  isTaskSequence,
  meetsSuccessPolicy,
  type AgentMetrics,
  type SuccessPolicy,
  type SystemMetrics,
  type Task,
  type TaskContext,
  type TaskResult,
} from './types.js';
import { ConfigError, describeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

export interface HybridOptions extends AgentOptions {
  numAgents?: number;
  teamSize?: number;
  successPolicy?: SuccessPolicy;
  maxConcurrency?: number;
}

export interface TeamMetrics {
  teamIndex: number;
  agents: AgentMetrics[];
  messagesExchanged: number;
}

export interface HybridMetrics extends SystemMetrics {
  teams: TeamMetrics[];
  messagesExchanged: number;
  /** Team dispatch counters; a rejected team counts under `failedUnits`. */
  dispatch: TaskGroupStats;
}

interface TeamAssignment {
  subtaskIndex: number;
  task: Task;
}

interface SubtaskOutcome {
  subtaskIndex: number;
  teamIndex: number;
  outcome: PeerOutcome;
}

/**
 * Hybrid Multi-Agent
 *
 * A coordination layer plans (`strategyTokens`), hands sub-task i to team
 * i % numTeams, lets the teams run concurrently, and aggregates
 * (`aggregationTokens`). Inside a team, members follow the peer-round
 * protocol and each broadcast message costs `teamCommTokens` once.
 *
 * `numAgents` must be a multiple of `teamSize`; leftover workers are a
 * configuration error rather than idle capacity.
 */
export class HybridMultiAgent extends Agent {
  readonly architecture = 'hybrid' as const;
  readonly numAgents: number;
  readonly teamSize: number;
  readonly numTeams: number;
  readonly successPolicy: SuccessPolicy;
  readonly teams: readonly PeerGroup[];
  private readonly group: TaskGroup;
  private globalState: Record<string, unknown> = {};
  private coordinationOverhead = 0;

  constructor(options: HybridOptions = {}) {
    super('hybrid_system', options);
    this.numAgents = validateAgentCount('numAgents', options.numAgents ?? 6);
    this.teamSize = validateAgentCount('teamSize', options.teamSize ?? 2);
    if (this.numAgents % this.teamSize !== 0) {
      throw new ConfigError(
        `numAgents (${this.numAgents}) must be a multiple of teamSize (${this.teamSize})`,
      );
    }
    this.numTeams = this.numAgents / this.teamSize;
    this.successPolicy = options.successPolicy ?? 'any';

    this.teams = Array.from({ length: this.numTeams }, (_, teamIndex) => {
      const members = Array.from({ length: this.teamSize }, (_, memberIndex) => new SingleAgent({
        agentId: `${this.agentId}_team${teamIndex}_agent${memberIndex}`,
        capabilities: this.capabilities,
        maxMessageHistory: options.maxMessageHistory,
      }));
      return new PeerGroup(members, {
        rounds: this.capabilities.coordinationRounds,
        tokensPerMessage: this.capabilities.teamCommTokens,
        charging: 'per-message',
        messageType: 'team_result',
        maxMessageHistory: options.maxMessageHistory,
        context: { teamIndex },
      });
    });
    this.group = new TaskGroup({ name: this.agentId, maxConcurrency: options.maxConcurrency });
  }

  async executeTask(task: Task, context: TaskContext = {}): Promise<TaskResult> {
    this.globalState = {};

    if (isTaskSequence(task) && task.length === 0) {
      return this.record(createTaskResult({
        success: false,
        error: 'Task sequence is empty',
        metadata: { architecture: this.architecture, numTeams: this.numTeams, coordinationTokens: 0 },
      }));
    }

    const { strategyTokens, aggregationTokens } = this.capabilities;
    const plan = this.plan(task);

    const settled = await this.group.run(this.teams.map((team, teamIndex) => ({
      id: `team${teamIndex}`,
      run: () => this.runTeam(team, teamIndex, plan[teamIndex], context),
    })));

    const outcomes = settled
      .flatMap(entry => this.unwrap(entry, plan[entry.index]))
      .sort((a, b) => a.subtaskIndex - b.subtaskIndex);

    for (const { subtaskIndex, outcome } of outcomes) {
      if (outcome.consensus) {
        this.globalState[`subtask_${subtaskIndex}`] = outcome.consensus.result.output;
      }
    }

    const teamTokens = outcomes.reduce((sum, o) => sum + o.outcome.taskTokens + o.outcome.communicationTokens, 0);
    const teamCommTokens = outcomes.reduce((sum, o) => sum + o.outcome.communicationTokens, 0);
    const coordinationTokens = strategyTokens + aggregationTokens + teamCommTokens;
    this.coordinationOverhead += coordinationTokens;

    return this.record(this.aggregate(task, outcomes, {
      tokensUsed: strategyTokens + aggregationTokens + teamTokens,
      coordinationTokens,
      expected: plan.reduce((sum, assignments) => sum + assignments.length, 0),
    }));
  }

  getGlobalState(): Readonly<Record<string, unknown>> {
    return { ...this.globalState };
  }

  getMetrics(): HybridMetrics {
    const teams = this.teams.map((team, teamIndex) => ({
      teamIndex,
      agents: team.peers.map(agent => agent.getMetrics()),
      messagesExchanged: team.messagesExchanged,
    }));
    const agents = teams.flatMap(team => team.agents);
    return {
      ...super.getMetrics(),
      architecture: this.architecture,
      agents,
      teams,
      totalAgentTokens: agents.reduce((sum, a) => sum + a.tokensUsed, 0),
      coordinationOverhead: this.coordinationOverhead,
      messagesExchanged: teams.reduce((sum, t) => sum + t.messagesExchanged, 0),
      dispatch: this.group.getStats(),
    };
  }

  resetMetrics(): void {
    super.resetMetrics();
    for (const team of this.teams) team.reset();
    this.group.resetStats();
    this.globalState = {};
    this.coordinationOverhead = 0;
  }

  /** Team-level assignment lists, indexed by team. */
  private plan(task: Task): TeamAssignment[][] {
    const plan: TeamAssignment[][] = this.teams.map(() => []);
    if (!isTaskSequence(task)) {
      plan[0].push({ subtaskIndex: 0, task });
      return plan;
    }
    task.forEach((subtask, subtaskIndex) => {
      plan[subtaskIndex % this.numTeams].push({ subtaskIndex, task: subtask });
    });
    return plan;
  }

  private async runTeam(
    team: PeerGroup,
    teamIndex: number,
    assignments: TeamAssignment[],
    context: TaskContext,
  ): Promise<SubtaskOutcome[]> {
    const outcomes: SubtaskOutcome[] = [];
    for (const { subtaskIndex, task } of assignments) {
      const outcome = await team.run(task, { ...context, subtaskIndex });
      outcomes.push({ subtaskIndex, teamIndex, outcome });
    }
    return outcomes;
  }

  /** A rejected team fails every sub-task it was assigned. */
  private unwrap(entry: SettledUnit<SubtaskOutcome[]>, assignments: TeamAssignment[]): SubtaskOutcome[] {
    if (entry.status === 'fulfilled') return entry.value;
    const error = `${entry.id} dispatch failed: ${describeError(entry.error)}`;
    getLogger().error({ team: entry.id, error }, 'Team dispatch failed');
    return assignments.map(({ subtaskIndex }) => ({
      subtaskIndex,
      teamIndex: entry.index,
      outcome: {
        executions: [],
        consensus: undefined,
        taskTokens: 0,
        communicationTokens: 0,
        messagesExchanged: 0,
        errors: [error],
      },
    }));
  }

  private aggregate(
    task: Task,
    outcomes: SubtaskOutcome[],
    totals: { tokensUsed: number; coordinationTokens: number; expected: number },
  ): TaskResult {
    const succeeded = outcomes.filter(o => o.outcome.consensus !== undefined);
    const failed = outcomes.filter(o => o.outcome.consensus === undefined);
    const metadata = {
      architecture: this.architecture,
      numTeams: this.numTeams,
      teamSize: this.teamSize,
      successPolicy: this.successPolicy,
      successfulSubtasks: succeeded.length,
      failedSubtasks: failed.length,
      messagesExchanged: outcomes.reduce((sum, o) => sum + o.outcome.messagesExchanged, 0),
      coordinationOverhead: totals.coordinationTokens,
      coordinationTokens: totals.coordinationTokens,
    };

    if (meetsSuccessPolicy(this.successPolicy, succeeded.length, totals.expected)) {
      const outputs = succeeded.map(o => o.outcome.consensus?.result.output);
      return createTaskResult({
        success: true,
        output: isTaskSequence(task) ? outputs : outputs[0],
        tokensUsed: totals.tokensUsed,
        metadata,
      });
    }

    const errors = failed.map(o => `subtask ${o.subtaskIndex} (team ${o.teamIndex}): ${o.outcome.errors.join(', ')}`);
    getLogger().warn({ agentId: this.agentId, policy: this.successPolicy }, 'Hybrid success policy not met');
    return createTaskResult({
      success: false,
      tokensUsed: totals.tokensUsed,
      error: `Success policy '${this.successPolicy}' not met: ${succeeded.length}/${totals.expected} sub-tasks succeeded (${errors.join('; ')})`,
      metadata,
    });
  }
}

import { Agent, type AgentOptions } from './agent.js';
import { createTaskResult, isTaskFn, type Task, type TaskContext, type TaskFn, type TaskResult } from './types.js';
import { describeError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

/**
 * One agent, no coordination. Callables are invoked with the context;
 * sequences and any other value are returned verbatim. Every call costs
 * `tokensPerTask`, whether or not the task succeeds.
 */
export class SingleAgent extends Agent {
  readonly architecture = 'single' as const;

  constructor(options: AgentOptions = {}) {
    super('single_agent', options);
  }

  async executeTask(task: Task, context: TaskContext = {}): Promise<TaskResult> {
    const tokens = this.capabilities.tokensPerTask;
    const metadata = { architecture: this.architecture, agentId: this.agentId, coordinationTokens: 0 };

    try {
      const output = isTaskFn(task) ? await invokeTask(task, context) : task;
      return this.record(createTaskResult({ success: true, output, tokensUsed: tokens, metadata }));
    } catch (err) {
      const error = describeError(err);
      getLogger().warn({ agentId: this.agentId, error }, 'Task failed');
      return this.record(createTaskResult({ success: false, tokensUsed: tokens, error, metadata }));
    }
  }
}

async function invokeTask(task: TaskFn, context: TaskContext): Promise<unknown> {
  if (task.length > 1) {
    throw new TypeError(`Task callable must accept at most one argument (declares ${task.length})`);
  }
  return await task(context);
}

/**
 * Agent
 * Shared contract for every architecture: token and outcome bookkeeping,
 * a bounded message history, and the executeTask / getMetrics /
 * resetMetrics surface. Subclasses supply the coordination policy.
 */

import { resolveCapabilities, type Capabilities, type CapabilityInput } from './capabilities.js';
import type { AgentMetrics, ArchitectureName, Message, Task, TaskContext, TaskResult } from './types.js';
import { ConfigError } from '../core/errors.js';

export const DEFAULT_MAX_MESSAGE_HISTORY = 1000;

export interface AgentOptions {
  agentId?: string;
  capabilities?: CapabilityInput;
  /** Messages kept for inspection; older entries are dropped first. */
  maxMessageHistory?: number;
}

export abstract class Agent {
  abstract readonly architecture: ArchitectureName;
  readonly agentId: string;
  readonly capabilities: Capabilities;

  protected tokensUsed = 0;
  protected tasksCompleted = 0;
  protected errorsCount = 0;
  protected messagesSent = 0;
  protected messagesReceived = 0;
  private messageHistory: Message[] = [];
  private readonly maxMessageHistory: number;

  constructor(defaultId: string, options: AgentOptions = {}) {
    const agentId = options.agentId ?? defaultId;
    if (!agentId) {
      throw new ConfigError('agentId must be a non-empty string');
    }
    const maxHistory = options.maxMessageHistory ?? DEFAULT_MAX_MESSAGE_HISTORY;
    if (!Number.isInteger(maxHistory) || maxHistory < 0) {
      throw new ConfigError(`maxMessageHistory must be a non-negative integer, got ${maxHistory}`);
    }
    this.agentId = agentId;
    this.capabilities = resolveCapabilities(options.capabilities);
    this.maxMessageHistory = maxHistory;
  }

  /**
   * Execute a task. Resolves with a failed TaskResult instead of rejecting
   * when the task itself fails.
   */
  abstract executeTask(task: Task, context?: TaskContext): Promise<TaskResult>;

  sendMessage(message: Message): void {
    this.messagesSent++;
    this.remember(message);
  }

  receiveMessage(message: Message): void {
    this.messagesReceived++;
    this.remember(message);
  }

  getMessageHistory(): Message[] {
    return [...this.messageHistory];
  }

  getMetrics(): AgentMetrics {
    return {
      agentId: this.agentId,
      tokensUsed: this.tokensUsed,
      tasksCompleted: this.tasksCompleted,
      errorsCount: this.errorsCount,
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
    };
  }

  resetMetrics(): void {
    this.tokensUsed = 0;
    this.tasksCompleted = 0;
    this.errorsCount = 0;
    this.messagesSent = 0;
    this.messagesReceived = 0;
    this.messageHistory = [];
  }

  /**
   * Fold one executeTask outcome into the counters. Called exactly once
   * per executeTask, on success and on failure alike.
   */
  protected record(result: TaskResult): TaskResult {
    this.tokensUsed += result.tokensUsed;
    if (result.success) {
      this.tasksCompleted++;
    } else {
      this.errorsCount++;
    }
    return result;
  }

  private remember(message: Message): void {
    if (this.maxMessageHistory === 0) return;
    this.messageHistory.push(message);
    if (this.messageHistory.length > this.maxMessageHistory) {
      this.messageHistory = this.messageHistory.slice(-this.maxMessageHistory);
    }
  }
}

export function validateAgentCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be an integer >= 1, got ${value}`);
  }
  return value;
}

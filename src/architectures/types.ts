import { nanoid } from 'nanoid';
import { ConfigError } from '../core/errors.js';

export const ARCHITECTURE_NAMES = [
  'single',
  'independent',
  'centralized',
  'decentralized',
  'hybrid',
] as const;

export type ArchitectureName = typeof ARCHITECTURE_NAMES[number];

export function isArchitectureName(value: unknown): value is ArchitectureName {
  return typeof value === 'string' && ARCHITECTURE_NAMES.some(name => name === value);
}

export type TaskContext = Readonly<Record<string, unknown>>;

/** A unit of work invoked with the caller's (possibly enriched) context. */
export type TaskFn = (context: TaskContext) => unknown;

export type TaskValue = string | number | boolean | bigint | symbol | object | null | undefined;

/**
 * What an architecture can be asked to execute: a callable, an ordered
 * sequence of sub-tasks, or an opaque value that is returned verbatim.
 */
export type Task = TaskFn | readonly Task[] | TaskValue;

export function isTaskFn(task: Task): task is TaskFn {
  return typeof task === 'function';
}

export function isTaskSequence(task: Task): task is readonly Task[] {
  return Array.isArray(task);
}

export type Metadata = Readonly<Record<string, unknown>>;

export interface TaskResult {
  readonly success: boolean;
  readonly output: unknown;
  readonly tokensUsed: number;
  readonly error?: string;
  readonly metadata: Metadata;
}

export interface Message {
  readonly id: string;
  readonly senderId: string;
  readonly content: unknown;
  readonly messageType: string;
  readonly metadata: Metadata;
}

/** How a coordinator decides whether its sub-results add up to success. */
export type SuccessPolicy = 'any' | 'majority' | 'all';

export interface AgentMetrics {
  agentId: string;
  tokensUsed: number;
  tasksCompleted: number;
  errorsCount: number;
  messagesSent: number;
  messagesReceived: number;
}

export interface SystemMetrics extends AgentMetrics {
  architecture: ArchitectureName;
  agents: AgentMetrics[];
  totalAgentTokens: number;
  coordinationOverhead: number;
}

export interface TaskResultInit {
  success: boolean;
  /** Kept as given, `undefined` included; results without one carry `null`. */
  output?: unknown;
  tokensUsed?: number;
  error?: string;
  metadata?: Record<string, unknown>;
}

export function createTaskResult(init: TaskResultInit): TaskResult {
  const tokensUsed = init.tokensUsed ?? 0;
  if (!Number.isFinite(tokensUsed) || tokensUsed < 0) {
    throw new RangeError(`tokensUsed must be a non-negative number, got ${tokensUsed}`);
  }
  const result: TaskResult = {
    success: init.success,
    output: 'output' in init ? init.output : null,
    tokensUsed,
    ...(init.error !== undefined ? { error: init.error } : {}),
    metadata: Object.freeze({ ...init.metadata }),
  };
  return Object.freeze(result);
}

export interface MessageInit {
  senderId: string;
  content: unknown;
  messageType?: string;
  metadata?: Record<string, unknown>;
}

export function createMessage(init: MessageInit): Message {
  if (!init.senderId) {
    throw new ConfigError('Message senderId must be a non-empty string');
  }
  return Object.freeze({
    id: nanoid(12),
    senderId: init.senderId,
    content: init.content,
    messageType: init.messageType ?? 'default',
    metadata: Object.freeze({ ...init.metadata }),
  });
}

export function meetsSuccessPolicy(policy: SuccessPolicy, succeeded: number, total: number): boolean {
  if (total === 0) return false;
  switch (policy) {
    case 'any':
      return succeeded > 0;
    case 'majority':
      return succeeded * 2 > total;
    case 'all':
      return succeeded === total;
  }
}

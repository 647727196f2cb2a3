/**
 * Peer Group
 * Round-based peer-to-peer protocol shared by the decentralized
 * architecture and by each hybrid team.
 *
 * Each round every peer executes in order, then every successful peer
 * broadcasts its output. Broadcasts land only after the whole round has
 * executed, so a peer in round r sees exactly the messages of rounds < r.
 * Consensus is the successful result with the highest (round, peer index).
 */

import { MessageBus } from './message-bus.js';
import type { SingleAgent } from './single.js';
import { createMessage, type Message, type Task, type TaskContext, type TaskResult } from './types.js';
import { getLogger } from '../core/logger.js';

/**
 * `per-delivery` charges the sender once for every peer reached;
 * `per-message` charges once per broadcast regardless of group size.
 */
export type MessageCharging = 'per-delivery' | 'per-message';

export interface PeerGroupOptions {
  rounds: number;
  tokensPerMessage: number;
  charging: MessageCharging;
  messageType: string;
  maxMessageHistory?: number;
  /** Extra context every peer sees, e.g. the team index. */
  context?: TaskContext;
}

export interface PeerExecution {
  round: number;
  peerIndex: number;
  agentId: string;
  result: TaskResult;
}

export interface PeerOutcome {
  executions: PeerExecution[];
  consensus: PeerExecution | undefined;
  taskTokens: number;
  communicationTokens: number;
  messagesExchanged: number;
  errors: string[];
}

export class PeerGroup {
  readonly peers: readonly SingleAgent[];
  private readonly options: PeerGroupOptions;
  private readonly bus: MessageBus;
  private inboxes = new Map<string, Message[]>();
  private totalMessages = 0;
  private totalCommunicationTokens = 0;

  constructor(peers: readonly SingleAgent[], options: PeerGroupOptions) {
    this.peers = peers;
    this.options = options;
    this.bus = new MessageBus(options.maxMessageHistory);

    for (const peer of peers) {
      this.bus.subscribe(peer.agentId, message => {
        peer.receiveMessage(message);
        this.inboxes.get(peer.agentId)?.push(message);
      });
    }
  }

  async run(task: Task, context: TaskContext = {}): Promise<PeerOutcome> {
    this.inboxes = new Map(this.peers.map(peer => [peer.agentId, []]));
    const executions: PeerExecution[] = [];
    let communicationTokens = 0;
    let messagesExchanged = 0;

    for (let round = 0; round < this.options.rounds; round++) {
      const roundExecutions: PeerExecution[] = [];

      for (const [peerIndex, peer] of this.peers.entries()) {
        const peerContext: TaskContext = {
          ...context,
          ...this.options.context,
          round,
          peerMessages: [...(this.inboxes.get(peer.agentId) ?? [])],
        };
        const result = await peer.executeTask(task, peerContext);
        roundExecutions.push({ round, peerIndex, agentId: peer.agentId, result });
      }

      for (const execution of roundExecutions) {
        if (!execution.result.success) continue;
        const sender = this.peers[execution.peerIndex];
        const message = createMessage({
          senderId: sender.agentId,
          content: execution.result.output,
          messageType: this.options.messageType,
          metadata: { round },
        });
        sender.sendMessage(message);
        const deliveries = this.bus.broadcast(message);
        const charged = this.options.charging === 'per-delivery' ? deliveries : 1;
        communicationTokens += charged * this.options.tokensPerMessage;
        messagesExchanged++;
      }

      executions.push(...roundExecutions);
    }

    this.totalMessages += messagesExchanged;
    this.totalCommunicationTokens += communicationTokens;

    const consensus = executions.reduce<PeerExecution | undefined>(
      (latest, execution) => (execution.result.success ? execution : latest),
      undefined,
    );
    const errors = executions
      .filter(e => !e.result.success)
      .map(e => `${e.agentId}@round${e.round}: ${e.result.error ?? 'unknown error'}`);

    getLogger().debug(
      { rounds: this.options.rounds, peers: this.peers.length, messagesExchanged, consensus: consensus?.agentId },
      'Peer rounds complete',
    );

    return {
      executions,
      consensus,
      taskTokens: executions.reduce((sum, e) => sum + e.result.tokensUsed, 0),
      communicationTokens,
      messagesExchanged,
      errors,
    };
  }

  get messagesExchanged(): number {
    return this.totalMessages;
  }

  get communicationTokens(): number {
    return this.totalCommunicationTokens;
  }

  getMessageHistory(): Message[] {
    return this.bus.getHistory();
  }

  reset(): void {
    this.totalMessages = 0;
    this.totalCommunicationTokens = 0;
    this.inboxes = new Map();
    this.bus.clearHistory();
    for (const peer of this.peers) peer.resetMetrics();
  }
}

/**
 * Peer Message Bus
 * In-memory broadcast channel for peers of one decentralized group.
 * Delivery is synchronous: a broadcast is visible to every subscriber
 * by the time `broadcast` returns.
 */

import { EventEmitter } from 'events';
import type { Message } from './types.js';

export type MessageHandler = (message: Message) => void;

export class MessageBus {
  private emitter = new EventEmitter();
  private subscribers = new Set<string>();
  private history: Message[] = [];
  private maxHistory: number;

  constructor(maxHistory = 1000) {
    this.maxHistory = maxHistory;
    this.emitter.setMaxListeners(0);
  }

  /**
   * Deliver a message to every subscriber except its sender.
   * Returns the number of deliveries made.
   */
  broadcast(message: Message): number {
    this.record(message);

    let delivered = 0;
    for (const agentId of this.subscribers) {
      if (agentId === message.senderId) continue;
      if (this.emitter.emit(`agent:${agentId}`, message)) delivered++;
    }
    return delivered;
  }

  subscribe(agentId: string, handler: MessageHandler): () => void {
    this.subscribers.add(agentId);
    this.emitter.on(`agent:${agentId}`, handler);

    return () => {
      this.emitter.off(`agent:${agentId}`, handler);
      if (this.emitter.listenerCount(`agent:${agentId}`) === 0) {
        this.subscribers.delete(agentId);
      }
    };
  }

  getHistory(filter?: { senderId?: string; messageType?: string }): Message[] {
    return this.history.filter(msg => {
      if (filter?.senderId && msg.senderId !== filter.senderId) return false;
      if (filter?.messageType && msg.messageType !== filter.messageType) return false;
      return true;
    });
  }

  clearHistory(): void {
    this.history = [];
  }

  destroy(): void {
    this.emitter.removeAllListeners();
    this.subscribers.clear();
    this.history = [];
  }

  private record(message: Message): void {
    if (this.maxHistory === 0) return;
    this.history.push(message);
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }
  }
}

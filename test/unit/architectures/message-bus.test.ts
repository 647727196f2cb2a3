import { describe, it, expect, vi } from 'vitest';
import { MessageBus } from '../../../src/architectures/message-bus.js';
import { createMessage, type Message } from '../../../src/architectures/types.js';

describe('MessageBus', () => {
  it('delivers to every subscriber except the sender', () => {
    const bus = new MessageBus();
    const a = vi.fn();
    const b = vi.fn();
    const c = vi.fn();
    bus.subscribe('a', a);
    bus.subscribe('b', b);
    bus.subscribe('c', c);

    const message = createMessage({ senderId: 'a', content: 'hello' });
    const deliveries = bus.broadcast(message);

    expect(deliveries).toBe(2);
    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledWith(message);
    expect(c).toHaveBeenCalledWith(message);
  });

  it('stops delivering after unsubscribe', () => {
    const bus = new MessageBus();
    const received: Message[] = [];
    bus.subscribe('a', vi.fn());
    const unsubscribe = bus.subscribe('b', m => received.push(m));

    bus.broadcast(createMessage({ senderId: 'a', content: 1 }));
    unsubscribe();
    const deliveries = bus.broadcast(createMessage({ senderId: 'a', content: 2 }));

    expect(received.map(m => m.content)).toEqual([1]);
    expect(deliveries).toBe(0);
  });

  it('filters history by sender and type', () => {
    const bus = new MessageBus();
    bus.broadcast(createMessage({ senderId: 'a', content: 1, messageType: 'task_result' }));
    bus.broadcast(createMessage({ senderId: 'b', content: 2, messageType: 'task_result' }));
    bus.broadcast(createMessage({ senderId: 'a', content: 3, messageType: 'note' }));

    expect(bus.getHistory().map(m => m.content)).toEqual([1, 2, 3]);
    expect(bus.getHistory({ senderId: 'a' }).map(m => m.content)).toEqual([1, 3]);
    expect(bus.getHistory({ messageType: 'task_result' }).map(m => m.content)).toEqual([1, 2]);
  });

  it('keeps only the most recent messages', () => {
    const bus = new MessageBus(2);
    for (const content of [1, 2, 3]) {
      bus.broadcast(createMessage({ senderId: 'a', content }));
    }

    expect(bus.getHistory().map(m => m.content)).toEqual([2, 3]);
    bus.clearHistory();
    expect(bus.getHistory()).toEqual([]);
  });

  it('keeps no history when the limit is zero', () => {
    const bus = new MessageBus(0);
    const handler = vi.fn();
    bus.subscribe('b', handler);
    for (const content of [1, 2, 3, 4, 5]) {
      bus.broadcast(createMessage({ senderId: 'a', content }));
    }

    expect(bus.getHistory()).toEqual([]);
    expect(handler).toHaveBeenCalledTimes(5);
  });

  it('drops subscribers on destroy', () => {
    const bus = new MessageBus();
    const handler = vi.fn();
    bus.subscribe('b', handler);
    bus.destroy();

    expect(bus.broadcast(createMessage({ senderId: 'a', content: 'x' }))).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});

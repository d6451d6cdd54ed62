import { beforeEach, describe, expect, it } from 'vitest';
import { type EventType, eventBus } from '../src/infra/eventBus.js';

describe('EventBus', () => {
  beforeEach(() => {
    eventBus.clear();
  });

  it('delivers events to specific listeners', () => {
    const received: Array<{ event: EventType; data: unknown }> = [];
    eventBus.on('proposal.created', (event, data) => {
      received.push({ event, data });
    });

    eventBus.emit('proposal.created', { proposalId: '123' });
    eventBus.emit('decay.updated', { account: '0x1' });

    expect(received).toHaveLength(1);
    expect(received[0].event).toBe('proposal.created');
    expect(received[0].data).toEqual({ proposalId: '123' });
  });

  it('delivers all events to wildcard listeners', () => {
    const received: EventType[] = [];
    eventBus.on('*', (event) => {
      received.push(event);
    });

    eventBus.emit('proposal.created', {});
    eventBus.emit('decay.updated', {});
    eventBus.emit('relay.packet.delivered', {});

    expect(received).toEqual(['proposal.created', 'decay.updated', 'relay.packet.delivered']);
  });

  it('unsubscribes correctly', () => {
    const received: unknown[] = [];
    const unsub = eventBus.on('proposal.executed', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('proposal.executed', 'first');
    unsub();
    eventBus.emit('proposal.executed', 'second');

    expect(received).toEqual(['first']);
  });

  it('clear() removes all listeners', () => {
    const received: unknown[] = [];
    eventBus.on('proposal.created', (_e, data) => received.push(data));
    eventBus.on('*', (_e, data) => received.push(data));

    eventBus.clear();
    eventBus.emit('proposal.created', 'test');

    expect(received).toHaveLength(0);
  });

  it('isolates listener errors from other listeners', () => {
    const received: unknown[] = [];

    eventBus.on('proposal.created', () => {
      throw new Error('boom');
    });
    eventBus.on('proposal.created', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('proposal.created', 'value');

    expect(received).toEqual(['value']);
  });
});

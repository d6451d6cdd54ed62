/**
 * Simple in-memory pub/sub event bus.
 * Chain stores publish committed events here; the logger and the WebSocket
 * handler subscribe to broadcast them.
 */

export type EventType =
  | 'access.guardian.updated'
  | 'decay.updated'
  | 'decay.config.updated'
  | 'delegate.changed'
  | 'delegate.votes.changed'
  | 'proposal.created'
  | 'proposal.voted'
  | 'proposal.queued'
  | 'proposal.executed'
  | 'proposal.cancelled'
  | 'proposal.sent.crosschain'
  | 'proposal.received.crosschain'
  | 'relay.packet.delivered'
  | 'relay.packet.failed'
  | 'rewards.staked'
  | 'rewards.unstaked'
  | 'rewards.claimed'
  | 'rewards.notified';

export type EventCallback = (event: EventType, data: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: EventType, data: unknown): void {
    const specific = this.listeners.get(event);
    if (specific) {
      for (const cb of specific) {
        this.dispatch(cb, event, data);
      }
    }

    for (const cb of this.wildcardListeners) {
      this.dispatch(cb, event, data);
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }

  private dispatch(cb: EventCallback, event: EventType, data: unknown): void {
    try {
      cb(event, data);
    } catch (error) {
      process.emitWarning(`event listener for ${event} failed: ${String(error)}`);
    }
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();

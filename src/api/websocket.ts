/**
 * WebSocket live event feed.
 * Broadcasts committed chain events (proposal.created, delegate.votes.changed,
 * relay.packet.delivered, etc.) to all connected WebSocket clients.
 */

import type { FastifyInstance } from 'fastify';
import { type EventType, eventBus } from '../infra/eventBus.js';
import { toJsonSafe } from '../utils/json.js';

interface WSLike {
  readyState: number;
  send(data: string): void;
  on(event: string, cb: () => void): void;
}

const clients = new Set<WSLike>();

/** Number of currently connected WebSocket clients. */
export function connectedClients(): number {
  return clients.size;
}

export const formatFeedMessage = (event: EventType | 'connected', data: unknown): string => JSON.stringify({
  type: event,
  data: toJsonSafe(data),
  ts: new Date().toISOString(),
});

/**
 * Register the WebSocket endpoint and subscribe to the event bus.
 * Must be called AFTER @fastify/websocket is registered on the Fastify instance.
 */
export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  const unsubscribe = eventBus.on('*', (event: EventType, data: unknown) => {
    const message = formatFeedMessage(event, data);

    for (const ws of clients) {
      if (ws.readyState === 1 /* OPEN */) {
        ws.send(message);
      }
    }
  });

  app.addHook('onClose', async () => {
    unsubscribe();
  });

  app.get('/ws', { websocket: true }, (socket: WSLike) => {
    clients.add(socket);

    socket.send(formatFeedMessage('connected', { clients: clients.size }));

    socket.on('close', () => {
      clients.delete(socket);
    });

    socket.on('error', () => {
      clients.delete(socket);
    });
  });
}

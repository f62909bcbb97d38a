/**
 * WebSocket Handlers
 * Streams run and rollout progress to subscribed clients
 */

import type { FastifyInstance } from 'fastify';
import type { SocketStream } from '@fastify/websocket';
import type { WebSocket } from 'ws';
import { z } from 'zod';
import { createChildLogger } from '@tidewater/shared';

const logger = createChildLogger({ component: 'WebSocket' });

// Store connected clients
const clients = new Set<WebSocket>();

// Store channel subscriptions: channel -> Set of clients
const subscriptions = new Map<string, Set<WebSocket>>();

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ping') }),
  z.object({ type: z.literal('subscribe'), payload: z.object({ channel: z.string().min(1) }) }),
  z.object({ type: z.literal('unsubscribe'), payload: z.object({ channel: z.string().min(1) }) }),
]);

type ClientMessage = z.infer<typeof clientMessageSchema>;

export async function registerWebSocket(app: FastifyInstance): Promise<void> {
  app.get('/ws', { websocket: true }, (connection: SocketStream, req) => {
    const socket = connection.socket;
    logger.info({ ip: req.ip }, 'WebSocket client connected');

    clients.add(socket);

    socket.on('message', (message) => {
      let raw: unknown;
      try {
        raw = JSON.parse(message.toString());
      } catch (err) {
        logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Invalid WebSocket message');
        send(socket, { type: 'error', message: 'Messages must be JSON' });
        return;
      }

      const parsed = clientMessageSchema.safeParse(raw);
      if (!parsed.success) {
        send(socket, { type: 'error', message: 'Unknown message' });
        return;
      }
      handleMessage(socket, parsed.data);
    });

    socket.on('close', () => {
      removeClient(socket);
      logger.info('WebSocket client disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ error: err.message }, 'WebSocket error');
      removeClient(socket);
    });

    send(socket, { type: 'connected', timestamp: new Date().toISOString() });
  });
}

function handleMessage(socket: WebSocket, message: ClientMessage): void {
  switch (message.type) {
    case 'ping':
      send(socket, { type: 'pong', timestamp: new Date().toISOString() });
      break;

    case 'subscribe': {
      const { channel } = message.payload;
      const subs = subscriptions.get(channel) ?? new Set<WebSocket>();
      subs.add(socket);
      subscriptions.set(channel, subs);
      logger.debug({ channel }, 'Client subscribed to channel');
      send(socket, { type: 'subscribed', channel, timestamp: new Date().toISOString() });
      break;
    }

    case 'unsubscribe': {
      const { channel } = message.payload;
      const subs = subscriptions.get(channel);
      if (subs) {
        subs.delete(socket);
        if (subs.size === 0) {
          subscriptions.delete(channel);
        }
      }
      send(socket, { type: 'unsubscribed', channel, timestamp: new Date().toISOString() });
      break;
    }
  }
}

function removeClient(socket: WebSocket): void {
  clients.delete(socket);
  for (const [channel, subs] of subscriptions.entries()) {
    subs.delete(socket);
    if (subs.size === 0) {
      subscriptions.delete(channel);
    }
  }
}

function send(socket: WebSocket, message: Record<string, unknown>): void {
  if (socket.readyState === 1) {
    socket.send(JSON.stringify(message));
  }
}

/**
 * Broadcast message to all connected clients
 */
export function broadcast(message: { type: string; payload: unknown }): void {
  const data = JSON.stringify(message);

  for (const client of clients) {
    if (client.readyState === 1) {
      // OPEN
      client.send(data);
    }
  }
}

/**
 * Broadcast message to clients subscribed to a specific channel.
 * Falls back to every client when the channel has no subscribers.
 */
export function broadcastToChannel(channel: string, message: { type: string; payload: unknown }): void {
  const channelClients = subscriptions.get(channel);

  if (channelClients && channelClients.size > 0) {
    const data = JSON.stringify(message);
    for (const client of channelClients) {
      if (client.readyState === 1) {
        client.send(data);
      }
    }
  } else {
    broadcast(message);
  }
}

/**
 * TickScore — WebSocket Broadcast Server
 *
 * Attaches a WebSocket server to the HTTP server, subscribes to the
 * internal emitter and broadcasts every event as JSON to all clients.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import { tickScoreEmitter } from './emitter.js';
import type { TickScoreEvents, WSEvent } from './types.js';

let wss: WebSocketServer | null = null;
let clientCount = 0;
/** Clients that answered the last keepalive ping */
const alive = new WeakSet<WebSocket>();

const BROADCAST_EVENTS: Array<keyof TickScoreEvents> = [
  'score:updated',
  'score:rejected',
  'score:zeroed',
  'cycle:completed',
  'weights:published',
];

/** Validator state sent to each client on connect */
export interface ValidatorStatus {
  cycles: number;
  scoredEntities: number;
}

/**
 * Initialize the WebSocket server on an existing HTTP server.
 * Call this once after creating the HTTP server.
 */
export function initWebSocketServer(
  server: HttpServer,
  status: () => ValidatorStatus = () => ({ cycles: 0, scoredEntities: 0 }),
): WebSocketServer {
  wss = new WebSocketServer({ server, path: '/ws' });

  wss.on('connection', (ws) => {
    clientCount++;
    console.log(`[WS] Client connected (${clientCount} total)`);

    const initEvent: WSEvent = {
      type: 'connection:init',
      payload: {
        serverTime: Date.now(),
        connectedClients: clientCount,
        ...status(),
      },
    };
    ws.send(JSON.stringify(initEvent));

    alive.add(ws);
    ws.on('pong', () => {
      alive.add(ws);
    });

    ws.on('close', () => {
      clientCount = Math.max(0, clientCount - 1);
      console.log(`[WS] Client disconnected (${clientCount} remaining)`);
    });

    ws.on('error', (err) => {
      console.error('[WS] Client error:', err.message);
    });
  });

  // Keepalive ping every 30s
  const pingInterval = setInterval(() => {
    if (!wss) return;
    wss.clients.forEach((ws) => {
      if (!alive.has(ws)) {
        ws.terminate();
        return;
      }
      alive.delete(ws);
      ws.ping();
    });
  }, 30_000);

  wss.on('close', () => {
    clearInterval(pingInterval);
  });

  for (const eventType of BROADCAST_EVENTS) {
    tickScoreEmitter.on(eventType, broadcast);
  }

  console.log('[WS] WebSocket server initialized on /ws');
  return wss;
}

/**
 * Broadcast a WSEvent to all connected clients.
 */
export function broadcast(event: WSEvent): void {
  if (!wss) return;
  const data = JSON.stringify(event);
  wss.clients.forEach((client) => {
    if (client.readyState === WebSocket.OPEN) {
      client.send(data);
    }
  });
}

export function getConnectedClientCount(): number {
  return clientCount;
}

/**
 * Close the WebSocket server gracefully.
 */
export function closeWebSocketServer(): Promise<void> {
  for (const eventType of BROADCAST_EVENTS) {
    tickScoreEmitter.off(eventType, broadcast);
  }
  return new Promise((resolve) => {
    if (!wss) {
      resolve();
      return;
    }
    wss.close(() => {
      wss = null;
      clientCount = 0;
      resolve();
    });
  });
}

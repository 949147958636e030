import { describe, it, expect, afterEach } from 'vitest';
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { WebSocket } from 'ws';
import { TickScoreEmitter, tickScoreEmitter } from '../events/emitter.js';
import { closeWebSocketServer, getConnectedClientCount, initWebSocketServer } from '../events/ws-server.js';
import type { ScoreUpdatedEvent } from '../events/types.js';

const updated: ScoreUpdatedEvent = {
  type: 'score:updated',
  payload: {
    entityId: 'srv-1',
    score: 869,
    rawScore: 869,
    previousScore: null,
    classification: 'Excellent',
    penalty: null,
    reportId: 'report-12',
    timestamp: 1_750_000_000_000,
  },
};

describe('TickScoreEmitter', () => {
  it('delivers typed events to listeners', () => {
    const emitter = new TickScoreEmitter();
    const received: ScoreUpdatedEvent[] = [];
    emitter.onEvent('score:updated', (event) => received.push(event));

    expect(emitter.emitEvent('score:updated', updated)).toBe(true);
    expect(emitter.emitEvent('score:zeroed', {
      type: 'score:zeroed',
      payload: { entityId: 'srv-1', reason: 'no_reports', previousScore: 869, timestamp: 0 },
    })).toBe(false);
    expect(received).toEqual([updated]);
  });
});

describe('WebSocket broadcast', () => {
  let server: Server | null = null;
  let client: WebSocket | null = null;

  afterEach(async () => {
    client?.close();
    client = null;
    await closeWebSocketServer();
    const closing = server;
    server = null;
    if (closing) await new Promise<void>((resolve) => closing.close(() => resolve()));
  });

  /** Resolve with the next `count` JSON messages from the socket */
  function nextMessages(ws: WebSocket, count: number): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      const messages: unknown[] = [];
      ws.on('message', (data) => {
        messages.push(JSON.parse(data.toString()));
        if (messages.length === count) resolve(messages);
      });
      ws.on('error', reject);
    });
  }

  it('greets new clients with the validator status and forwards emitted events', async () => {
    const http = createServer();
    server = http;
    initWebSocketServer(http, () => ({ cycles: 3, scoredEntities: 2 }));
    await new Promise<void>((resolve) => http.listen(0, '127.0.0.1', resolve));
    const address = http.address();
    if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

    const ws = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
    client = ws;
    const messages = nextMessages(ws, 2);
    // Emit only after the greeting, once the server has registered the client
    ws.once('message', () => {
      tickScoreEmitter.emitEvent('score:updated', updated);
    });

    const [greeting, event] = await messages;
    expect(getConnectedClientCount()).toBe(1);
    expect(greeting).toMatchObject({
      type: 'connection:init',
      payload: { connectedClients: 1, cycles: 3, scoredEntities: 2 },
    });
    expect(event).toEqual(updated);
  });
});

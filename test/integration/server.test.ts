import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { startServer, type StartedServer } from '../../src/app.js';

type Json = string | number | boolean | null | { [k: string]: Json } | Json[];
interface GenericMessage {
  type?: string;
  payload?: Json;
  [k: string]: unknown;
}

function waitForMessage(
  ws: WebSocket,
  predicate: (data: GenericMessage) => boolean,
  timeoutMs = 2000,
): Promise<GenericMessage> {
  return new Promise((resolve, reject) => {
    const to = setTimeout(() => reject(new Error('timeout waiting for message')), timeoutMs);
    const onMessage = (raw: RawData) => {
      let parsed: GenericMessage;
      try {
        parsed = JSON.parse(raw.toString());
      } catch {
        parsed = { type: 'raw', payload: raw.toString() };
      }
      if (predicate(parsed)) {
        clearTimeout(to);
        ws.off('message', onMessage);
        resolve(parsed);
      }
    };
    ws.on('message', onMessage);
  });
}

function bodyOf(m: GenericMessage, id: string): { [k: string]: Json } | undefined {
  if (m.type !== 'gameState') return undefined;
  const payload = m.payload;
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) return undefined;
  const bodies = payload.bodies;
  if (typeof bodies !== 'object' || bodies === null || Array.isArray(bodies)) return undefined;
  const body = bodies[id];
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return undefined;
  return body;
}

describe('arena server', () => {
  let server: StartedServer;
  let client: WebSocket;
  let connected: Promise<GenericMessage>;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    server = await startServer(0); // ephemeral port
    client = new WebSocket(`ws://localhost:${server.port}`);
    // Listen before the first event-loop turn so the greeting cannot be missed
    connected = waitForMessage(client, (m) => m.type === 'connected');
  });

  afterEach(async () => {
    if (client.readyState !== WebSocket.CLOSED) {
      const closed = new Promise((r) => client.once('close', r));
      client.close();
      await closed;
    }
    await server.stop();
  });

  it('logs the port it bound', async () => {
    await connected;
    expect(server.port).toBeGreaterThan(0);
    expect(console.log).toHaveBeenCalledWith(`[startup] Arena listening on ws://0.0.0.0:${server.port}`);
  });

  it('answers ping', async () => {
    await connected;
    const pong = waitForMessage(client, (m) => m.type === 'ping');
    client.send(JSON.stringify({ type: 'ping' }));
    await expect(pong).resolves.toEqual({ type: 'ping' });
  });

  it('rejects malformed and unknown messages', async () => {
    await connected;

    const invalid = waitForMessage(client, (m) => m.type === 'error');
    client.send('not json');
    await expect(invalid).resolves.toEqual({ type: 'error', payload: 'invalid JSON' });

    const unknown = waitForMessage(client, (m) => m.type === 'error');
    client.send(JSON.stringify({ type: 'toString' }));
    await expect(unknown).resolves.toEqual({ type: 'error', payload: 'unknown message type: toString' });

    const badInput = waitForMessage(client, (m) => m.type === 'error');
    client.send(JSON.stringify({ type: 'inputSnapshot', payload: { keysDown: 'UP' } }));
    await expect(badInput).resolves.toEqual({ type: 'error', payload: 'invalid inputSnapshot payload' });
  });

  it('spawns a body and heats it up while thrust is held', async () => {
    const payload = (await connected).payload;
    const id =
      typeof payload === 'object' && payload !== null && !Array.isArray(payload) && typeof payload.id === 'string'
        ? payload.id
        : undefined;
    if (!id) throw new Error('no id in connected message');

    const spawned = waitForMessage(client, (m) => bodyOf(m, id)?.heat === 0);
    client.send(JSON.stringify({ type: 'spawnBody' }));
    await spawned;

    const heated = waitForMessage(client, (m) => {
      const heat = bodyOf(m, id)?.heat;
      return typeof heat === 'number' && heat > 0;
    });
    client.send(JSON.stringify({ type: 'inputSnapshot', payload: { keysDown: ['up', 'right'] } }));
    const state = await heated;
    expect(bodyOf(state, id)?.damping).toBe(1);
  });
});

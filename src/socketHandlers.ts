import type { RawData, WebSocketServer } from 'ws';
import type { IncomingMessage as NodeIncomingMessage } from 'http';
import type { IncomingMessage } from './types/messages.js';
import { clientIpFromRequest, sendJson } from './socketUtils.js';
import { handlePing } from './handlers/ping.js';
import { handleSpawnBody } from './handlers/spawnBody.js';
import { handleInputSnapshot } from './handlers/inputSnapshot.js';
import type { CustomWebSocket } from './types/socket.js';
import { randomUUID } from 'crypto';
import { initGameLoop, removePlayer } from './game/loop.js';

type Handler = (wss: WebSocketServer, socket: CustomWebSocket, msg: IncomingMessage) => void;

const handlers: Record<string, Handler> = {
  ping: handlePing,
  spawnBody: handleSpawnBody,
  inputSnapshot: handleInputSnapshot,
};

function isIncomingMessage(value: unknown): value is IncomingMessage {
  if (typeof value !== 'object' || value === null) return false;
  const v = value as Record<string, unknown>;
  return typeof v.type === 'string';
}

export function attachSocketHandlers(wss: WebSocketServer) {
  // Ensure the game loop is running (idempotent)
  initGameLoop(wss);
  wss.on('connection', (socket: CustomWebSocket, req: NodeIncomingMessage) => {
    socket.id = randomUUID();
    socket.ip = clientIpFromRequest(req);
    console.log(`[socket] New client connected: ${socket.id} (${socket.ip ?? 'unknown ip'})`);
    sendJson(socket, { type: 'info', payload: 'connected to server' });
    sendJson(socket, { type: 'connected', payload: { id: socket.id } });

    socket.on('message', (data: RawData) => {
      const text = data.toString();
      let parsed: unknown;

      try {
        parsed = JSON.parse(text);
      } catch {
        return sendJson(socket, { type: 'error', payload: 'invalid JSON' });
      }

      if (!isIncomingMessage(parsed)) {
        return sendJson(socket, {
          type: 'error',
          payload: 'message must have a string "type" field',
        });
      }

      if (!Object.hasOwn(handlers, parsed.type)) {
        return sendJson(socket, { type: 'error', payload: `unknown message type: ${parsed.type}` });
      }

      try {
        handlers[parsed.type](wss, socket, parsed);
      } catch (err) {
        console.error('[socket] handler error for type', parsed.type, err);
        return sendJson(socket, { type: 'error', payload: 'internal handler error' });
      }
    });

    socket.on('close', () => {
      removePlayer(socket.id);
      console.log(`[socket] Client disconnected: ${socket.id}`);
    });
  });
}

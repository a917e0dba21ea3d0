import type { WebSocketServer } from 'ws';
import type { CustomWebSocket } from '../types/socket.js';
import { sendJson } from '../socketUtils.js';

/** Liveness check: answers with a bare `ping` so clients can measure round trips. */
export function handlePing(_wss: WebSocketServer, socket: CustomWebSocket) {
  sendJson(socket, { type: 'ping' });
}

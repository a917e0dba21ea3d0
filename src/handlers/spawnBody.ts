import type { WebSocketServer } from 'ws';
import { broadcast, sendJson } from '../socketUtils.js';
import type { CustomWebSocket } from '../types/socket.js';
import { getGameState, spawnPlayer } from '../game/loop.js';

export function handleSpawnBody(wss: WebSocketServer, socket: CustomWebSocket) {
  if (!spawnPlayer(socket.id)) {
    return sendJson(socket, { type: 'error', payload: 'game loop not running' });
  }

  // Broadcast immediately so everyone sees the new body without waiting for the next tick
  const gameState = getGameState();
  if (gameState) broadcast(wss, { type: 'gameState', payload: gameState });
  sendJson(socket, { type: 'info', payload: `body spawned for ${socket.id}` });
}

import { WebSocketServer } from 'ws';
import { attachSocketHandlers } from './socketHandlers.js';
import { stopGameLoop } from './game/loop.js';
import type { StartedServer } from './types/server.js';

export type { StartedServer } from './types/server.js';

/**
 * Binds the arena's WebSocket server on `port` (0 picks a free one) and starts
 * the game loop. Plain ws only; wss is left to the proxy in front of it.
 */
export async function startServer(port: number): Promise<StartedServer> {
  const wss = new WebSocketServer({ port });
  attachSocketHandlers(wss);

  await new Promise<void>((resolve, reject) => {
    wss.once('listening', resolve);
    wss.once('error', reject);
  });
  wss.on('error', (err) => {
    console.error('[startup] WebSocket server error', err);
  });

  const addr = wss.address();
  const boundPort = typeof addr === 'object' && addr ? addr.port : port;
  console.log(`[startup] Arena listening on ws://0.0.0.0:${boundPort}`);

  return {
    wss,
    port: boundPort,
    stop: async () => {
      stopGameLoop();
      await new Promise<void>((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}

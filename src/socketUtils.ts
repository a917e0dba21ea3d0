import { WebSocket } from 'ws';
import type { WebSocketServer } from 'ws';
import type { IncomingMessage as NodeIncomingMessage } from 'http';
import type { OutgoingMessage } from './types/messages.js';

export function sendJson(socket: WebSocket, msg: OutgoingMessage) {
  socket.send(JSON.stringify(msg));
}

/** Sends one encoded copy of `msg` to every open client except `except`. */
export function broadcast(wss: WebSocketServer, msg: OutgoingMessage, except?: WebSocket) {
  const encoded = JSON.stringify(msg);
  for (const client of wss.clients) {
    if (client !== except && client.readyState === WebSocket.OPEN) client.send(encoded);
  }
}

function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  return raw?.split(',')[0]?.trim() || undefined;
}

/**
 * Client address for logging. Proxy headers win over the socket peer
 * (X-Forwarded-For first hop, then X-Real-IP); IPv4-mapped and IPv6
 * loopback forms are folded to plain IPv4.
 */
export function clientIpFromRequest(req: NodeIncomingMessage): string | undefined {
  const ip =
    firstHeaderValue(req.headers['x-forwarded-for']) ??
    firstHeaderValue(req.headers['x-real-ip']) ??
    req.socket.remoteAddress;
  if (!ip) return undefined;
  if (ip === '::1') return '127.0.0.1';
  return ip.replace(/^::ffff:/, '');
}

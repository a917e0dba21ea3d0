import type { WebSocketServer } from 'ws';
import type { IncomingMessage } from '../types/messages.js';
import type { CustomWebSocket } from '../types/socket.js';
import type { Vector2 } from '../types/game.js';
import { recordInput } from '../game/loop.js';
import { sendJson } from '../socketUtils.js';

export interface InputSnapshotPayload {
  keysDown?: string[];
  stick?: Vector2;
  gamepadSouth?: boolean;
}

function isVector2(v: unknown): v is Vector2 {
  if (!v || typeof v !== 'object') return false;
  const rec = v as Record<string, unknown>;
  return (
    typeof rec.x === 'number' &&
    typeof rec.y === 'number' &&
    Number.isFinite(rec.x) &&
    Number.isFinite(rec.y)
  );
}

/**
 * Validates the client's raw input payload. Unknown fields are ignored and
 * non-string keys are dropped; a present but malformed field rejects the whole payload.
 */
export function parseInputSnapshot(v: unknown): InputSnapshotPayload | undefined {
  if (!v || typeof v !== 'object') return undefined;
  const p = v as Record<string, unknown>;
  const out: InputSnapshotPayload = {};
  if (p.keysDown !== undefined) {
    if (!Array.isArray(p.keysDown)) return undefined;
    out.keysDown = p.keysDown
      .filter((k): k is string => typeof k === 'string')
      .map((k) => k.toUpperCase());
  }
  if (p.stick !== undefined) {
    if (!isVector2(p.stick)) return undefined;
    out.stick = { x: p.stick.x, y: p.stick.y };
  }
  if (p.gamepadSouth !== undefined) {
    if (typeof p.gamepadSouth !== 'boolean') return undefined;
    out.gamepadSouth = p.gamepadSouth;
  }
  return out;
}

/**
 * Records the latest raw input for the sender's body. Decoding into
 * semantic events happens on the next simulation tick, not here.
 */
export function handleInputSnapshot(
  _wss: WebSocketServer,
  socket: CustomWebSocket,
  msg: IncomingMessage,
) {
  const payload = parseInputSnapshot(msg.payload);
  if (!payload) {
    return sendJson(socket, { type: 'error', payload: 'invalid inputSnapshot payload' });
  }
  recordInput(socket.id, payload);
}

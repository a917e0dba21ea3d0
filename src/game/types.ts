import type { WebSocketServer } from 'ws';
import type { BodyState, EffectCue, EntityId } from '../types/game.js';
import type { ControlState } from './control.js';
import type { RawInputState } from './inputEvents.js';

export interface PlayerState {
  body: BodyState;
  controller: ControlState;
  input: RawInputState; // latest snapshot from the client (base for partial updates)
  pendingInputs: RawInputState[]; // snapshots received since the last sim tick, oldest first
  decodedInput: RawInputState; // last snapshot the sim tick decoded (edge detection)
  lastInputAt: number; // epoch ms
}

export interface InternalLoopState {
  simInterval: NodeJS.Timeout;
  broadcastInterval: NodeJS.Timeout;
  wss: WebSocketServer;
  players: Record<EntityId, PlayerState>;
  effects: EffectCue[]; // cues raised since the last broadcast
}

import type { WebSocketServer } from 'ws';
import { broadcast } from '../socketUtils.js';
import type { BodySnapshot, EntityId, GameState, Vector2 } from '../types/game.js';
import { BODY_EXPIRY_MS, BROADCAST_MS, MAX_PENDING_INPUTS, SIM_DT, SIM_HZ } from './constants.js';
import { createController, DEFAULT_TUNING, type Tuning } from './control.js';
import { heatColor } from './heat.js';
import { EMPTY_INPUT } from './inputEvents.js';
import { simulateBody } from './simulateBody.js';
import { createBody } from './spawn.js';
import type { InternalLoopState, PlayerState } from './types.js';

let loop: InternalLoopState | undefined;

export function snapshotGameState(state: Pick<InternalLoopState, 'players' | 'effects'>): GameState {
  const bodies: Record<EntityId, BodySnapshot> = {};
  for (const [id, { body, controller }] of Object.entries(state.players)) {
    bodies[id] = {
      position: { ...body.position },
      velocity: { ...body.velocity },
      damping: body.damping,
      heat: body.heat.amount,
      heatColor: heatColor(body.heat.amount),
      cooldownRemaining: controller.cooldown.remaining(),
    };
  }
  return { bodies, effects: [...state.effects] };
}

export function getGameState(): GameState | undefined {
  return loop && snapshotGameState(loop);
}

export function createPlayer(
  now = Date.now(),
  position?: Vector2,
  tuning: Readonly<Tuning> = DEFAULT_TUNING,
): PlayerState {
  const body = createBody(position);
  return {
    body,
    controller: createController([body], tuning),
    input: EMPTY_INPUT,
    pendingInputs: [],
    decodedInput: EMPTY_INPUT,
    lastInputAt: now,
  };
}

/** Creates (or resets) the body owned by `entityId`. Returns false when the loop is not running. */
export function spawnPlayer(entityId: EntityId): boolean {
  if (!loop) return false;
  loop.players[entityId] = createPlayer();
  return true;
}

export function removePlayer(entityId: EntityId) {
  if (!loop) return;
  delete loop.players[entityId];
}

export function recordInput(
  entityId: EntityId,
  partial: {
    keysDown?: Iterable<string>;
    stick?: Vector2;
    gamepadSouth?: boolean;
  },
) {
  const player = loop?.players[entityId];
  if (!player) return;
  // Replace, never mutate: queued snapshots share references with it.
  player.input = {
    keysDown: partial.keysDown ? new Set(partial.keysDown) : player.input.keysDown,
    stick: partial.stick ?? player.input.stick,
    gamepadSouth: partial.gamepadSouth ?? player.input.gamepadSouth,
  };
  // Queued rather than overwritten so a tap between two ticks still produces its edges.
  player.pendingInputs.push(player.input);
  if (player.pendingInputs.length > MAX_PENDING_INPUTS) {
    const oldest = player.pendingInputs.shift();
    if (oldest) player.decodedInput = oldest;
  }
  player.lastInputAt = Date.now();
}

/** One fixed simulation step over every player, then the inactivity purge. */
export function tickSimulation(
  state: Pick<InternalLoopState, 'players' | 'effects'>,
  dt: number,
  now = Date.now(),
) {
  for (const [id, player] of Object.entries(state.players)) {
    state.effects.push(...simulateBody(id, player, dt));
  }
  let purged = 0;
  for (const [id, player] of Object.entries(state.players)) {
    if (now - player.lastInputAt > BODY_EXPIRY_MS) {
      delete state.players[id];
      purged++;
    }
  }
  if (purged) console.log(`[sim] Purged ${purged} inactive body(ies)`);
}

export function initGameLoop(wss: WebSocketServer): InternalLoopState {
  if (loop) return loop;

  const simInterval = setInterval(() => {
    if (!loop) return;
    try {
      tickSimulation(loop, SIM_DT);
    } catch (err) {
      console.error('[sim] tick failed', err);
    }
  }, 1000 / SIM_HZ);

  const broadcastInterval = setInterval(() => {
    if (!loop) return;
    broadcast(wss, { type: 'gameState', payload: snapshotGameState(loop) });
    loop.effects = [];
  }, BROADCAST_MS);

  loop = { simInterval, broadcastInterval, wss, players: {}, effects: [] };
  wss.on('close', () => stopGameLoop());
  return loop;
}

export function stopGameLoop() {
  if (!loop) return;
  clearInterval(loop.simInterval);
  clearInterval(loop.broadcastInterval);
  loop = undefined;
}

import { afterEach, describe, expect, it, vi } from 'vitest';
import { BODY_EXPIRY_MS, HEAT_FORCE, HEAT_IMPULSE, SIM_DT } from '../../src/game/constants.js';
import { createPlayer, snapshotGameState, tickSimulation } from '../../src/game/loop.js';
import type { PlayerState } from '../../src/game/types.js';
import type { EffectCue } from '../../src/types/game.js';

function makeState(players: Record<string, PlayerState>) {
  const effects: EffectCue[] = [];
  return { players, effects };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('tickSimulation', () => {
  it('turns a held arrow into thrust, heat and a propulsor cue', () => {
    const now = 1_000;
    const player = createPlayer(now, { x: 0, y: 0 });
    player.pendingInputs.push({ keysDown: new Set(['UP']) });
    const state = makeState({ p1: player });

    tickSimulation(state, SIM_DT, now);

    expect(player.body.velocity.y).toBeGreaterThan(0);
    expect(player.body.velocity.x).toBe(0);
    expect(player.body.heat.amount).toBe(HEAT_FORCE);
    expect(state.effects).toEqual([{ kind: 'propulsor', ownerId: 'p1', position: { x: 0, y: -0.3 } }]);
  });

  it('fires on SPACE release and drops a boost inside the cooldown window', () => {
    const now = 1_000;
    const player = createPlayer(now, { x: 0, y: 0 });
    const state = makeState({ p1: player });
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);

    player.pendingInputs.push({ keysDown: new Set(['SPACE', 'RIGHT']) });
    tickSimulation(state, SIM_DT, now);
    expect(player.body.damping).toBe(6);

    player.pendingInputs.push({ keysDown: new Set(['RIGHT']) });
    tickSimulation(state, SIM_DT, now);
    expect(player.body.velocity.x).toBeGreaterThan(0);
    expect(player.body.heat.amount).toBeCloseTo(HEAT_IMPULSE + HEAT_FORCE);

    player.pendingInputs.push({ keysDown: new Set(['RIGHT', 'A']) });
    tickSimulation(state, SIM_DT, now);
    expect(debug).toHaveBeenCalledTimes(1);
    expect(state.effects.map((e) => e.kind)).toEqual(['explosion', 'propulsor', 'propulsor']);
  });

  it('keeps a brake tap that lands between two ticks', () => {
    const now = 1_000;
    const player = createPlayer(now, { x: 0, y: 0 });
    const state = makeState({ p1: player });

    player.pendingInputs.push({ keysDown: new Set(['UP']) });
    tickSimulation(state, SIM_DT, now);
    expect(player.body.heat.amount).toBe(HEAT_FORCE);

    player.pendingInputs.push({ keysDown: new Set(['UP', 'SPACE']) }, { keysDown: new Set(['UP']) });
    tickSimulation(state, SIM_DT, now);
    // Brake cooled to zero before the release impulse and the thrust heated it again.
    expect(player.body.heat.amount).toBe(HEAT_IMPULSE + HEAT_FORCE);
    expect(player.body.damping).toBe(1);
    expect(state.effects.map((e) => e.kind)).toEqual(['propulsor', 'explosion', 'propulsor']);
    expect(player.pendingInputs).toEqual([]);
  });

  it('keeps thrusting on the last snapshot when no new input arrives', () => {
    const now = 1_000;
    const player = createPlayer(now, { x: 0, y: 0 });
    const state = makeState({ p1: player });
    player.pendingInputs.push({ keysDown: new Set(['LEFT']) });
    tickSimulation(state, SIM_DT, now);
    tickSimulation(state, SIM_DT, now);
    expect(player.body.heat.amount).toBe(HEAT_FORCE + HEAT_FORCE);
  });

  it('raises one collision cue while thrust holds a body against a wall', () => {
    const now = 1_000;
    const player = createPlayer(now, { x: 5.7, y: 0 });
    const state = makeState({ p1: player });
    player.pendingInputs.push({ keysDown: new Set(['RIGHT']) });
    for (let i = 0; i < 60; i++) tickSimulation(state, SIM_DT, now);
    expect(state.effects.filter((e) => e.kind === 'collision')).toHaveLength(1);
  });

  it('purges players that stopped sending input', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const state = makeState({ idle: createPlayer(0), fresh: createPlayer(BODY_EXPIRY_MS) });
    tickSimulation(state, SIM_DT, BODY_EXPIRY_MS + 1);
    expect(Object.keys(state.players)).toEqual(['fresh']);
    expect(log).toHaveBeenCalledWith('[sim] Purged 1 inactive body(ies)');
  });
});

describe('snapshotGameState', () => {
  it('exposes heat, its colour and the cooldown', () => {
    const player = createPlayer(0, { x: 1, y: -1 });
    player.body.heat.amount = 1;
    player.controller.cooldown.start();
    const snap = snapshotGameState(makeState({ p1: player }));
    expect(snap.bodies.p1).toEqual({
      position: { x: 1, y: -1 },
      velocity: { x: 0, y: 0 },
      damping: 1,
      heat: 1,
      heatColor: '#ff0000',
      cooldownRemaining: 1,
    });
    expect(snap.effects).toEqual([]);
  });
});

import type { EffectCue, EntityId } from '../types/game.js';
import { stepControl } from './control.js';
import { collisionEffect, effectsForEvents } from './effects.js';
import { decodeInputSequence } from './inputEvents.js';
import { integrateBody } from './integrate.js';
import type { PlayerState } from './types.js';

/**
 * Advances one player by `dt` seconds: decode the input received since the
 * last tick, run the control step, then hand the actuation requests to the
 * integrator. Returns the effect cues raised along the way.
 */
export function simulateBody(id: EntityId, player: PlayerState, dt: number): EffectCue[] {
  const { events, last } = decodeInputSequence(player.decodedInput, player.pendingInputs);
  player.decodedInput = last;
  player.pendingInputs = [];

  const { applied, dropped } = stepControl(player.controller, dt, events);
  if (dropped.length) {
    console.debug(
      `[control] ${id} dropped ${dropped.map((e) => e.kind).join(', ')} (cooldown ${player.controller.cooldown.remaining().toFixed(2)}s)`,
    );
  }

  // Cues use the pre-integration position, where the action was taken.
  const cues = effectsForEvents(id, player.body.position, applied);
  const { contactStarted } = integrateBody(player.body, dt);
  if (contactStarted) cues.push(collisionEffect(id, player.body.position));
  return cues;
}

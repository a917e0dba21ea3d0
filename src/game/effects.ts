import type { EffectCue, EntityId, Vector2 } from '../types/game.js';
import { BODY_RADIUS } from './constants.js';
import type { InputEvent } from './inputEvents.js';

// Thruster side of the body: opposite to the direction of travel.
function behind(position: Vector2, direction: Vector2): Vector2 {
  return {
    x: position.x - direction.x * BODY_RADIUS,
    y: position.y - direction.y * BODY_RADIUS,
  };
}

/** Maps applied input events to particle cues at the body's position. */
export function effectsForEvents(
  ownerId: EntityId,
  position: Vector2,
  events: readonly InputEvent[],
): EffectCue[] {
  const cues: EffectCue[] = [];
  for (const event of events) {
    switch (event.kind) {
      case 'impulse':
        cues.push({ kind: 'explosion', ownerId, position: behind(position, event.direction) });
        break;
      case 'accelerate':
        cues.push({ kind: 'explosion', ownerId, position: { ...position } });
        break;
      case 'force':
        cues.push({ kind: 'propulsor', ownerId, position: behind(position, event.direction) });
        break;
      case 'stabilisation':
        break;
    }
  }
  return cues;
}

export function collisionEffect(ownerId: EntityId, position: Vector2): EffectCue {
  return { kind: 'collision', ownerId, position: { ...position } };
}

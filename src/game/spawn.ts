import type { BodyState } from '../types/game.js';
import { ARENA_HALF_HEIGHT, ARENA_HALF_WIDTH, BODY_RADIUS, DEFAULT_DAMPING } from './constants.js';
import { createHeat } from './heat.js';

export function randomSpawn() {
  const x = (Math.random() * 2 - 1) * (ARENA_HALF_WIDTH - BODY_RADIUS);
  const y = (Math.random() * 2 - 1) * (ARENA_HALF_HEIGHT - BODY_RADIUS);
  return { x, y };
}

export function createBody(position = randomSpawn()): BodyState {
  return {
    position: { x: position.x, y: position.y },
    velocity: { x: 0, y: 0 },
    damping: DEFAULT_DAMPING,
    impulse: null,
    force: { x: 0, y: 0 },
    heat: createHeat(),
    touchingWall: false,
    lastUpdatedAt: Date.now(),
  };
}

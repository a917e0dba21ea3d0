import type { BodyState } from '../types/game.js';
import {
  ARENA_HALF_HEIGHT,
  ARENA_HALF_WIDTH,
  BODY_MASS,
  BODY_RADIUS,
  CONTACT_SLOP,
  RESTITUTION,
} from './constants.js';

export interface IntegrateResult {
  /** True only on the step where the body comes into contact with a wall */
  contactStarted: boolean;
}

/**
 * Minimal stand-in for the rigid-body engine: consumes the impulse request,
 * applies the persistent force and damping, then moves the body and bounces
 * it off the arena walls. Gravity is off.
 */
export function integrateBody(body: BodyState, dt: number): IntegrateResult {
  const v = body.velocity;

  if (body.impulse) {
    v.x += body.impulse.x / BODY_MASS;
    v.y += body.impulse.y / BODY_MASS;
    body.impulse = null;
  }

  v.x += (body.force.x / BODY_MASS) * dt;
  v.y += (body.force.y / BODY_MASS) * dt;

  // Same damping law as rapier: v *= 1 / (1 + dt * damping)
  const dampFactor = 1 / (1 + dt * body.damping);
  v.x *= dampFactor;
  v.y *= dampFactor;

  v.x = Number.isFinite(v.x) ? v.x : 0;
  v.y = Number.isFinite(v.y) ? v.y : 0;
  const p = body.position;
  p.x += v.x * dt;
  p.y += v.y * dt;

  let hit = false;
  const maxX = ARENA_HALF_WIDTH - BODY_RADIUS;
  const maxY = ARENA_HALF_HEIGHT - BODY_RADIUS;
  if (p.x > maxX || p.x < -maxX) {
    p.x = Math.sign(p.x) * maxX;
    v.x = -v.x * RESTITUTION;
    hit = true;
  }
  if (p.y > maxY || p.y < -maxY) {
    p.y = Math.sign(p.y) * maxY;
    v.y = -v.y * RESTITUTION;
    hit = true;
  }

  // A body pushed into a wall bounces off by a hair every step; stay in contact until it clears the slop.
  const nearWall = maxX - Math.abs(p.x) <= CONTACT_SLOP || maxY - Math.abs(p.y) <= CONTACT_SLOP;
  const touching = hit || (body.touchingWall && nearWall);
  const contactStarted = touching && !body.touchingWall;
  body.touchingWall = touching;

  body.lastUpdatedAt = Date.now();
  return { contactStarted };
}

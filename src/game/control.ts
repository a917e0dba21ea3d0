import type { ControlBody, Vector2 } from '../types/game.js';
import { Cooldown } from './cooldown.js';
import { incHeat } from './heat.js';
import type { InputEvent } from './inputEvents.js';
import {
  ACCELERATION_FACTOR,
  DEFAULT_DAMPING,
  FORCE_MAGNITUDE,
  HEAT_FORCE,
  HEAT_IMPULSE,
  IMPULSE_COOLDOWN_S,
  IMPULSE_MAGNITUDE,
  STABILISATION_DAMPING,
} from './constants.js';

export interface Tuning {
  impulseMagnitude: number;
  forceMagnitude: number;
  accelerationFactor: number;
  defaultDamping: number;
  stabilisationDamping: number;
  /** Seconds; shared by impulse and accelerate */
  impulseCooldown: number;
  heatImpulse: number;
  heatForce: number;
}

export const DEFAULT_TUNING: Readonly<Tuning> = {
  impulseMagnitude: IMPULSE_MAGNITUDE,
  forceMagnitude: FORCE_MAGNITUDE,
  accelerationFactor: ACCELERATION_FACTOR,
  defaultDamping: DEFAULT_DAMPING,
  stabilisationDamping: STABILISATION_DAMPING,
  impulseCooldown: IMPULSE_COOLDOWN_S,
  heatImpulse: HEAT_IMPULSE,
  heatForce: HEAT_FORCE,
};

export interface ControlState {
  /** One slot for both "big" moves so they cannot be chained */
  cooldown: Cooldown;
  bodies: ControlBody[];
  tuning: Readonly<Tuning>;
}

/** Builds a controller whose cooldown duration comes from the same tuning the step reads. */
export function createController(
  bodies: ControlBody[],
  tuning: Readonly<Tuning> = DEFAULT_TUNING,
): ControlState {
  return { cooldown: new Cooldown(tuning.impulseCooldown), bodies, tuning };
}

export interface ControlStepResult {
  applied: InputEvent[];
  /** Gated events that arrived while the cooldown was running */
  dropped: InputEvent[];
}

function scale(v: Vector2, s: number): Vector2 {
  return { x: v.x * s, y: v.y * s };
}

function addImpulse(body: ControlBody, impulse: Vector2) {
  body.impulse = body.impulse
    ? { x: body.impulse.x + impulse.x, y: body.impulse.y + impulse.y }
    : impulse;
}

/**
 * Runs one control tick: clears last tick's forces, advances the shared
 * cooldown by `dt` seconds, then applies `events` in order to every body.
 * Pure with respect to its arguments; same inputs give the same trajectory.
 */
export function stepControl(
  controller: ControlState,
  dt: number,
  events: readonly InputEvent[],
): ControlStepResult {
  if (!Number.isFinite(dt) || dt < 0) {
    throw new RangeError(`control step dt must be a finite non-negative number, got ${dt}`);
  }
  const { cooldown, bodies, tuning } = controller;
  const applied: InputEvent[] = [];
  const dropped: InputEvent[] = [];

  for (const body of bodies) body.force = { x: 0, y: 0 };
  cooldown.tick(dt);

  for (const event of events) {
    switch (event.kind) {
      case 'impulse': {
        if (!cooldown.ready()) {
          dropped.push(event);
          break;
        }
        cooldown.start();
        const impulse = scale(event.direction, tuning.impulseMagnitude);
        for (const body of bodies) {
          body.damping = tuning.defaultDamping;
          addImpulse(body, impulse);
          incHeat(body.heat, tuning.heatImpulse);
        }
        applied.push(event);
        break;
      }
      case 'stabilisation': {
        for (const body of bodies) {
          body.damping = tuning.stabilisationDamping;
          incHeat(body.heat, -1);
        }
        applied.push(event);
        break;
      }
      case 'accelerate': {
        if (!cooldown.ready()) {
          dropped.push(event);
          break;
        }
        cooldown.start();
        for (const body of bodies) {
          addImpulse(body, scale(body.velocity, tuning.accelerationFactor));
          incHeat(body.heat, tuning.heatImpulse);
        }
        applied.push(event);
        break;
      }
      case 'force': {
        const force = scale(event.direction, tuning.forceMagnitude);
        for (const body of bodies) {
          body.damping = tuning.defaultDamping;
          body.force = force;
          incHeat(body.heat, tuning.heatForce);
        }
        applied.push(event);
        break;
      }
    }
  }

  return { applied, dropped };
}

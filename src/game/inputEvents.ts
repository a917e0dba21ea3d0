import type { Vector2 } from '../types/game.js';
import { STICK_DEADZONE } from './constants.js';

export type InputEvent =
  | { readonly kind: 'impulse'; readonly direction: Readonly<Vector2> }
  | { readonly kind: 'force'; readonly direction: Readonly<Vector2> }
  | { readonly kind: 'stabilisation' }
  | { readonly kind: 'accelerate' };

/** Raw per-tick device state as last reported by the client. */
export interface RawInputState {
  keysDown: ReadonlySet<string>;
  stick?: Vector2;
  gamepadSouth?: boolean;
}

export const EMPTY_INPUT: RawInputState = { keysDown: new Set() };

export const STABILISATION: InputEvent = Object.freeze({ kind: 'stabilisation' });
export const ACCELERATE: InputEvent = Object.freeze({ kind: 'accelerate' });

export function normalizeOrZero(v: Vector2): Vector2 {
  const len = Math.hypot(v.x, v.y);
  if (len === 0 || !Number.isFinite(len)) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

// Directional events are never built from a zero vector.
export function impulse(direction: Vector2): InputEvent | undefined {
  const d = normalizeOrZero(direction);
  if (d.x === 0 && d.y === 0) return undefined;
  return { kind: 'impulse', direction: d };
}

export function force(direction: Vector2): InputEvent | undefined {
  const d = normalizeOrZero(direction);
  if (d.x === 0 && d.y === 0) return undefined;
  return { kind: 'force', direction: d };
}

/** Arrow keys summed then normalised; opposite keys cancel. */
export function keyboardDirection(keysDown: ReadonlySet<string>): Vector2 {
  let x = 0;
  let y = 0;
  if (keysDown.has('UP')) y += 1;
  if (keysDown.has('DOWN')) y -= 1;
  if (keysDown.has('LEFT')) x -= 1;
  if (keysDown.has('RIGHT')) x += 1;
  return normalizeOrZero({ x, y });
}

function stickDirection(stick: Vector2 | undefined): Vector2 {
  if (!stick) return { x: 0, y: 0 };
  if (Math.hypot(stick.x, stick.y) <= STICK_DEADZONE) return { x: 0, y: 0 };
  return normalizeOrZero(stick);
}

/**
 * Edge-triggered events between two consecutive raw snapshots.
 * Gamepad events come first, then keyboard:
 *  - south pressed: stabilisation; south released: impulse along the stick
 *  - A pressed: accelerate
 *  - SPACE pressed: stabilisation; SPACE released: impulse along the arrows
 */
export function decodeEdgeEvents(prev: RawInputState, curr: RawInputState): InputEvent[] {
  const events: InputEvent[] = [];
  const push = (e: InputEvent | undefined) => {
    if (e) events.push(e);
  };

  const southWas = !!prev.gamepadSouth;
  const southIs = !!curr.gamepadSouth;
  if (!southWas && southIs) push(STABILISATION);
  if (southWas && !southIs) push(impulse(stickDirection(curr.stick)));

  const pressed = (key: string) => curr.keysDown.has(key) && !prev.keysDown.has(key);
  const released = (key: string) => !curr.keysDown.has(key) && prev.keysDown.has(key);

  if (pressed('A')) push(ACCELERATE);
  if (pressed('SPACE')) push(STABILISATION);
  // Release fires with the direction held at release time.
  if (released('SPACE')) push(impulse(keyboardDirection(curr.keysDown)));
  return events;
}

/** Level-triggered events for the state held at the end of a tick: force while SPACE is up. */
export function decodeHeldEvents(curr: RawInputState): InputEvent[] {
  if (curr.keysDown.has('SPACE')) return [];
  const e = force(keyboardDirection(curr.keysDown));
  return e ? [e] : [];
}

/** Turns two consecutive raw input states into this tick's semantic events. */
export function decodeInputEvents(prev: RawInputState, curr: RawInputState): InputEvent[] {
  return [...decodeEdgeEvents(prev, curr), ...decodeHeldEvents(curr)];
}

/**
 * Decodes every snapshot received since the last tick, pair by pair, so a
 * press and release landing between two ticks still yield both edges. Held
 * events are taken once, from the final state. With nothing received the
 * previous state is still held.
 */
export function decodeInputSequence(
  prev: RawInputState,
  snapshots: readonly RawInputState[],
): { events: InputEvent[]; last: RawInputState } {
  const events: InputEvent[] = [];
  let last = prev;
  for (const snapshot of snapshots) {
    events.push(...decodeEdgeEvents(last, snapshot));
    last = snapshot;
  }
  events.push(...decodeHeldEvents(last));
  return { events, last };
}

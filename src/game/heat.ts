import type { HeatState } from '../types/game.js';

export function createHeat(): HeatState {
  return { amount: 0 };
}

/** Positive deltas raise heat, negative ones decay it; the result is clamped to [0, 1]. */
export function incHeat(heat: HeatState, delta: number): HeatState {
  heat.amount = Math.min(1, Math.max(0, heat.amount + delta));
  return heat;
}

// Base body colour (orange) at 0 heat, red at full heat.
const COLD = { r: 0xff, g: 0xa5, b: 0x00 };
const HOT = { r: 0xff, g: 0x00, b: 0x00 };

function channel(from: number, to: number, t: number): string {
  return Math.round(from + (to - from) * t)
    .toString(16)
    .padStart(2, '0');
}

export function heatColor(amount: number): string {
  const t = Math.min(1, Math.max(0, amount));
  return `#${channel(COLD.r, HOT.r, t)}${channel(COLD.g, HOT.g, t)}${channel(COLD.b, HOT.b, t)}`;
}

// Arena simulation constants. World units are metres; +y is up.

function envNumber(name: string, fallback: number): number {
  const v = Number(process.env[name]);
  return Number.isFinite(v) && v > 0 ? v : fallback;
}

// --- Control tuning (consumed by the control step) ---
export const IMPULSE_MAGNITUDE = envNumber('IMPULSE_MAGNITUDE', 15);
export const FORCE_MAGNITUDE = envNumber('FORCE_MAGNITUDE', 6);
export const ACCELERATION_FACTOR = envNumber('ACCELERATION_FACTOR', 0.3); // boost = velocity * factor
export const DEFAULT_DAMPING = envNumber('DEFAULT_DAMPING', 1);
export const STABILISATION_DAMPING = envNumber('STABILISATION_DAMPING', 6); // brake
export const IMPULSE_COOLDOWN_S = envNumber('IMPULSE_COOLDOWN_S', 1); // shared by impulse + accelerate
export const HEAT_IMPULSE = 0.2;
export const HEAT_FORCE = 0.005; // per tick of held thrust

// --- Input decoding ---
export const STICK_DEADZONE = 0.15; // radial deadzone for analog stick

// --- Arena / body ---
export const ARENA_HALF_WIDTH = 6;
export const ARENA_HALF_HEIGHT = 3;
export const BODY_RADIUS = 0.3;
export const BODY_MASS = Math.PI * BODY_RADIUS * BODY_RADIUS; // unit-density disc
export const RESTITUTION = 0.9;
export const CONTACT_SLOP = 0.01; // distance from a wall still counted as touching it

// --- Loop ---
export const SIM_HZ = 60;
export const SIM_DT = 1 / SIM_HZ; // fixed-step dt seconds
export const BROADCAST_HZ = 30;
export const BROADCAST_MS = 1000 / BROADCAST_HZ;
export const MAX_PENDING_INPUTS = 32; // snapshots queued per body between two ticks
export const BODY_EXPIRY_MS = envNumber('BODY_EXPIRY_MS', 5000); // inactivity purge threshold

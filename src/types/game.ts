export type EntityId = string;

export interface Vector2 {
  x: number;
  y: number;
}

export interface HeatState {
  /** Recent control intensity, always within [0, 1] */
  amount: number;
}

/**
 * Actuation fields of a controlled body. `velocity` is owned by the physics
 * integrator and only read by the control step; everything else is written by
 * the control step and consumed by the integrator.
 */
export interface ControlBody {
  velocity: Vector2;
  damping: number;
  /** One-shot impulse for this tick; consumed (reset to null) by the integrator */
  impulse: Vector2 | null;
  /** Persistent force; cleared at the start of every control step */
  force: Vector2;
  heat: HeatState;
}

export interface BodyState extends ControlBody {
  position: Vector2;
  /** True while the body rests against an arena wall; collision cues fire on the rising edge */
  touchingWall: boolean;
  /** Epoch ms of the last simulation tick that touched this body */
  lastUpdatedAt: number;
}

export type EffectKind = 'explosion' | 'propulsor' | 'collision';

/** One-shot cosmetic cue for the client's particle layer */
export interface EffectCue {
  kind: EffectKind;
  ownerId: EntityId;
  position: Vector2;
}

export interface BodySnapshot {
  position: Vector2;
  velocity: Vector2;
  damping: number;
  heat: number;
  heatColor: string;
  /** Seconds until impulse / accelerate are available again */
  cooldownRemaining: number;
}

export interface GameState {
  bodies: Record<EntityId, BodySnapshot>;
  /** Cues raised since the previous broadcast */
  effects: EffectCue[];
}

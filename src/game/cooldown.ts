/**
 * Restartable countdown used to rate-limit discrete actions.
 * Times are in seconds. A fresh cooldown is already ready, so the gated
 * action is available at startup.
 */
export class Cooldown {
  private readonly _duration: number;
  private _elapsed: number;

  constructor(duration: number) {
    if (!Number.isFinite(duration) || duration < 0) {
      throw new RangeError(`cooldown duration must be a finite non-negative number, got ${duration}`);
    }
    this._duration = duration;
    this._elapsed = duration;
  }

  get duration(): number {
    return this._duration;
  }

  get elapsed(): number {
    return this._elapsed;
  }

  start(): void {
    this._elapsed = 0;
  }

  /** Advances the countdown, saturating at `duration`, and returns the updated readiness. */
  tick(dt: number): boolean {
    if (!Number.isFinite(dt) || dt < 0) {
      throw new RangeError(`cooldown tick must be a finite non-negative number, got ${dt}`);
    }
    this._elapsed = Math.min(this._duration, this._elapsed + dt);
    return this.ready();
  }

  ready(): boolean {
    return this._elapsed >= this._duration;
  }

  // seconds until ready (0 when ready)
  remaining(): number {
    return this._duration - this._elapsed;
  }
}

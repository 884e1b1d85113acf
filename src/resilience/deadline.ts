/**
 * Absolute point in time by which a turn must finish.
 * Deferred channels run without one (`Deadline.none()`).
 */
export class Deadline {
  private constructor(private readonly expiresAt: number) {}

  static after(ms: number, now: number = Date.now()): Deadline {
    return new Deadline(now + ms);
  }

  static none(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY);
  }

  get bounded(): boolean {
    return Number.isFinite(this.expiresAt);
  }

  remainingMs(now: number = Date.now()): number {
    return Math.max(0, this.expiresAt - now);
  }

  expired(now: number = Date.now()): boolean {
    return this.remainingMs(now) <= 0;
  }

  /** The smaller of a step's own timeout and what is left of the deadline */
  budget(stepTimeoutMs: number, now: number = Date.now()): number {
    return Math.min(stepTimeoutMs, this.remainingMs(now));
  }
}

/** Consecutive-failure breaker for one provider; time comes from the caller */
export class CircuitBreaker {
  private failures = 0;
  private openUntil = 0;

  constructor(
    readonly threshold = 5,
    readonly resetMs = 60_000,
  ) {}

  isOpen(now: number): boolean {
    return now < this.openUntil;
  }

  /** Returns true when this failure tripped the breaker */
  recordFailure(now: number): boolean {
    this.failures += 1;
    if (this.failures < this.threshold) return false;
    this.openUntil = now + this.resetMs;
    return true;
  }

  recordSuccess(): void {
    this.failures = 0;
    this.openUntil = 0;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }
}

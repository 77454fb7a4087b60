export const DEFAULT_COOLDOWN_MS = 20_000;

export class CooldownGate {
  private lastAcceptedAt: number | null = null;
  readonly cooldownMs: number;

  constructor(cooldownMs: number = DEFAULT_COOLDOWN_MS) {
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
      throw new Error(`Cooldown must be a non-negative number of milliseconds (received ${cooldownMs})`);
    }
    this.cooldownMs = cooldownMs;
  }

  allow(now: number): boolean {
    if (this.lastAcceptedAt === null) {
      return true;
    }
    const elapsed = now - this.lastAcceptedAt;
    // a clock that stepped backwards never holds the gate shut
    return elapsed < 0 || elapsed >= this.cooldownMs;
  }

  accept(now: number) {
    this.lastAcceptedAt = now;
  }

  /**
   * Checks and records in one step. Callers that may see overlapping
   * confirmations must use this instead of `allow` followed by `accept`.
   */
  tryAcquire(now: number): boolean {
    if (!this.allow(now)) {
      return false;
    }
    this.accept(now);
    return true;
  }

  remainingMs(now: number): number {
    if (this.lastAcceptedAt === null) {
      return 0;
    }
    const elapsed = now - this.lastAcceptedAt;
    return elapsed < 0 ? 0 : Math.max(0, this.cooldownMs - elapsed);
  }

  getLastAcceptedAt(): number | null {
    return this.lastAcceptedAt;
  }
}

export default CooldownGate;

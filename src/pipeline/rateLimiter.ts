export const DEFAULT_MAX_FPS = 8;

/**
 * Frame admission: at most `maxFps` samples reach motion evaluation per second.
 * A timestamp earlier than the last admitted one counts as elapsed.
 */
export class RateLimiter {
  private lastAdmittedAt: number | null = null;
  readonly maxFps: number;
  readonly minIntervalMs: number;

  constructor(maxFps: number = DEFAULT_MAX_FPS) {
    if (!Number.isFinite(maxFps) || maxFps <= 0) {
      throw new Error(`Max FPS must be a positive number (received ${maxFps})`);
    }
    this.maxFps = maxFps;
    this.minIntervalMs = 1000 / maxFps;
  }

  admit(now: number): boolean {
    if (this.lastAdmittedAt !== null) {
      const elapsed = now - this.lastAdmittedAt;
      if (elapsed >= 0 && elapsed < this.minIntervalMs) {
        return false;
      }
    }
    this.lastAdmittedAt = now;
    return true;
  }
}

export default RateLimiter;

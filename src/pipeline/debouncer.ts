export const DEFAULT_CONFIRM_FRAMES = 5;

/**
 * Reduces a noisy per-frame motion signal into confirmed events.
 *
 * A confirmation requires the window to be full and every entry positive, so
 * a single negative sample breaks the run. The window empties after each
 * confirmation; a sustained episode re-confirms only after another full run.
 */
export class Debouncer {
  private readonly samples: boolean[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_CONFIRM_FRAMES) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Debounce window capacity must be a positive integer (received ${capacity})`);
    }
    this.capacity = capacity;
  }

  offer(isMotion: boolean): boolean {
    this.samples.push(isMotion);
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }

    if (this.samples.length < this.capacity) {
      return false;
    }

    const confirmed = this.samples.every(Boolean);
    if (confirmed) {
      this.samples.length = 0;
    }
    return confirmed;
  }

  get size(): number {
    return this.samples.length;
  }

  window(): readonly boolean[] {
    return [...this.samples];
  }

  reset() {
    this.samples.length = 0;
  }
}

export default Debouncer;

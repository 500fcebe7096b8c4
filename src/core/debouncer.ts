interface DebouncerOpts<T> {
  delayMs: number;
  onFire: (items: T[]) => void;
}

/**
 * Trailing-edge debounce: every push restarts the timer, and the collected
 * items are handed over once `delayMs` passes without a push.
 */
export class Debouncer<T> {
  private readonly delayMs: number;
  private readonly onFire: (items: T[]) => void;
  private timer?: NodeJS.Timeout;
  private items: T[] = [];

  constructor(opts: DebouncerOpts<T>) {
    if (!(opts.delayMs > 0)) {
      throw new RangeError(`Debounce interval must be positive, got ${opts.delayMs}`);
    }
    this.delayMs = opts.delayMs;
    this.onFire = opts.onFire;
  }

  public get pending(): boolean {
    return this.timer !== undefined;
  }

  public push(item: T): void {
    this.items.push(item);

    if (this.timer) {
      clearTimeout(this.timer);
    }

    this.timer = setTimeout(() => {
      const items = this.items;
      this.items = [];
      this.timer = undefined;
      this.onFire(items);
    }, this.delayMs);
  }

  public cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.items = [];
  }
}

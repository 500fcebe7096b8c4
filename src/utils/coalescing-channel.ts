/**
 * Single-slot async channel. Values sent while nobody is waiting are merged
 * into the one pending value, so a slow consumer sees at most one backlog item.
 */
export class CoalescingChannel<T> {
  private pending: { value: T } | undefined;
  private waiter?: (result: IteratorResult<T, undefined>) => void;
  private closed = false;

  constructor(private readonly merge: (previous: T, next: T) => T) {}

  public get isClosed(): boolean {
    return this.closed;
  }

  public get hasPending(): boolean {
    return this.pending !== undefined;
  }

  public send(value: T): void {
    if (this.closed) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter({ value, done: false });
      return;
    }

    this.pending = this.pending ? { value: this.merge(this.pending.value, value) } : { value };
  }

  public next(): Promise<IteratorResult<T, undefined>> {
    if (this.pending) {
      const { value } = this.pending;
      this.pending = undefined;
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    if (this.waiter) {
      return Promise.reject(new Error('CoalescingChannel supports a single reader'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /**
   * Ends the stream. A pending value is still delivered before `done`.
   */
  public close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.({ value: undefined, done: true });
  }
}

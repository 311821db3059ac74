/**
 * FIFO of pending work shared by all workers. `take` is synchronous, so on
 * the event loop no two workers can receive the same item.
 */
export class JobQueue<T> {
  private cursor = 0;

  constructor(private readonly items: readonly T[]) {}

  take(): T | undefined {
    if (this.cursor >= this.items.length) return undefined;
    return this.items[this.cursor++];
  }

  get remaining(): number {
    return this.items.length - this.cursor;
  }

  get taken(): number {
    return this.cursor;
  }
}

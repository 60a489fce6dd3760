/**
 * Single-consumer pull queue: producers push from socket callbacks, the
 * session's pump awaits `next()`. Once closed, every later `next()` resolves
 * to the terminal item.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];
  private terminal?: T;

  public get closed(): boolean {
    return this.terminal !== undefined;
  }

  public get size(): number {
    return this.items.length;
  }

  public push(item: T): boolean {
    if (this.terminal !== undefined) {
      return false;
    }
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  public close(terminal: T): void {
    if (this.terminal !== undefined) {
      return;
    }
    this.terminal = terminal;
    for (const waiter of this.waiters.splice(0)) {
      waiter(terminal);
    }
  }

  public next(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) {
        return Promise.resolve(item);
      }
    }
    if (this.terminal !== undefined) {
      return Promise.resolve(this.terminal);
    }
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

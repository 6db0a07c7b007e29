export class AsyncQueue<T> {
  private items: T[] = [];
  private resolvers: Array<(value: T | undefined) => void> = [];
  private closed = false;

  push(item: T) {
    if (this.closed) {
      return;
    }
    const resolver = this.resolvers.shift();
    if (resolver) {
      resolver(item);
      return;
    }
    this.items.push(item);
  }

  get size() {
    return this.items.length;
  }

  // Resolves to undefined once the queue is closed and drained.
  async next(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      return item;
    }
    if (this.closed) {
      return undefined;
    }
    return new Promise<T | undefined>((resolve) => {
      this.resolvers.push(resolve);
    });
  }

  close() {
    this.closed = true;
    for (const resolve of this.resolvers.splice(0)) {
      resolve(undefined);
    }
  }
}

// async mutex
// - runs queued work one task at a time, in call order

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    // a failed task still releases the lock
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

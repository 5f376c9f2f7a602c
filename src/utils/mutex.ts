/**
 * Async mutual exclusion.
 *
 * Critical sections that await (clearing or closing an evicted handle)
 * would otherwise interleave with other callers mutating the same map.
 * Sections run strictly one after another in arrival order.
 */
export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve();

  /**
   * Run `fn` once every previously queued section has finished.
   */
  public runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.tail.then(fn);

    // The chain must survive a failing section
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }
}

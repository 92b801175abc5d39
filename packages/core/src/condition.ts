/**
 * Condition variable for cooperative tasks
 */

export class Condition {
  private waiters = new Set<() => void>();

  /**
   * Suspend until the next broadcast.
   * Aborting `signal` withdraws the waiter; its promise then never settles.
   */
  wait(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      if (signal?.aborted) return;
      const onAbort = () => {
        this.waiters.delete(waiter);
      };
      const waiter = () => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Wake every current waiter. Waiters registered while waking wait for the next broadcast.
   */
  broadcast(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) {
      wake();
    }
  }

  get waiting(): number {
    return this.waiters.size;
  }
}

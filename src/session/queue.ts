/**
 * Per-key serialized execution.
 *
 * Tasks sharing a key run one after another in arrival order; tasks on
 * different keys never wait for each other. Not reentrant: a task must not
 * call `run` with its own key, or it waits on itself forever.
 */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const prior = this.tails.get(key) ?? Promise.resolve();
    const chained = prior.then(task);
    // The caller sees the rejection through `chained`; the tail only orders
    // later tasks, so it must never reject itself.
    const tracked = chained
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        if (this.tails.get(key) === tracked) {
          this.tails.delete(key);
        }
      });
    this.tails.set(key, tracked);
    return chained;
  }
}
